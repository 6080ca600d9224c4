import logger from '../../../../shared/logger'
import { DEFAULT_CATEGORIES, FALLBACK_CATEGORY } from '../../constants/categories'
import type { TokenizerPort } from '../../providers/tokenizer.provider'
import type { ZeroShotClassifierPort } from '../../providers/zero-shot.provider'
import type {
  Aggregation,
  Category,
  ChunkingOptions,
  ClassificationErrorCode,
  ClassificationErrorResult,
  ClassificationOutcome,
  ModelDescriptor,
} from '../../types/classification.types'
import { ChunkClassifierService } from '../domain/chunk-classifier.service'
import { ChunkSplitterService, DEFAULT_CHUNKING } from '../domain/chunk-splitter.service'
import { InferenceSlot } from '../domain/inference-slot'
import { ScoreAggregatorService, roundScore } from '../domain/score-aggregator.service'

function errorResult(error: string, code: ClassificationErrorCode): ClassificationErrorResult {
  return { error, code, predictedCategory: FALLBACK_CATEGORY, confidenceScore: 0 }
}

function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err)
}

/**
 * One classifier handle per model. `initialize()` loads the tokenizer and the
 * zero-shot primitive once; `release()` drops them. Calls made before
 * `initialize()` load the handle lazily.
 */
export class DocumentClassifierService {
  private readonly splitter: ChunkSplitterService
  private readonly invoker: ChunkClassifierService
  private readonly aggregator = new ScoreAggregatorService()

  private ready = false
  private loading: Promise<void> | null = null

  constructor(
    readonly model: ModelDescriptor,
    private readonly classifier: ZeroShotClassifierPort,
    private readonly tokenizer: TokenizerPort,
    chunking: ChunkingOptions = DEFAULT_CHUNKING
  ) {
    this.splitter = new ChunkSplitterService(chunking)
    const slot = classifier.concurrencySafe ? undefined : new InferenceSlot()
    this.invoker = new ChunkClassifierService(classifier, slot)
  }

  get isReady() {
    return this.ready
  }

  initialize(): Promise<void> {
    if (this.ready) return Promise.resolve()
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null
      })
    }
    return this.loading
  }

  async release() {
    if (this.loading) await this.loading.catch(() => undefined)
    if (!this.ready) return

    this.ready = false
    await this.classifier.release()
    await this.tokenizer.release()
    logger.info('[CLASSIFIER] released', { model: this.model.key })
  }

  async classifyDocumentText(
    text: string,
    categories?: readonly Category[]
  ): Promise<ClassificationOutcome> {
    if (!text || !text.trim()) {
      return errorResult('Empty text provided', 'EMPTY_INPUT')
    }

    const labels = this.resolveCategories(categories)
    if (typeof labels === 'string') return errorResult(labels, 'INVALID_CATEGORIES')

    try {
      await this.initialize()
    } catch (err) {
      return errorResult(`Classifier unavailable: ${errorMessage(err)}`, 'UNAVAILABLE')
    }

    const startedAt = Date.now()

    try {
      const tokens = this.tokenizer.encode(text)
      const tokenCount = tokens.length

      let aggregation: Aggregation
      if (!this.splitter.needsSplit(tokenCount)) {
        const output = await this.invoker.classifyText(text, labels)
        aggregation = this.aggregator.direct(output, labels)
      } else {
        const chunks = this.splitter.split(tokens, this.tokenizer)
        logger.info('[CLASSIFIER] chunking', {
          model: this.model.key,
          tokens: tokenCount,
          chunks: chunks.length,
          maxChunkTokens: this.splitter.maxChunkTokens,
          overlapTokens: this.splitter.overlapTokens,
        })

        const outcomes = await this.invoker.classifyChunks(chunks, labels)
        const failed = outcomes.filter((o) => o.failed).length
        if (failed === outcomes.length) {
          logger.warn('[CLASSIFIER] all_chunks_failed', { model: this.model.key, chunks: failed })
        }

        aggregation = this.aggregator.aggregate(
          outcomes.map((o) => o.scores),
          labels
        )
      }

      const inferenceTime = roundScore((Date.now() - startedAt) / 1000, 3)

      logger.info('[CLASSIFIER] classified', {
        model: this.model.key,
        category: aggregation.predictedCategory,
        confidence: aggregation.confidenceScore,
        method: aggregation.aggregationMethod,
        chunks: aggregation.chunksUsed,
      })

      return {
        ...aggregation,
        textLengthChars: Array.from(text).length,
        textLengthTokens: tokenCount,
        wasTruncated: false,
        inferenceTime,
        modelUsed: this.model.name,
        modelKey: this.model.key,
        modelId: this.model.modelId,
      }
    } catch (err) {
      logger.error('[CLASSIFIER] classification_failed', {
        model: this.model.key,
        errorMessage: errorMessage(err),
      })
      return errorResult(errorMessage(err), 'CLASSIFICATION_FAILED')
    }
  }

  private async load() {
    logger.info('[CLASSIFIER] loading', { model: this.model.key, modelId: this.model.modelId })
    try {
      await this.tokenizer.initialize()
      await this.classifier.initialize()
      this.ready = true
      logger.info('[CLASSIFIER] loaded', { model: this.model.key })
    } catch (err) {
      logger.error('[CLASSIFIER] load_failed', {
        model: this.model.key,
        errorMessage: errorMessage(err),
      })
      throw err
    }
  }

  // Returns a private copy of the category list, or a message describing why it is unusable.
  private resolveCategories(categories?: readonly Category[]): Category[] | string {
    const list = [...(categories ?? DEFAULT_CATEGORIES)]
    if (!list.length) return 'At least one category is required'

    const seen = new Set<Category>()
    for (const category of list) {
      if (typeof category !== 'string' || !category.trim()) return 'Category names must be non-empty'
      if (seen.has(category)) return `Duplicate category '${category}'`
      seen.add(category)
    }
    return list
  }
}
