import logger from '../../../../shared/logger'
import { ClassifierError } from '../../errors/classifier.error'
import type { ZeroShotClassifierPort } from '../../providers/zero-shot.provider'
import type {
  Category,
  Chunk,
  ChunkOutcome,
  ChunkScoreSet,
  ZeroShotOutput,
} from '../../types/classification.types'
import type { InferenceSlot } from './inference-slot'

export function zeroScores(categories: readonly Category[]): ChunkScoreSet {
  return Object.fromEntries(categories.map((c) => [c, 0]))
}

export class ChunkClassifierService {
  constructor(
    private readonly classifier: ZeroShotClassifierPort,
    private readonly slot?: InferenceSlot
  ) {}

  /** One primitive call; malformed output is an error, not a zero score. */
  async classifyText(text: string, categories: readonly Category[]): Promise<ZeroShotOutput> {
    const call = () => this.classifier.classify(text, categories)
    const output = this.slot ? await this.slot.run(call) : await call()
    this.toScoreSet(output, categories)
    return output
  }

  /**
   * Classifies chunks sequentially in chunk order. A failed chunk is kept
   * with a zero score for every category.
   */
  async classifyChunks(chunks: Chunk[], categories: readonly Category[]): Promise<ChunkOutcome[]> {
    const outcomes: ChunkOutcome[] = []

    for (const [index, chunk] of chunks.entries()) {
      try {
        const output = await this.classifyText(chunk.text, categories)
        outcomes.push({
          index,
          span: chunk.span,
          scores: this.toScoreSet(output, categories),
          failed: false,
        })
      } catch (err) {
        logger.warn('[CLASSIFIER] chunk_failed', {
          chunk: index,
          start: chunk.span.start,
          end: chunk.span.end,
          errorMessage: err instanceof Error ? err.message : String(err),
        })
        outcomes.push({ index, span: chunk.span, scores: zeroScores(categories), failed: true })
      }

      logger.debug('[CLASSIFIER] chunk_processed', {
        chunk: index,
        tokens: chunk.span.end - chunk.span.start,
      })
    }

    return outcomes
  }

  toScoreSet(output: ZeroShotOutput, categories: readonly Category[]): ChunkScoreSet {
    const { labels, scores } = output
    if (!Array.isArray(labels) || !Array.isArray(scores) || labels.length !== scores.length) {
      throw new ClassifierError('MALFORMED_OUTPUT', 'labels and scores must be parallel arrays')
    }

    const set = zeroScores(categories)
    const seen = new Set<Category>()

    labels.forEach((label, i) => {
      const score = scores[i]
      if (!categories.includes(label)) {
        throw new ClassifierError('MALFORMED_OUTPUT', `unknown label '${label}'`)
      }
      if (seen.has(label)) {
        throw new ClassifierError('MALFORMED_OUTPUT', `duplicate label '${label}'`)
      }
      if (typeof score !== 'number' || !Number.isFinite(score) || score < 0 || score > 1) {
        throw new ClassifierError('MALFORMED_OUTPUT', `score for '${label}' is out of range`)
      }
      seen.add(label)
      set[label] = score
    })

    // With no unknown or repeated labels, equal length means every category was scored.
    if (labels.length !== categories.length) {
      throw new ClassifierError(
        'MALFORMED_OUTPUT',
        `expected ${categories.length} labels, got ${labels.length}`
      )
    }

    return set
  }
}
