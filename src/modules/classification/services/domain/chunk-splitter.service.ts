import { ClassifierError } from '../../errors/classifier.error'
import type { TokenizerPort } from '../../providers/tokenizer.provider'
import type { Chunk, ChunkingOptions, TokenSpan } from '../../types/classification.types'

export const DEFAULT_CHUNKING: ChunkingOptions = {
  maxChunkTokens: 900,
  overlapFraction: 0.2,
}

export class ChunkSplitterService {
  readonly maxChunkTokens: number
  readonly overlapTokens: number

  constructor(options: ChunkingOptions = DEFAULT_CHUNKING) {
    const { maxChunkTokens, overlapFraction } = options

    if (!Number.isInteger(maxChunkTokens) || maxChunkTokens < 1) {
      throw new ClassifierError('CONFIG_ERROR', 'maxChunkTokens must be a positive integer')
    }
    if (!Number.isFinite(overlapFraction) || overlapFraction < 0) {
      throw new ClassifierError('CONFIG_ERROR', 'overlapFraction must be a non-negative number')
    }

    const overlapTokens = Math.floor(maxChunkTokens * overlapFraction)
    if (overlapTokens >= maxChunkTokens) {
      throw new ClassifierError(
        'CONFIG_ERROR',
        `overlap of ${overlapTokens} tokens must be smaller than maxChunkTokens (${maxChunkTokens})`
      )
    }

    this.maxChunkTokens = maxChunkTokens
    this.overlapTokens = overlapTokens
  }

  get stride() {
    return this.maxChunkTokens - this.overlapTokens
  }

  needsSplit(tokenCount: number) {
    return tokenCount > this.maxChunkTokens
  }

  spans(totalTokens: number): TokenSpan[] {
    const out: TokenSpan[] = []
    if (totalTokens <= 0) return out

    let start = 0
    for (;;) {
      const end = Math.min(start + this.maxChunkTokens, totalTokens)
      out.push({ start, end })
      if (end >= totalTokens) break
      start += this.stride
    }

    return out
  }

  split(tokens: number[], tokenizer: Pick<TokenizerPort, 'decode'>): Chunk[] {
    return this.spans(tokens.length).map((span) => ({
      span,
      text: tokenizer.decode(tokens.slice(span.start, span.end)),
    }))
  }
}
