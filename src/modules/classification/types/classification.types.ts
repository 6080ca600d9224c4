export type Category = string

/** Half-open `[start, end)` range into a document's token sequence. */
export type TokenSpan = {
  start: number
  end: number
}

export type Chunk = {
  span: TokenSpan
  text: string
}

export type ChunkScoreSet = Record<Category, number>

export type ChunkOutcome = {
  index: number
  span: TokenSpan
  scores: ChunkScoreSet
  failed: boolean
}

export type AggregationMethod = 'direct' | 'mean_probabilities' | 'weighted_average'

/** Raw output of a zero-shot call: parallel arrays sorted by descending score. */
export type ZeroShotOutput = {
  labels: string[]
  scores: number[]
}

export type ChunkingOptions = {
  maxChunkTokens: number
  overlapFraction: number
}

export type ModelDescriptor = {
  key: string
  name: string
  modelId: string
  description: string
}

export type Aggregation = {
  predictedCategory: Category
  confidenceScore: number
  allScores: Record<Category, number>
  chunksUsed: number
  aggregationMethod: AggregationMethod
  majorityVote: Category
  weightedScores: Record<Category, number>
  chunkPredictions: Category[]
}

export type ClassificationResult = Aggregation & {
  textLengthChars: number
  textLengthTokens: number
  wasTruncated: false
  inferenceTime: number
  modelUsed: string
  modelKey: string
  modelId: string
}

export type ClassificationErrorCode =
  | 'EMPTY_INPUT'
  | 'INVALID_CATEGORIES'
  | 'UNAVAILABLE'
  | 'CLASSIFICATION_FAILED'

export type ClassificationErrorResult = {
  error: string
  code: ClassificationErrorCode
  predictedCategory: 'Other'
  confidenceScore: 0
}

export type ClassificationOutcome = ClassificationResult | ClassificationErrorResult

export function isClassificationError(
  outcome: ClassificationOutcome
): outcome is ClassificationErrorResult {
  return 'error' in outcome
}
