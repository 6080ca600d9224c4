import type {
  Aggregation,
  Category,
  ChunkScoreSet,
  ZeroShotOutput,
} from '../../types/classification.types'

type Winner = { category: Category; score: number }

export function roundScore(value: number, digits = 4): number {
  const f = 10 ** digits
  return Math.round(value * f) / f
}

function roundAll(scores: Record<Category, number>): Record<Category, number> {
  const out: Record<Category, number> = {}
  for (const [category, score] of Object.entries(scores)) out[category] = roundScore(score)
  return out
}

export class ScoreAggregatorService {
  // Weighted average must beat the mean by more than 10% to be selected.
  static readonly WEIGHTED_MARGIN = 1.1
  static readonly MAX_CHUNK_PREDICTIONS = 5

  /** Wraps a single direct call; no aggregation takes place. */
  direct(output: ZeroShotOutput, categories: readonly Category[]): Aggregation {
    const scores: Record<Category, number> = {}
    for (const category of categories) {
      const i = output.labels.indexOf(category)
      scores[category] = i >= 0 ? output.scores[i] : 0
    }

    const predictedCategory = output.labels[0] ?? categories[0]
    const allScores = roundAll(scores)

    return {
      predictedCategory,
      confidenceScore: roundScore(output.scores[0] ?? 0),
      allScores,
      chunksUsed: 1,
      aggregationMethod: 'direct',
      majorityVote: predictedCategory,
      weightedScores: { ...allScores },
      chunkPredictions: [predictedCategory],
    }
  }

  aggregate(scoreSets: ChunkScoreSet[], categories: readonly Category[]): Aggregation {
    if (!scoreSets.length) throw new Error('aggregate() needs at least one chunk')
    if (!categories.length) throw new Error('aggregate() needs at least one category')

    const mean = this.meanScores(scoreSets, categories)
    const weighted = this.weightedScores(scoreSets, categories)

    const meanWinner = this.argmax(mean, categories)
    const weightedWinner = this.argmax(weighted, categories)

    const useWeighted =
      weightedWinner.score > meanWinner.score * ScoreAggregatorService.WEIGHTED_MARGIN
    const selected = useWeighted ? weightedWinner : meanWinner

    const votes = scoreSets.map((set) => this.argmax(set, categories).category)

    return {
      predictedCategory: selected.category,
      confidenceScore: roundScore(selected.score),
      allScores: roundAll(mean),
      chunksUsed: scoreSets.length,
      aggregationMethod: useWeighted ? 'weighted_average' : 'mean_probabilities',
      majorityVote: this.majorityVote(votes),
      weightedScores: roundAll(weighted),
      chunkPredictions: votes.slice(0, ScoreAggregatorService.MAX_CHUNK_PREDICTIONS),
    }
  }

  /** Strategy A: per-category mean over every attempted chunk. */
  meanScores(scoreSets: ChunkScoreSet[], categories: readonly Category[]) {
    const out: Record<Category, number> = {}
    for (const category of categories) {
      const sum = scoreSets.reduce((acc, set) => acc + (set[category] ?? 0), 0)
      out[category] = sum / scoreSets.length
    }
    return out
  }

  /**
   * Strategy C: each score weighted by itself. The normalizer is the summed
   * weight of the first category only and is shared by every category, so
   * results are not bounded by 1.
   */
  weightedScores(scoreSets: ChunkScoreSet[], categories: readonly Category[]) {
    const first = categories[0]
    const totalWeight = scoreSets.reduce((acc, set) => acc + (set[first] ?? 0), 0)

    const out: Record<Category, number> = {}
    for (const category of categories) {
      const weightedSum = scoreSets.reduce((acc, set) => {
        const score = set[category] ?? 0
        return acc + score * score
      }, 0)
      out[category] = totalWeight > 0 ? weightedSum / totalWeight : 0
    }
    return out
  }

  /** Strategy B: most frequent vote, ties going to the earliest first vote. */
  majorityVote(votes: Category[]): Category {
    const counts = new Map<Category, number>()
    for (const vote of votes) counts.set(vote, (counts.get(vote) ?? 0) + 1)

    let best = votes[0]
    let bestCount = 0
    for (const [category, count] of counts) {
      if (count > bestCount) {
        best = category
        bestCount = count
      }
    }
    return best
  }

  // Ties resolve to the category listed first.
  private argmax(scores: Record<Category, number>, categories: readonly Category[]): Winner {
    let best: Winner = { category: categories[0], score: -Infinity }
    for (const category of categories) {
      const score = scores[category] ?? 0
      if (score > best.score) best = { category, score }
    }
    return best
  }
}
