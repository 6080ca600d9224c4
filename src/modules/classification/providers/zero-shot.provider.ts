import { ClassifierError } from '../errors/classifier.error'
import type { Category, ZeroShotOutput } from '../types/classification.types'

export interface ZeroShotClassifierPort {
  /** When false, callers must not issue overlapping `classify` calls. */
  readonly concurrencySafe: boolean
  initialize(): Promise<void>
  classify(text: string, categories: readonly Category[]): Promise<ZeroShotOutput>
  release(): Promise<void>
}

export type HuggingFaceProviderOptions = {
  modelId: string
  apiToken?: string
  baseUrl: string
  timeoutMs: number
}

type ScoredLabel = { label: string; score: number }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toPairs(labels: unknown, scores: unknown): ScoredLabel[] {
  if (!Array.isArray(labels) || !Array.isArray(scores) || labels.length !== scores.length) {
    throw new ClassifierError('MALFORMED_OUTPUT', 'labels and scores must be parallel arrays')
  }

  return labels.map((label, i) => {
    const score = scores[i]
    if (typeof label !== 'string' || typeof score !== 'number') {
      throw new ClassifierError('MALFORMED_OUTPUT', `invalid entry at position ${i}`)
    }
    return { label, score }
  })
}

/**
 * Accepts the zero-shot payloads the inference API is known to return
 * (`{ labels, scores }`, a one-element array of that, or `[{ label, score }]`)
 * and returns parallel arrays sorted by descending score.
 */
export function normalizeZeroShotOutput(payload: unknown): ZeroShotOutput {
  let pairs: ScoredLabel[]
  const wrapped: unknown = Array.isArray(payload) && payload.length === 1 ? payload[0] : undefined

  if (isRecord(payload)) {
    pairs = toPairs(payload.labels, payload.scores)
  } else if (isRecord(wrapped) && 'labels' in wrapped) {
    pairs = toPairs(wrapped.labels, wrapped.scores)
  } else if (Array.isArray(payload)) {
    pairs = payload.map((item, i) => {
      if (!isRecord(item) || typeof item.label !== 'string' || typeof item.score !== 'number') {
        throw new ClassifierError('MALFORMED_OUTPUT', `invalid entry at position ${i}`)
      }
      return { label: item.label, score: item.score }
    })
  } else {
    throw new ClassifierError('MALFORMED_OUTPUT', 'unexpected zero-shot response')
  }

  if (!pairs.length) throw new ClassifierError('MALFORMED_OUTPUT', 'empty zero-shot response')

  pairs.sort((a, b) => b.score - a.score)

  return {
    labels: pairs.map((p) => p.label),
    scores: pairs.map((p) => p.score),
  }
}

export class HuggingFaceZeroShotProvider implements ZeroShotClassifierPort {
  readonly concurrencySafe = true

  private ready = false

  constructor(private readonly options: HuggingFaceProviderOptions) {}

  async initialize() {
    if (!this.options.apiToken) {
      throw new ClassifierError('UNAVAILABLE', 'HF_API_TOKEN is missing')
    }
    this.ready = true
  }

  async classify(text: string, categories: readonly Category[]): Promise<ZeroShotOutput> {
    if (!this.ready) throw new ClassifierError('UNAVAILABLE', 'zero-shot provider not initialized')

    const res = await fetch(`${this.options.baseUrl}/models/${this.options.modelId}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.options.apiToken}`,
      },
      body: JSON.stringify({
        inputs: text,
        parameters: { candidate_labels: [...categories], multi_label: false },
      }),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    })

    if (!res.ok) {
      const detail = await res.text()
      throw new Error(`Inference API error ${res.status}: ${detail}`)
    }

    const payload: unknown = await res.json()
    return normalizeZeroShotOutput(payload)
  }

  async release() {
    this.ready = false
  }
}
