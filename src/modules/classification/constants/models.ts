import { ClassifierError } from '../errors/classifier.error'
import type { ModelDescriptor } from '../types/classification.types'

const MODEL_CATALOG: Record<string, ModelDescriptor> = {
  'bart-large-mnli': {
    key: 'bart-large-mnli',
    name: 'BART Large MNLI',
    modelId: 'facebook/bart-large-mnli',
    description: "Facebook's BART model fine-tuned for MNLI",
  },
  'mdeberta-v3-base': {
    key: 'mdeberta-v3-base',
    name: 'mDeBERTa v3 Base',
    modelId: 'MoritzLaurer/mDeBERTa-v3-base-mnli-xnli',
    description: 'Multilingual DeBERTa model for cross-lingual classification',
  },
}

export function getAvailableModels(): Record<string, ModelDescriptor> {
  const copy: Record<string, ModelDescriptor> = {}
  for (const [key, model] of Object.entries(MODEL_CATALOG)) copy[key] = { ...model }
  return copy
}

export function resolveModel(key: string): ModelDescriptor {
  const model = Object.prototype.hasOwnProperty.call(MODEL_CATALOG, key)
    ? MODEL_CATALOG[key]
    : undefined

  if (!model) {
    const available = Object.keys(MODEL_CATALOG).join(', ')
    throw new ClassifierError(
      'VALIDATION_ERROR',
      `Model '${key}' not supported. Available models: ${available}`
    )
  }
  return { ...model }
}
