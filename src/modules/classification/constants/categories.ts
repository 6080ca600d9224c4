import type { Category } from '../types/classification.types'

export const DEFAULT_CATEGORIES: readonly Category[] = Object.freeze([
  'Technical Documentation',
  'Business Proposal',
  'Legal Document',
  'Academic Paper',
  'General Article',
])

// Only ever reported on error paths, never offered to the model.
export const FALLBACK_CATEGORY = 'Other'
