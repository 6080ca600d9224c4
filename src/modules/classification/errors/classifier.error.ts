export type ClassifierErrorCode =
  | 'CONFIG_ERROR'
  | 'VALIDATION_ERROR'
  | 'UNAVAILABLE'
  | 'MALFORMED_OUTPUT'

export class ClassifierError extends Error {
  constructor(
    public readonly code: ClassifierErrorCode,
    detail: string
  ) {
    super(`${code}: ${detail}`)
    this.name = 'ClassifierError'
  }
}
