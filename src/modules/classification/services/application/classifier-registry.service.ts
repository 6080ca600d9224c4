import logger from '../../../../shared/logger'
import { resolveModel } from '../../constants/models'
import type { ModelDescriptor } from '../../types/classification.types'
import type { DocumentClassifierService } from './document-classifier.service'

export type ClassifierFactory = (model: ModelDescriptor) => DocumentClassifierService

/** Owns one classifier handle per model key for the life of the process. */
export class ClassifierRegistryService {
  private readonly handles = new Map<string, DocumentClassifierService>()

  constructor(
    private readonly factory: ClassifierFactory,
    readonly defaultModel: string
  ) {
    resolveModel(defaultModel)
  }

  get size() {
    return this.handles.size
  }

  get(modelKey: string = this.defaultModel): DocumentClassifierService {
    const existing = this.handles.get(modelKey)
    if (existing) return existing

    const handle = this.factory(resolveModel(modelKey))
    this.handles.set(modelKey, handle)
    return handle
  }

  /** Readiness of an existing handle; never creates one. */
  isReady(modelKey: string = this.defaultModel): boolean {
    return this.handles.get(modelKey)?.isReady ?? false
  }

  async warmUp(modelKey: string = this.defaultModel) {
    await this.get(modelKey).initialize()
  }

  async release() {
    if (!this.handles.size) {
      logger.info('[CLASSIFIER] no classifier handles to release')
      return
    }

    const handles = [...this.handles.values()]
    this.handles.clear()

    const results = await Promise.allSettled(handles.map((h) => h.release()))
    const failures = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected')
    for (const failure of failures) {
      logger.error('[CLASSIFIER] release_failed', { reason: String(failure.reason) })
    }

    logger.info('[CLASSIFIER] handles released', {
      released: handles.length - failures.length,
      failed: failures.length,
    })
  }
}
