import type { JsonReply } from '../../shared/controllers/BaseController'
import type { ClassifierRegistryService } from '../../modules/classification/services/application/classifier-registry.service'

/** Liveness plus whether the default model's classifier handle is loaded. */
export function createHealthCheck(classifiers: ClassifierRegistryService) {
  return (_req: unknown, res: JsonReply) => {
    res.json({
      status: 'ok',
      service: 'document-classifier',
      classifier: {
        model: classifiers.defaultModel,
        ready: classifiers.isReady(),
      },
      timestamp: new Date().toISOString(),
    })
  }
}
