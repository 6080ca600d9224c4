import { BaseController, type JsonReply } from '../../../shared/controllers/BaseController'
import { getAvailableModels } from '../constants/models'
import type { ClassifierRegistryService } from '../services/application/classifier-registry.service'
import { isClassificationError, type ClassificationErrorCode } from '../types/classification.types'

type ClassifyBody = {
  text?: unknown
  categories?: unknown
  model?: unknown
}

type ClassifyRequest = { body?: ClassifyBody }

const ERROR_STATUS: Record<ClassificationErrorCode, number> = {
  EMPTY_INPUT: 400,
  INVALID_CATEGORIES: 400,
  UNAVAILABLE: 503,
  CLASSIFICATION_FAILED: 500,
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string')
}

export class ClassificationController extends BaseController {
  constructor(private readonly classifiers: ClassifierRegistryService) {
    super()
  }

  models = (_req: unknown, res: JsonReply) => {
    return this.ok(res, getAvailableModels())
  }

  classify = async (req: ClassifyRequest, res: JsonReply) => {
    try {
      const body: ClassifyBody = req.body ?? {}
      const { text, categories, model } = body

      if (typeof text !== 'string') {
        return this.badRequest(res, 'VALIDATION_ERROR: text must be a string')
      }
      if (categories !== undefined && !isStringArray(categories)) {
        return this.badRequest(res, 'VALIDATION_ERROR: categories must be an array of strings')
      }
      if (model !== undefined && typeof model !== 'string') {
        return this.badRequest(res, 'VALIDATION_ERROR: model must be a string')
      }

      const result = await this.classifiers.get(model).classifyDocumentText(text, categories)
      if (isClassificationError(result)) {
        return this.sendResponse(res, ERROR_STATUS[result.code], result)
      }
      return this.ok(res, result)
    } catch (err) {
      return this.handleError(res, 'CLASSIFY_ERROR', err)
    }
  }
}
