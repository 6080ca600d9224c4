import { BaseController, type JsonReply } from '../../../shared/controllers/BaseController'
import { CreateDocumentDto } from '../dtos/create-document.dto'
import { DocumentService } from '../services/document.service'

type Params = Record<string, string | undefined>

type CreateRequest = { body?: CreateDocumentDto }
type ListRequest = { query: Record<string, unknown> }
type IdRequest = { params: Params }
type ClassifyRequest = { params: Params; body?: { model?: unknown } }

function readInt(value: unknown): number | undefined {
  if (value === undefined) return undefined
  return typeof value === 'string' ? Number(value) : Number.NaN
}

export class DocumentController extends BaseController {
  // Resolved per request so the database pool is only created once a document route is hit.
  constructor(private readonly documents: () => DocumentService) {
    super()
  }

  create = async (req: CreateRequest, res: JsonReply) => {
    try {
      const result = await this.documents().create(req.body ?? {})
      return this.created(res, result)
    } catch (err) {
      return this.handleError(res, 'DOCUMENT_CREATE_ERROR', err)
    }
  }

  list = async (req: ListRequest, res: JsonReply) => {
    try {
      const docs = await this.documents().list(readInt(req.query.skip), readInt(req.query.limit))
      return this.ok(res, docs)
    } catch (err) {
      return this.handleError(res, 'DOCUMENT_LIST_ERROR', err)
    }
  }

  getById = async (req: IdRequest, res: JsonReply) => {
    try {
      const id = this.parseIdParam(req.params.id)
      if (id === null) return this.badRequest(res, 'VALIDATION_ERROR: Invalid id')

      const doc = await this.documents().getById(id)
      return this.ok(res, doc)
    } catch (err) {
      return this.handleError(res, 'DOCUMENT_GET_ERROR', err)
    }
  }

  delete = async (req: IdRequest, res: JsonReply) => {
    try {
      const id = this.parseIdParam(req.params.id)
      if (id === null) return this.badRequest(res, 'VALIDATION_ERROR: Invalid id')

      const result = await this.documents().delete(id)
      return this.ok(res, result)
    } catch (err) {
      return this.handleError(res, 'DOCUMENT_DELETE_ERROR', err)
    }
  }

  classify = async (req: ClassifyRequest, res: JsonReply) => {
    try {
      const id = this.parseIdParam(req.params.id)
      if (id === null) return this.badRequest(res, 'VALIDATION_ERROR: Invalid id')

      const model = req.body?.model
      if (model !== undefined && typeof model !== 'string') {
        return this.badRequest(res, 'VALIDATION_ERROR: model must be a string')
      }

      const result = await this.documents().classify(id, model)
      return this.ok(res, result)
    } catch (err) {
      return this.handleError(res, 'DOCUMENT_CLASSIFY_ERROR', err)
    }
  }
}
