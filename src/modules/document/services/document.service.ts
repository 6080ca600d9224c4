import logger from '../../../shared/logger'
import type { ClassifierRegistryService } from '../../classification/services/application/classifier-registry.service'
import {
  isClassificationError,
  type ClassificationResult,
} from '../../classification/types/classification.types'
import { DocumentResponseDto, UploadResponseDto } from '../dtos/document-response.dto'
import { CreateDocumentDto } from '../dtos/create-document.dto'
import { DocumentMapper } from '../mappers/document.mapper'
import { ClassificationUpdate, DocumentStore } from '../repositories/document.repository'

export type ClassifyDocumentResponse = {
  message: string
  document_id: number
  classification_result: ClassificationResult
}

export class DocumentService {
  static readonly DEFAULT_LIMIT = 100
  static readonly MAX_LIMIT = 500

  constructor(
    private readonly repo: DocumentStore,
    private readonly classifiers: ClassifierRegistryService
  ) {}

  async create(dto: CreateDocumentDto): Promise<UploadResponseDto> {
    const filename = typeof dto.filename === 'string' ? dto.filename.trim() : ''
    if (!filename) throw new Error('VALIDATION_ERROR: filename is required')

    if (dto.text !== undefined && dto.text !== null && typeof dto.text !== 'string') {
      throw new Error('VALIDATION_ERROR: text must be a string')
    }
    if (dto.autoClassify !== undefined && typeof dto.autoClassify !== 'boolean') {
      throw new Error('VALIDATION_ERROR: autoClassify must be boolean')
    }

    const text = typeof dto.text === 'string' && dto.text.trim() ? dto.text : null
    const created = await this.repo.create({ filename, content_text: text })

    const response: UploadResponseDto = {
      message: 'Document uploaded successfully',
      document_id: created.id,
      filename,
      content_preview: text ? DocumentMapper.toPreview(text) : null,
    }

    if (text && dto.autoClassify !== false) {
      // A failed classification never fails the upload itself.
      try {
        const startedAt = new Date()
        const result = await this.classifiers.get().classifyDocumentText(text)
        if (isClassificationError(result)) {
          logger.warn('[DOCUMENTS] auto_classification_skipped', {
            documentId: created.id,
            reason: result.error,
          })
        } else {
          await this.repo.saveClassification(created.id, this.toUpdate(result, startedAt))
          response.classification = {
            predicted_category: result.predictedCategory,
            confidence_score: result.confidenceScore,
            auto_classified: true,
          }
        }
      } catch (err) {
        logger.error('[DOCUMENTS] auto_classification_failed', {
          documentId: created.id,
          errorMessage: err instanceof Error ? err.message : String(err),
        })
      }
    }

    return response
  }

  async list(skip = 0, limit = DocumentService.DEFAULT_LIMIT): Promise<DocumentResponseDto[]> {
    if (!Number.isInteger(skip) || skip < 0) throw new Error('VALIDATION_ERROR: Invalid skip')
    if (!Number.isInteger(limit) || limit < 1) throw new Error('VALIDATION_ERROR: Invalid limit')

    const docs = await this.repo.findPage(skip, Math.min(limit, DocumentService.MAX_LIMIT))
    return docs.map(DocumentMapper.toResponse)
  }

  async getById(id: number): Promise<DocumentResponseDto> {
    const doc = await this.repo.findById(id)
    if (!doc) throw new Error('NOT_FOUND: Document not found')
    return DocumentMapper.toResponse(doc)
  }

  async delete(id: number): Promise<{ message: string }> {
    const doc = await this.repo.findById(id)
    if (!doc) throw new Error('NOT_FOUND: Document not found')

    await this.repo.deleteById(id)
    return { message: `Document ${doc.filename} deleted successfully` }
  }

  async classify(id: number, modelKey?: string): Promise<ClassifyDocumentResponse> {
    const doc = await this.repo.findById(id)
    if (!doc) throw new Error('NOT_FOUND: Document not found')
    if (!doc.content_text || !doc.content_text.trim()) {
      throw new Error('VALIDATION_ERROR: Document has no text content to classify')
    }

    const startedAt = new Date()
    const result = await this.classifiers.get(modelKey).classifyDocumentText(doc.content_text)

    if (isClassificationError(result)) {
      const prefix = result.code === 'UNAVAILABLE' ? 'UNAVAILABLE' : 'CLASSIFICATION_FAILED'
      throw new Error(`${prefix}: Classification failed: ${result.error}`)
    }

    await this.repo.saveClassification(id, this.toUpdate(result, startedAt))

    return {
      message: 'Document classified successfully',
      document_id: id,
      classification_result: result,
    }
  }

  private toUpdate(result: ClassificationResult, startedAt: Date): ClassificationUpdate {
    return {
      predicted_category: result.predictedCategory,
      confidence_score: result.confidenceScore,
      all_scores: result.allScores,
      classification_time: startedAt,
      inference_time: result.inferenceTime,
    }
  }
}
