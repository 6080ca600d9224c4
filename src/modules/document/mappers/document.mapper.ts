import { DocumentResponseDto } from '../dtos/document-response.dto'
import { ClassifiedDocument } from '../models/document.model'

export class DocumentMapper {
  static readonly PREVIEW_LENGTH = 200

  static toResponse(doc: ClassifiedDocument): DocumentResponseDto {
    return {
      id: doc.id,
      filename: doc.filename,
      content_text: doc.content_text,
      predicted_category: doc.predicted_category,
      confidence_score: doc.confidence_score,
      all_scores: doc.all_scores,
      is_classified: doc.is_classified,
      classification_time: doc.classification_time,
      inference_time: doc.inference_time,
      uploaded_at: doc.created_at,
      updated_at: doc.updated_at,
    }
  }

  static toPreview(content: string, maxLength = DocumentMapper.PREVIEW_LENGTH): string {
    const trimmed = content.trim()
    if (trimmed.length <= maxLength) return trimmed
    return trimmed.slice(0, maxLength) + '...'
  }
}
