export interface DocumentResponseDto {
  id: number
  filename: string
  content_text: string | null
  predicted_category: string | null
  confidence_score: number | null
  all_scores: Record<string, number> | null
  is_classified: boolean
  classification_time: Date | null
  inference_time: number | null
  uploaded_at: Date
  updated_at: Date
}

export interface UploadResponseDto {
  message: string
  document_id: number
  filename: string
  content_preview: string | null
  classification?: {
    predicted_category: string
    confidence_score: number
    auto_classified: true
  }
}
