import { BaseModel } from '../../../shared/models/BaseModel'

export class ClassifiedDocument extends BaseModel<number> {
  filename!: string
  content_text!: string | null
  predicted_category!: string | null
  confidence_score!: number | null
  all_scores!: Record<string, number> | null
  is_classified!: boolean
  classification_time!: Date | null
  inference_time!: number | null
}
