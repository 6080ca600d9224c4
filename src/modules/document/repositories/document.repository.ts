import { Pool } from 'pg'
import { query } from '../../../infra/db/database'
import { BaseRepository } from '../../../shared/repositories/BaseRepository'
import { ClassifiedDocument } from '../models/document.model'

export type CreateDocumentInput = {
  filename: string
  content_text: string | null
}

export type ClassificationUpdate = {
  predicted_category: string
  confidence_score: number
  all_scores: Record<string, number>
  classification_time: Date
  inference_time: number
}

export interface DocumentStore {
  create(input: CreateDocumentInput): Promise<ClassifiedDocument>
  findById(id: number): Promise<ClassifiedDocument | null>
  findPage(skip: number, limit: number): Promise<ClassifiedDocument[]>
  saveClassification(id: number, update: ClassificationUpdate): Promise<ClassifiedDocument>
  deleteById(id: number): Promise<boolean>
}

export class DocumentRepository extends BaseRepository<ClassifiedDocument> implements DocumentStore {
  constructor(pool: Pool) {
    super(pool, 'documents')
  }

  async findPage(skip: number, limit: number): Promise<ClassifiedDocument[]> {
    return query<ClassifiedDocument>(
      this.pool,
      `SELECT * FROM documents ORDER BY updated_at DESC, created_at DESC OFFSET $1 LIMIT $2`,
      [skip, limit]
    )
  }

  async saveClassification(id: number, update: ClassificationUpdate): Promise<ClassifiedDocument> {
    const rows = await query<ClassifiedDocument>(
      this.pool,
      `
      UPDATE documents
      SET predicted_category = $1,
          confidence_score = $2,
          all_scores = $3,
          is_classified = TRUE,
          classification_time = $4,
          inference_time = $5,
          updated_at = NOW()
      WHERE id = $6
      RETURNING *;
      `,
      [
        update.predicted_category,
        update.confidence_score,
        JSON.stringify(update.all_scores),
        update.classification_time,
        update.inference_time,
        id,
      ]
    )

    if (!rows[0]) throw new Error('NOT_FOUND: Document not found')
    return rows[0]
  }
}
