export interface CreateDocumentDto {
  filename?: unknown
  text?: unknown
  autoClassify?: unknown
}
