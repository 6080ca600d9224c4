import { loadConfig } from './config/env'
import { createPool } from './infra/db/database'
import type { HttpServer } from './infra/http/http.server'
import logger from './shared/logger'

import { BpeTokenizer } from './modules/classification/providers/tokenizer.provider'
import { HuggingFaceZeroShotProvider } from './modules/classification/providers/zero-shot.provider'
import { ClassifierRegistryService } from './modules/classification/services/application/classifier-registry.service'
import { DocumentClassifierService } from './modules/classification/services/application/document-classifier.service'

import { DocumentRepository } from './modules/document/repositories/document.repository'
import { DocumentService } from './modules/document/services/document.service'

import type { Pool } from 'pg'

const config = loadConfig()

const classifiers = new ClassifierRegistryService(
  (model) =>
    new DocumentClassifierService(
      model,
      new HuggingFaceZeroShotProvider({
        modelId: model.modelId,
        apiToken: config.classifier.hfApiToken,
        baseUrl: config.classifier.hfBaseUrl,
        timeoutMs: config.classifier.requestTimeoutMs,
      }),
      new BpeTokenizer(),
      {
        maxChunkTokens: config.classifier.maxChunkTokens,
        overlapFraction: config.classifier.overlapFraction,
      }
    ),
  config.classifier.defaultModel
)

let pool: Pool | null = null
let documents: DocumentService | null = null
let httpServer: HttpServer | null = null

export const container = {
  config,
  classifiers,

  get pool() {
    if (!pool) pool = createPool(config.database)
    return pool
  },

  get documents() {
    if (!documents) documents = new DocumentService(new DocumentRepository(this.pool), classifiers)
    return documents
  },

  attachHttp(server: HttpServer) {
    httpServer = server
  },

  // In-flight requests finish before the classifiers and pool go away.
  async shutdown() {
    if (httpServer) {
      await httpServer.close()
      httpServer = null
    }

    await classifiers.release()

    if (pool) {
      await pool.end()
      pool = null
      logger.info('Database pool closed')
    }
  },
}
