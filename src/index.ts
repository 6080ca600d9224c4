// Must stay first: loads .env before anything reads process.env.
import { validateEnv } from './config/env'

import { container } from './container'
import { ensureSchema } from './infra/db/database'
import { createHttpServer } from './infra/http/http.server'
import app from './app'
import logger from './shared/logger'

async function main() {
  validateEnv()

  await ensureSchema(container.pool)

  // The service still starts without a model; classification calls then report it unavailable.
  try {
    await container.classifiers.warmUp()
  } catch (err) {
    logger.warn('Classifier warm-up failed', {
      model: container.classifiers.defaultModel,
      errorMessage: err instanceof Error ? err.message : String(err),
    })
  }

  const http = createHttpServer(app)
  container.attachHttp(http)
  await http.listen(container.config.port)

  let stopping = false
  const shutdown = async (signal: string) => {
    if (stopping) return
    stopping = true
    logger.info('Shutting down', { signal })

    await container.shutdown()

    logger.info('Shutdown complete')
    process.exit(0)
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error('Shutdown failed', { errorMessage: String(err) })
        process.exit(1)
      })
    })
  }
}

main().catch((err) => {
  logger.error('Startup failed', {
    errorMessage: err instanceof Error ? err.message : String(err),
  })
  process.exit(1)
})
