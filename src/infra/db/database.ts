import { Pool, QueryResultRow } from 'pg'
import type { DatabaseConfig } from '../../config/env'
import logger from '../../shared/logger'
import { DOCUMENTS_SCHEMA } from './schema'

export function createPool(config: DatabaseConfig): Pool {
  if (!config.host || !config.user || !config.database) {
    throw new Error('CONFIG_ERROR: Database environment variables are missing!')
  }

  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.max,
  })

  pool.on('connect', () => {
    logger.debug('Database connected')
  })

  pool.on('error', (err) => {
    logger.error('Unexpected error on idle client', { errorMessage: err.message })
  })

  return pool
}

export async function query<T extends QueryResultRow>(
  pool: Pool,
  text: string,
  params?: unknown[]
): Promise<T[]> {
  const client = await pool.connect()
  try {
    const res = await client.query<T>(text, params)
    return res.rows
  } catch (err) {
    logger.error(`Database query error: ${err}`)
    throw err
  } finally {
    client.release()
  }
}

export async function ensureSchema(pool: Pool) {
  await query(pool, DOCUMENTS_SCHEMA)
  logger.info('Database schema ready')
}
