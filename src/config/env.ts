import dotenv from 'dotenv'
import logger from '../shared/logger'

dotenv.config()

if (process.env.LOG_LEVEL) logger.level = process.env.LOG_LEVEL

export type DatabaseConfig = {
  host?: string
  port: number
  user?: string
  password?: string
  database?: string
  max: number
}

export type ClassifierConfig = {
  defaultModel: string
  maxChunkTokens: number
  overlapFraction: number
  requestTimeoutMs: number
  hfApiToken?: string
  hfBaseUrl: string
}

export type AppConfig = {
  port: number
  corsOrigins: string[]
  database: DatabaseConfig
  classifier: ClassifierConfig
}

type Env = Record<string, string | undefined>

export function validateEnv(env: Env = process.env): string[] {
  const required = ['DB_HOST', 'DB_USER', 'DB_NAME', 'HF_API_TOKEN']

  const missing = required.filter((key) => !env[key])
  for (const key of missing) {
    logger.warn(`[ENV] Missing ${key}`)
  }
  return missing
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return fallback

  const n = Number(raw)
  if (!Number.isFinite(n)) {
    logger.warn(`[ENV] ${key} is not a number, using ${fallback}`, { value: raw })
    return fallback
  }
  return n
}

function readList(env: Env, key: string, fallback: string[]): string[] {
  const raw = env[key]
  if (!raw) return fallback

  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readNumber(env, 'PORT', 3000),
    corsOrigins: readList(env, 'CORS_ORIGINS', ['http://127.0.0.1:5173', 'http://localhost:5173']),
    database: {
      host: env.DB_HOST,
      port: readNumber(env, 'DB_PORT', 5432),
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      database: env.DB_NAME,
      max: readNumber(env, 'DB_MAX_POOL', 10),
    },
    classifier: {
      defaultModel: env.CLASSIFIER_MODEL || 'bart-large-mnli',
      maxChunkTokens: readNumber(env, 'CLASSIFIER_MAX_CHUNK_TOKENS', 900),
      overlapFraction: readNumber(env, 'CLASSIFIER_OVERLAP_FRACTION', 0.2),
      requestTimeoutMs: readNumber(env, 'CLASSIFIER_TIMEOUT_MS', 60000),
      hfApiToken: env.HF_API_TOKEN || undefined,
      hfBaseUrl: (env.HF_BASE_URL || 'https://api-inference.huggingface.co').replace(/\/+$/, ''),
    },
  }
}
