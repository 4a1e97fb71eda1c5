import 'dotenv/config'
import { isAbsolute, resolve } from 'node:path'
import { parseLogLevel, type LogLevel } from './services/log.js'

export type GeminiConfig = {
  apiKey: string | null
  modelCandidates: string[]
  explainModels: string[]
  retriesPerModel: number
  retryBaseMs: number
  retryMaxMs: number
}

export type AppConfig = {
  appName: string
  appVersion: string
  dataFilePath: string
  host: string
  port: number
  corsOrigins: string[]
  logLevel: LogLevel
  gemini: GeminiConfig
}

const DEFAULT_GEMINI_MODELS = ['gemini-2.5-flash']
const DEFAULT_EXPLAIN_MODELS = ['gemini-2.5-pro', 'gemini-2.5-flash']
const DEFAULT_DATA_FILE = 'data/readings.csv'

const readPositiveInt = (raw: string | undefined, fallback: number, min = 0) => {
  const parsed = Number.parseInt(String(raw ?? ''), 10)
  if (!Number.isFinite(parsed) || parsed < min) {
    return fallback
  }
  return parsed
}

const readList = (raw: string | undefined, fallback: string[]) => {
  const entries = String(raw ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
  return entries.length ? entries : fallback
}

const resolveConfigPath = (raw: string | undefined, fallbackPath: string) => {
  const trimmed = raw?.trim()
  if (!trimmed) {
    return resolve(process.cwd(), fallbackPath)
  }
  return isAbsolute(trimmed) ? trimmed : resolve(process.cwd(), trimmed)
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const retryBaseMs = readPositiveInt(env.GEMINI_RETRY_BASE_MS, 900, 150)

  return {
    appName: env.APP_NAME?.trim() || 'Weather Stations API',
    appVersion: env.APP_VERSION?.trim() || '1.0.0',
    dataFilePath: resolveConfigPath(env.DATA_FILE_PATH ?? env.CSV_FILE_PATH, DEFAULT_DATA_FILE),
    host: env.HOST?.trim() || '0.0.0.0',
    port: readPositiveInt(env.PORT, 8000, 1),
    corsOrigins: readList(env.CORS_ORIGINS, []),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    gemini: {
      apiKey: env.GEMINI_API_KEY?.trim() || null,
      modelCandidates: readList(
        env.GEMINI_MODEL_CANDIDATES ?? env.GEMINI_MODELS,
        DEFAULT_GEMINI_MODELS,
      ),
      explainModels: readList(env.GEMINI_EXPLAIN_MODELS, DEFAULT_EXPLAIN_MODELS),
      retriesPerModel: readPositiveInt(env.GEMINI_RETRIES_PER_MODEL, 0),
      retryBaseMs,
      retryMaxMs: readPositiveInt(env.GEMINI_RETRY_MAX_MS, 6000, retryBaseMs),
    },
  }
}
