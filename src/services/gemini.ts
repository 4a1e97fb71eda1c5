import { GoogleGenAI } from '@google/genai'
import type { GeminiConfig } from '../config.js'
import { log } from './log.js'

export type CompletionOptions = {
  requestName: string
  json?: boolean
  models?: string[]
}

export type CompletionResult =
  | { ok: true; text: string; model: string }
  | { ok: false; error: string; status: number | null }

export type AiClient = {
  readonly configured: boolean
  complete: (prompt: string, options: CompletionOptions) => Promise<CompletionResult>
}

type GenerateRequest = Parameters<GoogleGenAI['models']['generateContent']>[0]

export type ContentGenerator = (request: GenerateRequest) => Promise<{ text?: string | undefined }>

const RETRYABLE_GEMINI_STATUSES = new Set([429, 500, 502, 503, 504])

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

export const getGeminiStatusCode = (error: unknown): number | null => {
  if (!error || typeof error !== 'object') {
    return null
  }

  const candidates = [
    'status' in error ? error.status : undefined,
    'code' in error ? error.code : undefined,
  ]

  for (const value of candidates) {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value
    }
    if (typeof value === 'string') {
      const parsed = Number(value)
      if (Number.isFinite(parsed)) {
        return parsed
      }
    }
  }

  return null
}

const errorMessage = (error: unknown) => {
  if (error instanceof Error) {
    return error.message
  }
  return String(error ?? '')
}

export const isRetryableGeminiError = (error: unknown) => {
  const status = getGeminiStatusCode(error)
  if (status !== null && RETRYABLE_GEMINI_STATUSES.has(status)) {
    return true
  }

  const message = errorMessage(error).toLowerCase()
  if (!message) {
    return false
  }

  return (
    message.includes('high demand') ||
    message.includes('unavailable') ||
    message.includes('rate limit') ||
    message.includes('timed out') ||
    message.includes('deadline exceeded')
  )
}

export const disabledAiClient: AiClient = {
  configured: false,
  complete: async () => ({ ok: false, error: 'GEMINI_API_KEY is not set.', status: null }),
}

/**
 * Wraps `generateContent` with model fallback and bounded retries on
 * retryable statuses. Failures resolve to `{ ok: false }`; nothing throws.
 */
export const createGeminiClient = (
  config: GeminiConfig,
  generate?: ContentGenerator,
): AiClient => {
  const apiKey = config.apiKey
  if (!apiKey && !generate) {
    log.warn('[Gemini] GEMINI_API_KEY is not set. Chat answers fall back to heuristics.')
    return disabledAiClient
  }

  const generateContent: ContentGenerator =
    generate ??
    (() => {
      const client = new GoogleGenAI({ apiKey: apiKey ?? '' })
      return (request) => client.models.generateContent(request)
    })()

  const retryDelayMs = (attemptIndex: number) => {
    const exponential = Math.min(config.retryBaseMs * 2 ** (attemptIndex - 1), config.retryMaxMs)
    const jitter = Math.round(Math.random() * 220)
    return exponential + jitter
  }

  const complete = async (
    prompt: string,
    { requestName, json = false, models: requestedModels }: CompletionOptions,
  ): Promise<CompletionResult> => {
    const models = requestedModels?.length ? requestedModels : config.modelCandidates
    const attemptsPerModel = config.retriesPerModel + 1
    let lastError: unknown = null

    for (let modelIndex = 0; modelIndex < models.length; modelIndex += 1) {
      const model = models[modelIndex]

      for (let attempt = 1; attempt <= attemptsPerModel; attempt += 1) {
        try {
          if (attempt > 1 || modelIndex > 0) {
            log.warn(
              `[Gemini] Retrying ${requestName} with model=${model} attempt=${attempt}/${attemptsPerModel}.`,
            )
          }
          const response = await generateContent({
            model,
            contents: prompt,
            ...(json ? { config: { responseMimeType: 'application/json' } } : {}),
          })
          log.debug(`[Gemini] ${requestName} answered by model=${model}.`)
          return { ok: true, text: (response.text ?? '').trim(), model }
        } catch (error) {
          lastError = error
          const status = getGeminiStatusCode(error)
          const shouldRetrySameModel = isRetryableGeminiError(error) && attempt < attemptsPerModel

          log.warn(
            `[Gemini] ${requestName} failed on model=${model} attempt=${attempt}/${attemptsPerModel}${status !== null ? ` status=${status}` : ''}.`,
          )

          if (shouldRetrySameModel) {
            await wait(retryDelayMs(attempt))
            continue
          }

          break
        }
      }
    }

    log.error(`[Gemini] ${requestName} failed on every model:`, lastError)
    return {
      ok: false,
      error: lastError ? errorMessage(lastError) : `${requestName} failed without error details.`,
      status: getGeminiStatusCode(lastError),
    }
  }

  return {
    configured: true,
    complete,
  }
}
