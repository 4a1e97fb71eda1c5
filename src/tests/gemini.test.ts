import { describe, expect, it, vi } from 'vitest'
import type { GeminiConfig } from '../config.js'
import {
  createGeminiClient,
  getGeminiStatusCode,
  isRetryableGeminiError,
  type ContentGenerator,
} from '../services/gemini.js'

const baseConfig: GeminiConfig = {
  apiKey: 'test-secret',
  modelCandidates: ['model-a'],
  explainModels: ['model-pro'],
  retriesPerModel: 0,
  retryBaseMs: 1,
  retryMaxMs: 1,
}

const statusError = (message: string, status: number) => Object.assign(new Error(message), { status })

describe('error classification', () => {
  it('reads numeric and string statuses', () => {
    expect(getGeminiStatusCode({ status: 429 })).toBe(429)
    expect(getGeminiStatusCode({ code: '503' })).toBe(503)
    expect(getGeminiStatusCode(new Error('plain'))).toBeNull()
    expect(getGeminiStatusCode(null)).toBeNull()
  })

  it('retries transient failures only', () => {
    expect(isRetryableGeminiError({ status: 503 })).toBe(true)
    expect(isRetryableGeminiError(new Error('The model is experiencing high demand'))).toBe(true)
    expect(isRetryableGeminiError(statusError('bad request', 400))).toBe(false)
  })
})

describe('createGeminiClient', () => {
  it('is disabled without a key', async () => {
    const client = createGeminiClient({ ...baseConfig, apiKey: null })

    expect(client.configured).toBe(false)
    expect(await client.complete('hola', { requestName: 'test' })).toEqual({
      ok: false,
      error: 'GEMINI_API_KEY is not set.',
      status: null,
    })
  })

  it('trims the answer and asks for JSON when requested', async () => {
    const generate = vi.fn<ContentGenerator>(async () => ({ text: '  {"action":"list"}  ' }))
    const client = createGeminiClient(baseConfig, generate)

    expect(await client.complete('prompt', { requestName: 'test', json: true })).toEqual({
      ok: true,
      text: '{"action":"list"}',
      model: 'model-a',
    })
    expect(generate).toHaveBeenCalledWith({
      model: 'model-a',
      contents: 'prompt',
      config: { responseMimeType: 'application/json' },
    })
  })

  it('retries a retryable failure on the same model', async () => {
    const generate = vi
      .fn<ContentGenerator>()
      .mockRejectedValueOnce(statusError('unavailable', 503))
      .mockResolvedValueOnce({ text: 'ok' })
    const client = createGeminiClient({ ...baseConfig, retriesPerModel: 1 }, generate)

    expect(await client.complete('prompt', { requestName: 'test' })).toEqual({
      ok: true,
      text: 'ok',
      model: 'model-a',
    })
    expect(generate).toHaveBeenCalledTimes(2)
  })

  it('moves to the next model on a non-retryable failure', async () => {
    const generate = vi
      .fn<ContentGenerator>()
      .mockRejectedValueOnce(statusError('bad request', 400))
      .mockResolvedValueOnce({ text: 'from b' })
    const client = createGeminiClient({ ...baseConfig, retriesPerModel: 2 }, generate)

    expect(await client.complete('prompt', { requestName: 'test', models: ['model-a', 'model-b'] })).toEqual({
      ok: true,
      text: 'from b',
      model: 'model-b',
    })
    expect(generate).toHaveBeenCalledTimes(2)
    expect(generate.mock.calls[1][0].model).toBe('model-b')
  })

  it('reports the last error when every model fails', async () => {
    const generate = vi.fn<ContentGenerator>().mockRejectedValue(statusError('Too many requests', 429))
    const client = createGeminiClient(baseConfig, generate)

    expect(await client.complete('prompt', { requestName: 'test' })).toEqual({
      ok: false,
      error: 'Too many requests',
      status: 429,
    })
  })
})
