import { once } from 'node:events'
import { readFileSync } from 'node:fs'
import type { Server } from 'node:http'
import { fileURLToPath } from 'node:url'
import type { Express } from 'express'
import { vi } from 'vitest'
import type { AiClient, CompletionOptions, CompletionResult } from '../services/gemini.js'
import { createReadingTable, parseReadingsCsv } from '../services/readings.js'

export const FIXTURE_PATH = fileURLToPath(new URL('./fixtures/readings.csv', import.meta.url))

export const FIXTURE_CSV = readFileSync(FIXTURE_PATH, 'utf-8')

export const loadFixtureTable = () => createReadingTable(parseReadingsCsv(FIXTURE_CSV))

/** Configured AI client whose completions come from `reply`. */
export const createFakeAi = (
  reply: (prompt: string) => CompletionResult = () => ({ ok: true, text: '', model: 'fake-model' }),
) => {
  const complete = vi.fn(
    async (prompt: string, _options: CompletionOptions): Promise<CompletionResult> => reply(prompt),
  )
  const ai: AiClient = { configured: true, complete }
  return { ai, complete }
}

export const startServer = async (app: Express) => {
  const server: Server = app.listen(0, '127.0.0.1')
  await once(server, 'listening')
  const address = server.address()
  if (!address || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port.')
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()))
      }),
  }
}

export const readJson = async (response: Response) => JSON.parse(await response.text())
