import { z } from 'zod'
import type { AiClient } from '../services/gemini.js'
import { log } from '../services/log.js'
import { classificationPrompt } from './prompts.js'
import { containsAny, containsPhrase, normalizeText, words } from './text.js'
import { vocabulary } from './vocabulary.js'

export type MenuContext = 'none' | 'stations' | 'concepts'

export type ChatContext = {
  lastMenu: MenuContext
}

export type ResolvedIntent =
  | { kind: 'greeting' }
  | { kind: 'list_stations' }
  | { kind: 'show_concept'; variable: string | null }
  | { kind: 'concept_by_letter'; letter: string }
  | { kind: 'station_status'; by: 'name'; name: string }
  | { kind: 'station_status'; by: 'number'; number: number }
  | { kind: 'general_info' }
  | { kind: 'time_series_request'; station: string | null; variable: string | null; days: number }
  | { kind: 'open_question'; text: string }
  | { kind: 'unknown'; text: string }

export const INITIAL_CONTEXT: ChatContext = { lastMenu: 'none' }

const DEFAULT_SERIES_DAYS = 7
const CODE_FENCE = /^```(?:json)?\s*|\s*```$/g

const classificationSchema = z.object({
  action: z.enum(['greeting', 'list', 'status', 'series', 'concept', 'general']),
  station: z.string().trim().min(1).nullish(),
  variable: z.string().trim().min(1).nullish(),
  days: z.number().int().positive().nullish(),
})

export type Classification = z.infer<typeof classificationSchema>

/** Parses a classifier reply; `null` when it is not the expected JSON shape. */
export const parseClassification = (raw: string): Classification | null => {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw.trim().replace(CODE_FENCE, ''))
  } catch (error) {
    log.warn('[Chat] Classifier reply is not JSON:', error instanceof Error ? error.message : error)
    return null
  }

  const result = classificationSchema.safeParse(parsed)
  if (!result.success) {
    log.warn('[Chat] Classifier reply does not match the schema:', result.error.issues)
    return null
  }
  return result.data
}

const fromClassification = (classification: Classification, original: string): ResolvedIntent => {
  switch (classification.action) {
    case 'greeting':
      return { kind: 'greeting' }
    case 'list':
      return { kind: 'list_stations' }
    case 'status':
      return classification.station
        ? { kind: 'station_status', by: 'name', name: classification.station }
        : { kind: 'unknown', text: original }
    case 'series':
      return {
        kind: 'time_series_request',
        station: classification.station ?? null,
        variable: classification.variable ?? null,
        days: classification.days ?? DEFAULT_SERIES_DAYS,
      }
    case 'concept':
      return { kind: 'show_concept', variable: classification.variable ?? null }
    case 'general':
      return { kind: 'general_info' }
  }
}

export const isGreeting = (normalized: string) =>
  words(normalized).some((word) => vocabulary.greetings.includes(word))

/** Comparisons and rankings; "cual" must not match "cualquier". */
export const isComplexQuestion = (normalized: string) =>
  containsPhrase(normalized, vocabulary.complexTriggers)

/**
 * Ordered rules over the normalized message; the first match wins and the
 * AI classifier only sees what no rule claimed.
 */
export const resolveIntent = async (
  message: string,
  context: ChatContext,
  ai: AiClient,
): Promise<ResolvedIntent> => {
  const original = message.trim()
  const q = normalizeText(message)

  if (!q) {
    return { kind: 'greeting' }
  }

  if (isGreeting(q)) {
    return { kind: 'greeting' }
  }

  if (context.lastMenu === 'none') {
    if (q === 'a') {
      return { kind: 'list_stations' }
    }
    if (q === 'b') {
      return { kind: 'show_concept', variable: null }
    }
  }

  for (const prefix of ['que es ', 'what is ']) {
    if (q.startsWith(prefix)) {
      const variable = q.slice(prefix.length).trim()
      return { kind: 'show_concept', variable: variable || null }
    }
  }

  if (isComplexQuestion(q)) {
    log.info(`[Chat] Complex question routed to open answer: "${original}"`)
    return { kind: 'open_question', text: original }
  }

  if (containsAny(q, vocabulary.stationCountPhrases)) {
    return { kind: 'general_info' }
  }

  if (/^[a-f]$/.test(q)) {
    return { kind: 'concept_by_letter', letter: q.toUpperCase() }
  }

  if (/^\d+$/.test(q)) {
    return { kind: 'station_status', by: 'number', number: Number(q) }
  }

  if (!ai.configured) {
    return { kind: 'station_status', by: 'name', name: original }
  }

  const result = await ai.complete(classificationPrompt(original), {
    requestName: 'intent classification',
    json: true,
  })
  if (!result.ok) {
    return { kind: 'open_question', text: original }
  }

  const classification = parseClassification(result.text)
  if (!classification) {
    return { kind: 'open_question', text: original }
  }

  log.debug('[Chat] Classified intent:', classification)
  return fromClassification(classification, original)
}
