import type { AiClient } from '../services/gemini.js'
import { log } from '../services/log.js'
import type { ReadingStore, ReadingTable } from '../services/readings.js'
import { composeResponse, outOfScopeReply, type ChatReply } from './composer.js'
import { tryAnswer } from './heuristics.js'
import { isComplexQuestion, isGreeting, resolveIntent, type ChatContext } from './intent.js'
import { buildContextBlock, explainPrompt } from './prompts.js'
import { containsAny, normalizeText } from './text.js'
import { vocabulary } from './vocabulary.js'

export type ExplainResult =
  | { ok: true; text: string }
  | { ok: false; error: string }

export type ChatService = {
  readonly aiConfigured: boolean
  handleMessage: (message: string, context: ChatContext) => Promise<ChatReply>
  explain: (question: string) => Promise<ExplainResult>
}

type ChatServiceOptions = {
  store: ReadingStore
  ai: AiClient
  explainModels: string[]
  random?: () => number
}

// the dashboard prepends these to station and period questions
const CONTEXT_MARKERS = ['📍 **Estación:**', '📊 **Promedios del período:**']

const EMPTY_EXPLANATION =
  'Lo siento, no pude generar una explicación en este momento. Intenta reformular tu pregunta.'

// greetings open the main menu and comparisons need the open answer
const directAnswer = (table: ReadingTable, message: string) => {
  const q = normalizeText(message)
  if (!q || isGreeting(q) || isComplexQuestion(q)) {
    return null
  }
  return tryAnswer(table, message)
}

const isClimateQuestion = (question: string) =>
  CONTEXT_MARKERS.some((marker) => question.includes(marker)) ||
  containsAny(normalizeText(question), vocabulary.explainTopics)

export const createChatService = ({
  store,
  ai,
  explainModels,
  random,
}: ChatServiceOptions): ChatService => {
  const handleMessage = async (message: string, context: ChatContext) => {
    const table = await store.load()
    const answer = directAnswer(table, message)
    if (answer !== null) {
      log.debug(`[Chat] Heuristic answer for "${message.trim()}".`)
      return { text: answer, context }
    }

    const intent = await resolveIntent(message, context, ai)
    log.debug(`[Chat] Intent ${intent.kind} (context=${context.lastMenu}).`)
    return composeResponse(intent, context, { table, ai, random })
  }

  const explain = async (question: string): Promise<ExplainResult> => {
    if (!ai.configured) {
      return { ok: false, error: 'El servicio de IA no está disponible.' }
    }

    if (!isClimateQuestion(question)) {
      return { ok: true, text: outOfScopeReply(question) }
    }

    const table = await store.load()
    const result = await ai.complete(explainPrompt(buildContextBlock(table), question), {
      requestName: 'explain',
      models: explainModels,
    })
    if (!result.ok) {
      return { ok: false, error: 'No se pudo generar la explicación.' }
    }

    return { ok: true, text: result.text || EMPTY_EXPLANATION }
  }

  return {
    aiConfigured: ai.configured,
    handleMessage,
    explain,
  }
}
