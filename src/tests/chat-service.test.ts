import { describe, expect, it } from 'vitest'
import { createChatService } from '../chat/chat-service.js'
import { outOfScopeReply } from '../chat/composer.js'
import { CONCEPTS } from '../chat/concepts.js'
import { INITIAL_CONTEXT } from '../chat/intent.js'
import { disabledAiClient } from '../services/gemini.js'
import { createReadingStore } from '../services/readings.js'
import { createFakeAi, FIXTURE_CSV } from './helpers.js'

const createStore = () => createReadingStore('fixture.csv', async () => FIXTURE_CSV)

describe('handleMessage', () => {
  it('carries the menu context between turns', async () => {
    const chat = createChatService({ store: createStore(), ai: disabledAiClient, explainModels: [] })

    const list = await chat.handleMessage('a', INITIAL_CONTEXT)
    expect(list.context).toEqual({ lastMenu: 'stations' })

    const letter = await chat.handleMessage('a', list.context)
    expect(letter.text).toBe(
      `${CONCEPTS['pm2.5']}\n\n💡 Escribe "b" para ver otros conceptos o "hola" para el menú principal.`,
    )
    expect(letter.context).toEqual({ lastMenu: 'none' })
  })

  it('answers known phrases and patterns before the model', async () => {
    const { ai, complete } = createFakeAi(() => ({ ok: true, text: 'Análisis.', model: 'fake-model' }))
    const chat = createChatService({ store: createStore(), ai, explainModels: [] })

    expect(await chat.handleMessage('¿Cuántas estaciones hay?', INITIAL_CONTEXT)).toEqual({
      text: 'Tenemos 3 estaciones meteorológicas monitoreando la región.',
      context: INITIAL_CONTEXT,
    })
    expect((await chat.handleMessage('¿Desde cuándo hay datos?', INITIAL_CONTEXT)).text).toBe(
      'Los datos van desde 01/03/2025 hasta 02/03/2025.',
    )

    const station = await chat.handleMessage('estación 2', { lastMenu: 'stations' })
    expect(station.text.split('\n')[0]).toBe('📍 **Estación 2: Parque Central**')
    expect(station.context).toEqual({ lastMenu: 'stations' })

    expect(complete).not.toHaveBeenCalled()
  })

  it('sends comparisons to the model instead of a pattern answer', async () => {
    const { ai, complete } = createFakeAi(() => ({ ok: true, text: 'Análisis.', model: 'fake-model' }))
    const chat = createChatService({ store: createStore(), ai, explainModels: [] })

    const reply = await chat.handleMessage('¿Cuál es la peor calidad del aire?', INITIAL_CONTEXT)

    expect(reply.text).toBe('Análisis.')
    expect(complete).toHaveBeenCalledTimes(1)
    expect(complete).toHaveBeenCalledWith(expect.any(String), { requestName: 'open question' })
  })
})

describe('explain', () => {
  it('is unavailable without AI', async () => {
    const chat = createChatService({ store: createStore(), ai: disabledAiClient, explainModels: [] })

    expect(await chat.explain('¿Qué es el PM2.5?')).toEqual({
      ok: false,
      error: 'El servicio de IA no está disponible.',
    })
  })

  it('declines questions outside climate and air quality', async () => {
    const { ai, complete } = createFakeAi()
    const chat = createChatService({ store: createStore(), ai, explainModels: ['model-x'] })

    expect(await chat.explain('receta de pasta')).toEqual({ ok: true, text: outOfScopeReply('receta de pasta') })
    expect(complete).not.toHaveBeenCalled()
  })

  it('accepts dashboard questions by their markers and uses the explain models', async () => {
    const { ai, complete } = createFakeAi(() => ({ ok: true, text: 'Explicación.', model: 'model-x' }))
    const chat = createChatService({ store: createStore(), ai, explainModels: ['model-x'] })
    const question = '📍 **Estación:** Halley UIS\n¿Qué significa?'

    expect(await chat.explain(question)).toEqual({ ok: true, text: 'Explicación.' })
    expect(complete).toHaveBeenCalledWith(expect.stringContaining(question), {
      requestName: 'explain',
      models: ['model-x'],
    })
  })

  it('apologizes for an empty answer and reports failures', async () => {
    const empty = createFakeAi()
    const emptyChat = createChatService({ store: createStore(), ai: empty.ai, explainModels: [] })
    expect(await emptyChat.explain('¿Cómo está la humedad?')).toEqual({
      ok: true,
      text: 'Lo siento, no pude generar una explicación en este momento. Intenta reformular tu pregunta.',
    })

    const failing = createFakeAi(() => ({ ok: false, error: 'quota', status: 429 }))
    const failingChat = createChatService({ store: createStore(), ai: failing.ai, explainModels: [] })
    expect(await failingChat.explain('¿Cómo está la humedad?')).toEqual({
      ok: false,
      error: 'No se pudo generar la explicación.',
    })
  })
})
