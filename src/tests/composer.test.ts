import { describe, expect, it } from 'vitest'
import { composeResponse, outOfScopeReply, type ComposerDeps } from '../chat/composer.js'
import { CONCEPT_MENU, CONCEPTS, unknownConceptMessage } from '../chat/concepts.js'
import { INITIAL_CONTEXT } from '../chat/intent.js'
import { disabledAiClient } from '../services/gemini.js'
import { createFakeAi, loadFixtureTable } from './helpers.js'

const table = loadFixtureTable()
const deps: ComposerDeps = { table, ai: disabledAiClient, random: () => 0 }
const stationsMenu = { lastMenu: 'stations' } as const
const conceptsMenu = { lastMenu: 'concepts' } as const

describe('composeResponse menus', () => {
  it('greets with the main menu and resets the context', async () => {
    const reply = await composeResponse({ kind: 'greeting' }, stationsMenu, deps)

    expect(reply.context).toEqual({ lastMenu: 'none' })
    expect(reply.text.startsWith('☀️ ¡Hola! Soy tu nube amiga del clima.\nSoy tu asistente ambiental')).toBe(true)
    expect(reply.text).toContain('🅰️ Ver estaciones disponibles')
  })

  it('picks the greeting with the injected random source', async () => {
    const reply = await composeResponse({ kind: 'greeting' }, INITIAL_CONTEXT, { ...deps, random: () => 0.99 })

    expect(reply.text.split('\n')[0]).toBe('💨 Estoy lista para mostrarte los datos ambientales.')
  })

  it('lists stations and enters the stations menu', async () => {
    const reply = await composeResponse({ kind: 'list_stations' }, INITIAL_CONTEXT, deps)

    expect(reply.context).toEqual({ lastMenu: 'stations' })
    expect(reply.text).toContain('1. Halley UIS\n2. Parque Central\n3. Barrio Norte')
  })

  it('shows the concept menu', async () => {
    expect(await composeResponse({ kind: 'show_concept', variable: null }, INITIAL_CONTEXT, deps)).toEqual({
      text: CONCEPT_MENU,
      context: { lastMenu: 'concepts' },
    })
  })
})

describe('composeResponse concepts', () => {
  it('explains a named concept', async () => {
    expect(await composeResponse({ kind: 'show_concept', variable: 'PM2.5' }, stationsMenu, deps)).toEqual({
      text: CONCEPTS['pm2.5'],
      context: { lastMenu: 'none' },
    })
  })

  it('keeps the context for an unknown concept', async () => {
    expect(await composeResponse({ kind: 'show_concept', variable: 'ozono' }, conceptsMenu, deps)).toEqual({
      text: unknownConceptMessage('ozono'),
      context: conceptsMenu,
    })
  })

  it('explains a concept by letter', async () => {
    expect(await composeResponse({ kind: 'concept_by_letter', letter: 'D' }, conceptsMenu, deps)).toEqual({
      text: `${CONCEPTS.ica}\n\n💡 Escribe "b" para ver otros conceptos o "hola" para el menú principal.`,
      context: { lastMenu: 'none' },
    })
  })

  it('bounds letters', async () => {
    expect(await composeResponse({ kind: 'concept_by_letter', letter: 'G' }, conceptsMenu, deps)).toEqual({
      text: 'Letra fuera de rango. Escribe una letra de A a F.\n\nEscribe "b" para ver la lista de conceptos nuevamente.',
      context: conceptsMenu,
    })
  })
})

describe('composeResponse station status', () => {
  it('renders a station by number with the footer', async () => {
    const reply = await composeResponse({ kind: 'station_status', by: 'number', number: 1 }, stationsMenu, deps)

    expect(reply).toEqual({
      text: [
        '📍 *Halley UIS*',
        '🌡️ 24 °C',
        '💧 66 %',
        '📈 1012 hPa',
        '🌫️ PM2.5: 14 µg/m³',
        '🌬️ ICA: 60',
        '🌧️ Precipitación: 2.5 mm',
        '🕒 01/03/2025 14:00',
        '',
        '😊 Aire bueno, sin riesgos importantes.',
        '',
        '💡 Escribe "a" para ver otras estaciones o "hola" para el menú principal.',
      ].join('\n'),
      context: { lastMenu: 'none' },
    })
  })

  it('bounds station numbers and keeps the menu', async () => {
    expect(await composeResponse({ kind: 'station_status', by: 'number', number: 5 }, stationsMenu, deps)).toEqual({
      text: 'Número fuera de rango. Escribe un número del 1 al 3.\n\nEscribe "a" para ver la lista de estaciones nuevamente.',
      context: stationsMenu,
    })
  })

  it('matches names by accent-insensitive substring', async () => {
    const reply = await composeResponse({ kind: 'station_status', by: 'name', name: 'párque CENTRAL' }, INITIAL_CONTEXT, deps)

    expect(reply.text.split('\n')[0]).toBe('📍 *Parque Central*')
    expect(reply.text.endsWith('— Sin datos de calidad del aire disponibles.')).toBe(true)
  })

  it('falls back to a not-found message', async () => {
    expect(await composeResponse({ kind: 'station_status', by: 'name', name: 'Atlantis' }, INITIAL_CONTEXT, deps)).toEqual({
      text: 'No encontré la estación "Atlantis". Escribe "a" para ver las disponibles.',
      context: INITIAL_CONTEXT,
    })
  })
})

describe('composeResponse information', () => {
  it('summarizes the system', async () => {
    const reply = await composeResponse({ kind: 'general_info' }, INITIAL_CONTEXT, deps)

    expect(reply.text).toBe(
      [
        '📊 Información del sistema:',
        '• *3 estaciones activas*',
        '• *7 registros de datos*',
        '• Variables: temperatura, humedad, presión, PM, ICA, precipitación',
        '• Cobertura: 2 días',
        '',
        'Puedes escribir "a" para ver la lista completa.',
      ].join('\n'),
    )
  })

  it('renders daily means for a resolved series', async () => {
    const reply = await composeResponse(
      { kind: 'time_series_request', station: 'halley', variable: 'temp', days: 7 },
      INITIAL_CONTEXT,
      deps,
    )

    expect(reply.text).toBe(
      '📈 *Temperatura en Halley UIS* (promedio diario, últimos 7 días)\n• 01/03/2025: 22 °C',
    )
  })

  it('points to the API when a series cannot be resolved', async () => {
    const reply = await composeResponse(
      { kind: 'time_series_request', station: null, variable: 'pm25', days: 7 },
      INITIAL_CONTEXT,
      deps,
    )

    expect(reply.text).toBe(
      '📈 Las series históricas están disponibles a través de la API.\nPara datos detallados de pm25 en estaciones, usa /api/stations/timeseries o pregúntame por el estado actual.',
    )
  })
})

describe('composeResponse open questions', () => {
  it('declines off-topic questions', async () => {
    const reply = await composeResponse({ kind: 'open_question', text: 'Háblame de fútbol' }, INITIAL_CONTEXT, deps)

    expect(reply.text).toBe(outOfScopeReply('Háblame de fútbol'))
  })

  it('uses the heuristics without AI', async () => {
    const reply = await composeResponse(
      { kind: 'open_question', text: '¿Cuál es la estación con mejor aire?' },
      INITIAL_CONTEXT,
      deps,
    )

    expect(reply.text).toBe('🌬️ **Mejor calidad del aire**: Halley UIS con ICA promedio de 50')
  })

  it('asks the AI with the context block', async () => {
    const { ai, complete } = createFakeAi(() => ({
      ok: true,
      text: 'Halley UIS tiene el mejor aire.',
      model: 'fake-model',
    }))

    const reply = await composeResponse(
      { kind: 'open_question', text: '¿Qué estación tiene mejor aire?' },
      INITIAL_CONTEXT,
      { ...deps, ai },
    )

    expect(reply.text).toBe('Halley UIS tiene el mejor aire.')
    const [prompt] = complete.mock.calls[0]
    expect(prompt).toContain('PREGUNTA DEL USUARIO: "¿Qué estación tiene mejor aire?"')
    expect(prompt).toContain('- Total de estaciones activas: 3')
  })

  it('falls back to the heuristics when the AI fails', async () => {
    const { ai } = createFakeAi(() => ({ ok: false, error: 'quota', status: 429 }))

    const reply = await composeResponse({ kind: 'open_question', text: 'peor aire' }, INITIAL_CONTEXT, { ...deps, ai })

    expect(reply.text).toBe('🌬️ **Peor calidad del aire**: Barrio Norte con ICA promedio de 85')
  })

  it('routes to canned answers by topic', async () => {
    const records = await composeResponse(
      { kind: 'open_question', text: 'cuantos datos de clima hay' },
      INITIAL_CONTEXT,
      deps,
    )
    expect(records.text.split('\n')[0]).toBe('📈 El sistema tiene *7 registros* de mediciones ambientales.')

    const location = await composeResponse(
      { kind: 'open_question', text: 'donde estan los sensores' },
      INITIAL_CONTEXT,
      deps,
    )
    expect(location.text).toContain('• Latitud: 7.1 a 7.2\n• Longitud: -73.15 a -73.1')
  })

  it('answers unknown input with the default reply', async () => {
    expect(await composeResponse({ kind: 'unknown', text: 'zzz' }, stationsMenu, deps)).toEqual({
      text: 'No entendí muy bien. Puedes decir "hola" para ver las opciones o escribir el nombre de una estación.',
      context: stationsMenu,
    })
  })
})
