import type { AiClient } from '../services/gemini.js'
import { log } from '../services/log.js'
import type { ReadingTable } from '../services/readings.js'
import { mean, round2 } from '../services/stats.js'
import {
  geographicCoverage,
  summarizeStations,
  temporalCoverage,
  type StationSummary,
} from '../services/summary.js'
import { resolveVariableKey, VARIABLES } from '../services/variables.js'
import {
  CONCEPT_LETTERS,
  CONCEPT_MENU,
  CONCEPTS,
  interpretAirQuality,
  lookupConcept,
  unknownConceptMessage,
} from './concepts.js'
import { tryAnswer } from './heuristics.js'
import type { ChatContext, ResolvedIntent } from './intent.js'
import { buildContextBlock, openQuestionPrompt } from './prompts.js'
import {
  containsAny,
  displayValue,
  formatCount,
  formatDate,
  formatDateTime,
  formatDecimal,
  normalizeText,
} from './text.js'
import { vocabulary } from './vocabulary.js'

export type ComposerDeps = {
  table: ReadingTable
  ai: AiClient
  random?: () => number
}

export type ChatReply = {
  text: string
  context: ChatContext
}

const GREETINGS = [
  '☀️ ¡Hola! Soy tu nube amiga del clima.',
  '🌤️ ¡Bienvenido! Te ayudo a entender el clima y el aire.',
  '💨 Estoy lista para mostrarte los datos ambientales.',
]

const MAIN_MENU = `Soy tu asistente ambiental conectado a la red de estaciones meteorológicas.
Puedo decirte cómo está el aire, la temperatura o explicarte conceptos.

Opciones disponibles:
🅰️ Ver estaciones disponibles
🅱️ Aprender sobre variables (PM2.5, humedad, ICA, etc.)
¿Qué deseas hacer?`

const DEFAULT_REPLY =
  'No entendí muy bien. Puedes decir "hola" para ver las opciones o escribir el nombre de una estación.'

const NONE: ChatContext = { lastMenu: 'none' }

export const isRelevantQuestion = (text: string) => {
  const q = normalizeText(text)
  return containsAny(q, vocabulary.relevant) && !containsAny(q, vocabulary.offTopic)
}

export const outOfScopeReply = (question: string) => `🤔 Tu pregunta sobre "${question}" está fuera de mi área de especialidad.

Estoy especializada en datos ambientales y meteorológicos. Puedo ayudarte con:

🌡️ **Clima:** temperatura, humedad, precipitación, viento, presión
🌬️ **Calidad del aire:** PM2.5, ICA, contaminación
📍 **Estaciones:** ubicaciones, datos actuales, estadísticas
📊 **Información:** cuántas estaciones, rangos de datos, cobertura

¿Te gustaría explorar alguno de estos temas?
• Escribe "a" para ver estaciones 📍
• Escribe "b" para aprender conceptos 📘
• Haz una pregunta sobre clima o calidad del aire 🌤️`

const renderStationStatus = (station: StationSummary, footer: boolean) => {
  const values = station.latest.measurements
  if (!Object.keys(values).length) {
    return `No hay datos recientes para "${station.stationName}".`
  }

  const lines = [
    `📍 *${station.stationName}*`,
    `🌡️ ${displayValue(values.temperature)} °C`,
    `💧 ${displayValue(values.humidity)} %`,
    `📈 ${displayValue(values.pressure)} hPa`,
    `🌫️ PM2.5: ${displayValue(values.pm25)} µg/m³`,
    `🌬️ ICA: ${displayValue(values.aqi)}`,
    `🌧️ Precipitación: ${displayValue(values.precipitation)} mm`,
    `🕒 ${formatDateTime(station.latest.timestamp)}`,
    '',
    interpretAirQuality(values.aqi, values.pm25),
  ]
  if (footer) {
    lines.push('', '💡 Escribe "a" para ver otras estaciones o "hola" para el menú principal.')
  }
  return lines.join('\n')
}

const findStationByName = (stations: readonly StationSummary[], name: string) => {
  const needle = normalizeText(name)
  if (!needle) {
    return null
  }
  return stations.find((station) => normalizeText(station.stationName).includes(needle)) ?? null
}

/** Topic-routed canned answers used when neither the AI nor the heuristics answered. */
export const cannedAnswer = (table: ReadingTable, question: string) => {
  const q = normalizeText(question)
  const { topics } = vocabulary
  const stations = summarizeStations(table)

  if (containsAny(q, topics.counts)) {
    if (containsAny(q, topics.countStations)) {
      return `📊 Actualmente tengo *${stations.length} estaciones* monitoreando el aire y el clima.

Estas estaciones están distribuidas por la región y miden variables como temperatura, humedad, PM2.5, ICA y precipitación.

¿Te gustaría ver la lista completa? Escribe "a" 📍`
    }
    if (containsAny(q, topics.countRecords)) {
      return `📈 El sistema tiene *${formatCount(table.size)} registros* de mediciones ambientales.

Estos datos incluyen temperatura, humedad, presión, calidad del aire (PM2.5, ICA) y precipitación de todas las estaciones.

¿Quieres consultar alguna estación específica? Escribe "a" para ver la lista 📍`
    }
  }

  if (containsAny(q, topics.airQuality)) {
    const aqiValues = stations
      .map((station) => station.latest.measurements.aqi)
      .filter((value): value is number => value !== undefined)
    const average = mean(aqiValues)
    if (average !== null) {
      return `🌬️ *Estado actual de la calidad del aire:*

• ICA promedio: *${formatDecimal(average, 1)}*
• ${interpretAirQuality(average, null)}
• Estaciones monitoreando: *${stations.length}*

Para ver datos específicos de una estación, escribe "a" 📍
Para aprender sobre calidad del aire, escribe "b" 📘`
    }
    return `🌬️ La calidad del aire se mide principalmente con:

• *PM2.5*: Partículas finas que afectan la salud
• *ICA*: Índice que resume la calidad (0-500)
• *PM10*: Partículas más grandes pero también importantes

¿Quieres ver datos actuales? Escribe "a" para estaciones 📍
¿Quieres aprender más? Escribe "b" para conceptos 📘`
  }

  if (containsAny(q, topics.climate)) {
    return `🌡️ Monitoreo las siguientes variables climáticas:

• *Temperatura*: En grados Celsius
• *Humedad*: Porcentaje de vapor de agua
• *Precipitación*: Lluvia en milímetros
• *Presión*: Atmosférica en hPa
• *Viento*: Velocidad y dirección

¿Quieres ver datos actuales? Escribe "a" para estaciones 📍
¿Quieres aprender sobre estas variables? Escribe "b" 📘`
  }

  if (containsAny(q, topics.location)) {
    const box = geographicCoverage(table).boundingBox
    const latitude = box ? `${box.south} a ${box.north}` : 'N/A'
    const longitude = box ? `${box.west} a ${box.east}` : 'N/A'
    return `📍 *Cobertura geográfica del sistema:*

• Latitud: ${latitude}
• Longitud: ${longitude}
• Estaciones distribuidas por la región

¿Quieres ver la lista completa de estaciones? Escribe "a" 📍`
  }

  return `🤔 Interesante pregunta sobre "${question}".

Puedo ayudarte con:
• 📍 Datos de *${stations.length} estaciones* (escribe "a")
• 📘 Conceptos sobre *aire y clima* (escribe "b")
• 🌡️ Mediciones de *temperatura, humedad, PM2.5, ICA*
• 📊 Estadísticas del sistema

¿Qué te gustaría explorar?`
}

const answerOpenQuestion = async ({ table, ai }: ComposerDeps, question: string) => {
  if (!isRelevantQuestion(question)) {
    return outOfScopeReply(question)
  }

  if (ai.configured) {
    const result = await ai.complete(openQuestionPrompt(buildContextBlock(table), question), {
      requestName: 'open question',
    })
    if (result.ok && result.text) {
      return result.text
    }
    log.warn('[Chat] Open question fell back to heuristics.')
  }

  return tryAnswer(table, question) ?? cannedAnswer(table, question)
}

/** Daily means of one variable over the last `days` days of the station's data. */
const renderTimeSeries = (
  table: ReadingTable,
  intent: Extract<ResolvedIntent, { kind: 'time_series_request' }>,
) => {
  const fallback = `📈 Las series históricas están disponibles a través de la API.
Para datos detallados de ${intent.variable ?? 'variables'} en ${intent.station ?? 'estaciones'}, usa /api/stations/timeseries o pregúntame por el estado actual.`

  const key = intent.variable ? resolveVariableKey(intent.variable) : null
  const station = intent.station
    ? findStationByName(summarizeStations(table), intent.station)
    : null
  if (!key || !station) {
    return fallback
  }

  const end = new Date(station.dateRange.end).getTime()
  const start = end - intent.days * 86_400_000
  const perDay = new Map<string, number[]>()
  for (const reading of table.rows) {
    const time = reading.timestamp.getTime()
    const value = reading.values[key]
    if (reading.stationId !== station.stationId || time <= start || time > end || value === null) {
      continue
    }
    const day = reading.timestamp.toISOString().slice(0, 10)
    const values = perDay.get(day)
    if (values) {
      values.push(value)
    } else {
      perDay.set(day, [value])
    }
  }

  const descriptor = VARIABLES[key]
  if (!perDay.size) {
    return `No hay datos de ${descriptor.label} para ${station.stationName} en los últimos ${intent.days} días.`
  }

  const lines = [...perDay.entries()]
    .sort(([left], [right]) => left.localeCompare(right))
    .map(([day, values]) => `• ${formatDate(`${day}T00:00:00Z`)}: ${round2(mean(values) ?? 0)} ${descriptor.unit}`)

  return `📈 *${descriptor.label} en ${station.stationName}* (promedio diario, últimos ${intent.days} días)
${lines.join('\n')}`
}

/** Renders one resolved intent and returns the context for the next turn. */
export const composeResponse = async (
  intent: ResolvedIntent,
  context: ChatContext,
  deps: ComposerDeps,
): Promise<ChatReply> => {
  const { table } = deps

  switch (intent.kind) {
    case 'greeting': {
      const random = deps.random ?? Math.random
      const index = Math.min(Math.floor(random() * GREETINGS.length), GREETINGS.length - 1)
      return { text: `${GREETINGS[index]}\n${MAIN_MENU}`, context: NONE }
    }

    case 'list_stations': {
      const stations = summarizeStations(table)
      if (!stations.length) {
        return { text: 'No hay estaciones disponibles en este momento.', context }
      }
      const list = stations.map((station, index) => `${index + 1}. ${station.stationName}`).join('\n')
      return {
        text: `📍 *Estaciones disponibles:*
${list}

💡 *Escribe el número de la estación* que quieres consultar (ejemplo: 1, 2, 3...)`,
        context: { lastMenu: 'stations' },
      }
    }

    case 'show_concept': {
      if (!intent.variable) {
        return { text: CONCEPT_MENU, context: { lastMenu: 'concepts' } }
      }
      const concept = lookupConcept(intent.variable)
      if (!concept) {
        return { text: unknownConceptMessage(intent.variable), context }
      }
      return { text: CONCEPTS[concept], context: NONE }
    }

    case 'concept_by_letter': {
      const concept = Object.hasOwn(CONCEPT_LETTERS, intent.letter)
        ? CONCEPT_LETTERS[intent.letter]
        : null
      if (!concept) {
        return {
          text: 'Letra fuera de rango. Escribe una letra de A a F.\n\nEscribe "b" para ver la lista de conceptos nuevamente.',
          context,
        }
      }
      return {
        text: `${CONCEPTS[concept]}\n\n💡 Escribe "b" para ver otros conceptos o "hola" para el menú principal.`,
        context: NONE,
      }
    }

    case 'station_status': {
      const stations = summarizeStations(table)
      if (intent.by === 'number') {
        if (intent.number < 1 || intent.number > stations.length) {
          return {
            text: `Número fuera de rango. Escribe un número del 1 al ${stations.length}.\n\nEscribe "a" para ver la lista de estaciones nuevamente.`,
            context,
          }
        }
        return { text: renderStationStatus(stations[intent.number - 1], true), context: NONE }
      }

      const station = findStationByName(stations, intent.name)
      if (station) {
        return { text: renderStationStatus(station, false), context: NONE }
      }
      return {
        text:
          tryAnswer(table, intent.name) ??
          `No encontré la estación "${intent.name}". Escribe "a" para ver las disponibles.`,
        context,
      }
    }

    case 'general_info': {
      const stations = summarizeStations(table)
      return {
        text: `📊 Información del sistema:
• *${stations.length} estaciones activas*
• *${formatCount(table.size)} registros de datos*
• Variables: temperatura, humedad, presión, PM, ICA, precipitación
• Cobertura: ${temporalCoverage(table).totalDays} días

Puedes escribir "a" para ver la lista completa.`,
        context,
      }
    }

    case 'time_series_request':
      return { text: renderTimeSeries(table, intent), context }

    case 'open_question':
      return { text: await answerOpenQuestion(deps, intent.text), context }

    case 'unknown':
      return { text: tryAnswer(table, intent.text) ?? DEFAULT_REPLY, context }
  }
}
