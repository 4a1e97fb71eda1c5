import type { ReadingTable } from '../services/readings.js'
import { mean, minMax } from '../services/stats.js'
import { canonicalStations } from '../services/stations.js'
import { latestMeasurements } from '../services/summary.js'
import { CONCEPTS } from './concepts.js'
import { displayValue, formatCount, formatDate, formatDateTime, formatDecimal, normalizeText } from './text.js'

type PhraseAnswer = (table: ReadingTable) => string

type PatternHandler = (match: RegExpExecArray, table: ReadingTable) => string

const stationCount = (table: ReadingTable) => table.groupByStation().size

const dataRange = (table: ReadingTable) => {
  const bounds = minMax(table.rows.map((reading) => reading.timestamp.getTime()))
  if (!bounds) {
    return 'Todavía no hay datos cargados.'
  }
  return `Los datos van desde ${formatDate(new Date(bounds.min))} hasta ${formatDate(new Date(bounds.max))}.`
}

const VARIABLES_ANSWER =
  'Las estaciones miden: temperatura 🌡️, humedad 💧, presión atmosférica 📊, viento 💨, partículas PM (1.0, 2.5, 10) 🌫️, índice de calidad del aire (ICA) 🌬️ y precipitación ☔'

const PHRASES = new Map<string, PhraseAnswer>([
  ['hola', () => '¡Hola! 👋 Soy tu asistente de datos climáticos. ¿En qué puedo ayudarte?'],
  ['buenos dias', () => '¡Buenos días! ☀️ ¿Qué información climática necesitas hoy?'],
  ['buenas tardes', () => '¡Buenas tardes! 🌤️ ¿Cómo puedo ayudarte con los datos meteorológicos?'],
  [
    'cuantas estaciones hay',
    (table) => `Tenemos ${stationCount(table)} estaciones meteorológicas monitoreando la región.`,
  ],
  ['que variables miden', () => VARIABLES_ANSWER],
  ['cuantos registros hay', (table) => `Tenemos ${formatCount(table.size)} registros de mediciones en total.`],
  ['desde cuando hay datos', dataRange],
  ...Object.entries(CONCEPTS).map(([key, text]): [string, PhraseAnswer] => [`que es ${key}`, () => text]),
])

const airQualityLabel = (aqi: number) => {
  if (aqi <= 50) {
    return 'Buena 🟢'
  }
  if (aqi <= 100) {
    return 'Moderada 🟡'
  }
  if (aqi <= 150) {
    return 'Dañina para grupos sensibles 🟠'
  }
  return 'Dañina 🔴'
}

/** Mean ICA per canonical station, skipping stations without ICA readings. */
const aqiByStation = (table: ReadingTable) => {
  const stations = canonicalStations(table)
  const groups = table.groupByStation()
  const ranked: Array<{ name: string; aqi: number }> = []
  for (const station of stations) {
    const average = mean(groups.get(station.stationId)?.values('aqi') ?? [])
    if (average !== null) {
      ranked.push({ name: station.stationName, aqi: average })
    }
  }
  return ranked
}

const stationByNumber: PatternHandler = (match, table) => {
  const number = Number(match[1])
  const stations = canonicalStations(table)
  if (number < 1 || number > stations.length) {
    return `Solo tenemos ${stations.length} estaciones. Intenta con un número del 1 al ${stations.length}.`
  }

  const station = stations[number - 1]
  const group = table.filter((reading) => reading.stationId === station.stationId)
  const latest = latestMeasurements(group)
  if (!latest) {
    return 'No pude obtener información de esa estación.'
  }

  const values = latest.measurements
  return [
    `📍 **Estación ${number}: ${station.stationName}**`,
    '',
    `🌡️ Temperatura: ${displayValue(values.temperature)}°C`,
    `💧 Humedad: ${displayValue(values.humidity)}%`,
    `🌫️ PM2.5: ${displayValue(values.pm25)} µg/m³`,
    `🌬️ ICA: ${displayValue(values.aqi)}`,
    `📊 Presión: ${displayValue(values.pressure)} hPa`,
    `⏰ Última medición: ${formatDateTime(latest.timestamp)}`,
  ].join('\n')
}

const averageTemperature: PatternHandler = (_match, table) => {
  const values = table.values('temperature')
  const average = mean(values)
  const bounds = minMax(values)
  if (average === null || bounds === null) {
    return 'No hay datos de temperatura disponibles.'
  }
  return `🌡️ **Temperatura promedio**: ${formatDecimal(average, 1)}°C\n📊 Rango: ${formatDecimal(bounds.min, 1)}°C a ${formatDecimal(bounds.max, 1)}°C`
}

const averageHumidity: PatternHandler = (_match, table) => {
  const average = mean(table.values('humidity'))
  if (average === null) {
    return 'No hay datos de humedad disponibles.'
  }
  return `💧 **Humedad promedio**: ${formatDecimal(average, 1)}%`
}

const generalAirQuality: PatternHandler = (_match, table) => {
  const average = mean(table.values('aqi'))
  if (average === null) {
    return 'No hay datos de calidad del aire disponibles.'
  }
  return `🌬️ **Calidad del aire promedio**: ICA ${formatDecimal(average, 0)} - ${airQualityLabel(average)}`
}

const highestPm: PatternHandler = (_match, table) => {
  let highest: { value: number; stationId: number } | null = null
  for (const reading of table.rows) {
    const value = reading.values.pm25
    if (value !== null && (!highest || value > highest.value)) {
      highest = { value, stationId: reading.stationId }
    }
  }
  if (!highest) {
    return 'No hay datos de PM2.5 disponibles.'
  }

  const stationId = highest.stationId
  const name =
    canonicalStations(table).find((station) => station.stationId === stationId)?.stationName ??
    `Estación ${stationId}`
  return `🌫️ **PM2.5 más alto**: ${formatDecimal(highest.value, 1)} µg/m³ en la estación ${name}`
}

const bestAir: PatternHandler = (_match, table) => {
  const [best] = aqiByStation(table).sort((left, right) => left.aqi - right.aqi)
  if (!best) {
    return 'No hay datos de calidad del aire disponibles.'
  }
  return `🌬️ **Mejor calidad del aire**: ${best.name} con ICA promedio de ${formatDecimal(best.aqi, 0)}`
}

const worstAir: PatternHandler = (_match, table) => {
  const [worst] = aqiByStation(table).sort((left, right) => right.aqi - left.aqi)
  if (!worst) {
    return 'No hay datos de calidad del aire disponibles.'
  }
  return `🌬️ **Peor calidad del aire**: ${worst.name} con ICA promedio de ${formatDecimal(worst.aqi, 0)}`
}

// order matters: several patterns overlap
const PATTERNS: Array<[RegExp, PatternHandler]> = [
  [/estacion\D*(\d+)/, stationByNumber],
  [/temperatura.*promedio/, averageTemperature],
  [/humedad.*promedio/, averageHumidity],
  [/calidad.*aire/, generalAirQuality],
  [/pm.*alto/, highestPm],
  [/mejor.*aire/, bestAir],
  [/peor.*aire/, worstAir],
]

/** Direct answer from the phrase table or the first matching pattern; `null` passes to the next stage. */
export const tryAnswer = (table: ReadingTable, text: string): string | null => {
  const normalized = normalizeText(text)
  const phrase = PHRASES.get(normalized)
  if (phrase) {
    return phrase(table)
  }

  for (const [pattern, handler] of PATTERNS) {
    const match = pattern.exec(normalized)
    if (match) {
      return handler(match, table)
    }
  }

  return null
}
