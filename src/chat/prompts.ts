import type { ReadingTable } from '../services/readings.js'
import type { Distribution } from '../services/stats.js'
import { mean } from '../services/stats.js'
import { globalStats, summarizeStations } from '../services/summary.js'
import { displayValue, formatCount, formatDate, formatDateTime, formatDecimal } from './text.js'

const REPRESENTATIVE_STATIONS = 8

export const classificationPrompt = (message: string) => `Eres un asistente ambiental conectado a estaciones meteorológicas.
Debes clasificar la intención de la pregunta del usuario.

Responde SIEMPRE en formato JSON con:
{
  "action": "greeting" | "list" | "status" | "series" | "concept" | "general",
  "station": "nombre o null",
  "variable": "nombre o null",
  "days": number
}

Ejemplos:
- "hola" → {"action":"greeting"}
- "ver estaciones" → {"action":"list"}
- "Halley UIS" → {"action":"status","station":"Halley UIS"}
- "PM2.5 de Halley" → {"action":"series","station":"Halley","variable":"PM2.5","days":7}
- "qué es PM2.5" → {"action":"concept","variable":"PM2.5"}
- "cuántas estaciones hay" → {"action":"general"}

Pregunta: "${message}"
`

const statLine = (distribution: Distribution | null, unit: string, digits: number) => {
  if (!distribution) {
    return '- Sin datos'
  }
  const fmt = (value: number) => `${formatDecimal(value, digits)}${unit}`
  return [
    `- Promedio: ${fmt(distribution.mean)}`,
    `- Rango: ${fmt(distribution.min)} - ${fmt(distribution.max)}`,
    `- Percentil 25: ${fmt(distribution.p25)} | Mediana: ${fmt(distribution.median)} | Percentil 75: ${fmt(distribution.p75)}`,
  ].join('\n')
}

/** System totals, per-variable statistics and the latest readings of the first stations by id. */
export const buildContextBlock = (table: ReadingTable) => {
  const stats = globalStats(table)
  const stations = summarizeStations(table)
  const range = stats.dateRange
  const coverage = range ? `${formatDate(range.start)} hasta ${formatDate(range.end)}` : 'sin datos'

  const stationLines = stations.slice(0, REPRESENTATIVE_STATIONS).map((station, index) => {
    const values = station.latest.measurements
    const recent = table.rows
      .filter((reading) => reading.stationId === station.stationId)
      .slice(-10)
      .map((reading) => reading.values.pm25)
      .filter((value): value is number => value !== null)
    const recentPm = mean(recent)

    return [
      `${index + 1}. **${station.stationName}** (ID: ${station.stationId})`,
      `   - Ubicación: Lat ${station.lat}, Lon ${station.lon}`,
      `   - Tipo: ${station.equipmentType}`,
      `   - Última medición: ${formatDateTime(station.latest.timestamp)}`,
      `   - Temp: ${displayValue(values.temperature)}°C | Humedad: ${displayValue(values.humidity)}%`,
      `   - PM2.5: ${displayValue(values.pm25)} µg/m³ | PM10: ${displayValue(values.pm10)} µg/m³`,
      `   - ICA: ${displayValue(values.aqi)} | Precipitación: ${displayValue(values.precipitation)} mm`,
      `   - Promedio reciente PM2.5: ${recentPm === null ? '—' : `${formatDecimal(recentPm, 1)} µg/m³`}`,
    ].join('\n')
  })

  return `📊 **SISTEMA DE MONITOREO AMBIENTAL**

🏢 **INFORMACIÓN GENERAL:**
- Total de estaciones activas: ${stats.totalStations}
- Registros históricos: ${formatCount(stats.totalRecords)}
- Cobertura temporal: ${coverage}
- Tipos de equipos: ${Object.keys(stats.equipmentTypes).join(', ')}

📈 **ESTADÍSTICAS HISTÓRICAS DETALLADAS:**

🌡️ **TEMPERATURA:**
${statLine(stats.variables.temperature, '°C', 1)}

💧 **HUMEDAD:**
${statLine(stats.variables.humidity, '%', 1)}

🌫️ **PARTÍCULAS PM2.5:**
${statLine(stats.variables.pm25, ' µg/m³', 1)}

🌬️ **PARTÍCULAS PM10:**
${statLine(stats.variables.pm10, ' µg/m³', 1)}

🏭 **ÍNDICE DE CALIDAD DEL AIRE (ICA):**
${statLine(stats.variables.aqi, '', 0)}

📍 **ESTACIONES REPRESENTATIVAS (Datos más recientes):**
${stationLines.join('\n')}`
}

export const openQuestionPrompt = (context: string, question: string) => `Eres un asistente especializado en datos ambientales y meteorológicos.

DATOS ACTUALES DEL SISTEMA:
${context}

INSTRUCCIONES:
- Responde la pregunta usando SOLO los datos proporcionados arriba
- Para comparaciones, analiza todos los valores disponibles
- Mantén un tono amigable y usa emojis apropiados
- Sé específico con números y nombres de estaciones
- Si no hay datos suficientes, dilo claramente
- Responde de forma concisa: máximo 150 palabras

PREGUNTA DEL USUARIO: "${question}"

RESPUESTA:`

export const explainPrompt = (context: string, question: string) => `Eres un experto meteorólogo y especialista en calidad del aire con amplio conocimiento científico.

CONTEXTO DE DATOS DISPONIBLES:
${context}

CONOCIMIENTO ESPECIALIZADO QUE DEBES APLICAR:

🌬️ **ESTÁNDARES DE CALIDAD DEL AIRE (µg/m³):**
- PM2.5: Bueno (0-12), Moderado (12.1-35.4), Insalubre para grupos sensibles (35.5-55.4), Insalubre (55.5-150.4)
- PM10: Bueno (0-54), Moderado (55-154), Insalubre para grupos sensibles (155-254), Insalubre (255-354)
- ICA: Bueno (0-50), Moderado (51-100), Insalubre para grupos sensibles (101-150), Insalubre (151-200)

🌡️ **CONDICIONES METEOROLÓGICAS:**
- Humedad: Baja (<30%), Normal (30-60%), Alta (60-80%), Muy alta (>80%)
- Temperatura: Considera efectos en dispersión de contaminantes
- Precipitación: Ayuda a limpiar el aire de partículas

INSTRUCCIONES DE RESPUESTA:
- Máximo 3-4 párrafos cortos, 150 palabras
- Números exactos y comparaciones directas
- Formato: Conclusión + Datos clave + Recomendación breve

PREGUNTA/ANÁLISIS SOLICITADO:
${question}

RESPUESTA EXPERTA:`
