import { normalizeText } from './text.js'

export const CONCEPTS: Record<string, string> = {
  'pm2.5':
    '💨 *PM2.5* son partículas muy finas (menores de 2.5 micras). Pueden penetrar en los pulmones y afectar la salud. Menos de 12 µg/m³ se considera bueno, más de 55 es peligroso.',
  pm1: '💨 *PM1* son partículas ultrafinas (menores de 1 micra). Son las más peligrosas porque pueden llegar al torrente sanguíneo.',
  pm10: '💨 *PM10* son partículas inhalables (menores de 10 micras). Pueden irritar ojos, nariz y garganta.',
  humedad:
    '💧 *Humedad relativa* mide cuánto vapor de agua hay en el aire (0-100%). Alta humedad hace que el ambiente se sienta más pesado.',
  temperatura:
    '🌡️ *Temperatura* indica el calor del aire en °C. Los cambios rápidos pueden afectar la sensación térmica.',
  presion:
    '📈 *Presión atmosférica* mide el peso del aire sobre nosotros, expresada en hPa. Cambios bruscos suelen anticipar lluvia o viento.',
  ica: '🌬️ *ICA (Índice de Calidad del Aire)* es un número de 0-500 que indica qué tan contaminado está el aire. 0-50 es bueno, más de 300 es peligroso.',
  precipitacion:
    '🌧️ *Precipitación* es la cantidad de lluvia caída, medida en milímetros (mm). 1mm significa 1 litro por metro cuadrado.',
  viento:
    '💨 *Viento* incluye velocidad (km/h) y dirección (grados). Ayuda a dispersar contaminantes y afecta la sensación térmica.',
}

const CONCEPT_ALIASES: Record<string, string> = {
  pm25: 'pm2.5',
  'pm 2.5': 'pm2.5',
  'pm1.0': 'pm1',
  'pm 10': 'pm10',
  humidity: 'humedad',
  'humedad relativa': 'humedad',
  temperature: 'temperatura',
  pressure: 'presion',
  'presion atmosferica': 'presion',
  aqi: 'ica',
  precipitation: 'precipitacion',
  lluvia: 'precipitacion',
  wind: 'viento',
}

export const CONCEPT_LETTERS: Record<string, string> = {
  A: 'pm2.5',
  B: 'humedad',
  C: 'presion',
  D: 'ica',
  E: 'precipitacion',
  F: 'viento',
}

export const CONCEPT_MENU = `📘 *Modo educativo activado!*

Selecciona qué quieres aprender:
A. ¿Qué es PM2.5?
B. ¿Qué significa humedad?
C. ¿Qué es la presión atmosférica?
D. ¿Qué es el ICA?
E. ¿Qué es la precipitación?
F. ¿Qué es el viento?

💡 *Escribe la letra* de la pregunta que te interesa (ejemplo: A, B, C...)
🤔 O haz una *pregunta abierta* sobre el clima y el aire.`

const LEADING_ARTICLE = /^(el|la|los|las|the)\s+/

/** Concept key for a free-form variable name, or `null` when none matches. */
export const lookupConcept = (raw: string): string | null => {
  const normalized = normalizeText(raw).replace(LEADING_ARTICLE, '')
  if (Object.hasOwn(CONCEPTS, normalized)) {
    return normalized
  }
  return Object.hasOwn(CONCEPT_ALIASES, normalized) ? CONCEPT_ALIASES[normalized] : null
}

export const unknownConceptMessage = (variable: string) =>
  `No tengo información específica sobre "${variable}". Puedo explicarte sobre PM2.5, humedad, temperatura, presión, ICA, precipitación o viento.`

export const interpretAirQuality = (
  aqi: number | null | undefined,
  pm25: number | null | undefined,
) => {
  if (aqi !== null && aqi !== undefined) {
    if (aqi <= 50) {
      return '🌿 Aire excelente y saludable.'
    }
    if (aqi <= 100) {
      return '😊 Aire bueno, sin riesgos importantes.'
    }
    if (aqi <= 150) {
      return '⚠️ Calidad moderada, grupos sensibles deben tener precaución.'
    }
    if (aqi <= 200) {
      return '🚨 Aire no saludable, evita actividades al aire libre.'
    }
    if (aqi <= 300) {
      return '☠️ Aire muy no saludable, permanece bajo techo.'
    }
    return '🆘 Aire peligroso, emergencia de salud.'
  }

  if (pm25 !== null && pm25 !== undefined) {
    if (pm25 <= 12) {
      return '🌿 Aire limpio y saludable.'
    }
    if (pm25 <= 35) {
      return '😊 Aire moderado, sin riesgos importantes.'
    }
    if (pm25 <= 55) {
      return '⚠️ Calidad regular, evita esfuerzos intensos al aire libre.'
    }
    if (pm25 <= 150) {
      return '🚨 Aire contaminado, precaución al exponerse.'
    }
    return '☠️ Nivel muy peligroso. Permanece bajo techo.'
  }

  return '— Sin datos de calidad del aire disponibles.'
}
