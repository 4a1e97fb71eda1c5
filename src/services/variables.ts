export const VARIABLE_KEYS = [
  'temperature',
  'humidity',
  'pressure',
  'windSpeed',
  'windDirection',
  'pm1',
  'pm25',
  'pm10',
  'aqi',
  'precipitation',
] as const

export type VariableKey = (typeof VARIABLE_KEYS)[number]

export type VariableDescriptor = {
  key: VariableKey
  column: string
  label: string
  description: string
  unit: string
  validRange: { min: number; max: number }
  hasImputedFlag: boolean
  aliases: string[]
}

export const VARIABLES: Record<VariableKey, VariableDescriptor> = {
  temperature: {
    key: 'temperature',
    column: 'temp',
    label: 'Temperatura',
    description: 'Temperatura exterior',
    unit: '°C',
    validRange: { min: -10, max: 50 },
    hasImputedFlag: true,
    aliases: ['temp', 'temperatura'],
  },
  humidity: {
    key: 'humidity',
    column: 'humedad',
    label: 'Humedad',
    description: 'Humedad relativa',
    unit: '%',
    validRange: { min: 0, max: 100 },
    hasImputedFlag: true,
    aliases: ['humedad', 'hum'],
  },
  pressure: {
    key: 'pressure',
    column: 'presion',
    label: 'Presión',
    description: 'Presión atmosférica a nivel del mar',
    unit: 'hPa',
    validRange: { min: 900, max: 1100 },
    hasImputedFlag: true,
    aliases: ['presion'],
  },
  windSpeed: {
    key: 'windSpeed',
    column: 'viento_vel',
    label: 'Velocidad del viento',
    description: 'Velocidad media del viento',
    unit: 'km/h',
    validRange: { min: 0, max: 60 },
    hasImputedFlag: true,
    aliases: ['viento_vel', 'wind_speed'],
  },
  windDirection: {
    key: 'windDirection',
    column: 'viento_dir',
    label: 'Dirección del viento',
    description: 'Dirección media del viento',
    unit: 'grados',
    validRange: { min: 0, max: 360 },
    hasImputedFlag: true,
    aliases: ['viento_dir', 'wind_direction'],
  },
  pm1: {
    key: 'pm1',
    column: 'pm_1',
    label: 'PM1',
    description: 'Partículas PM1.0',
    unit: 'µg/m³',
    validRange: { min: 0, max: 500 },
    hasImputedFlag: false,
    aliases: ['pm_1', 'pm_1p0'],
  },
  pm25: {
    key: 'pm25',
    column: 'pm_2_5',
    label: 'PM2.5',
    description: 'Partículas PM2.5',
    unit: 'µg/m³',
    validRange: { min: 0, max: 500 },
    hasImputedFlag: false,
    aliases: ['pm_2_5', 'pm2.5', 'pm_2p5'],
  },
  pm10: {
    key: 'pm10',
    column: 'pm_10',
    label: 'PM10',
    description: 'Partículas PM10',
    unit: 'µg/m³',
    validRange: { min: 0, max: 500 },
    hasImputedFlag: false,
    aliases: ['pm_10', 'pm_10p0'],
  },
  aqi: {
    key: 'aqi',
    column: 'ica',
    label: 'ICA',
    description: 'Índice de Calidad del Aire (AQI)',
    unit: 'índice',
    validRange: { min: 0, max: 500 },
    hasImputedFlag: true,
    aliases: ['ica'],
  },
  precipitation: {
    key: 'precipitation',
    column: 'precipitacion',
    label: 'Precipitación',
    description: 'Precipitación acumulada',
    unit: 'mm',
    validRange: { min: 0, max: 200 },
    hasImputedFlag: true,
    aliases: ['precipitacion', 'lluvia'],
  },
}

export const DEFAULT_AVERAGE_VARIABLES: VariableKey[] = [
  'aqi',
  'humidity',
  'pm1',
  'pm25',
  'pm10',
  'temperature',
  'precipitation',
]

const lookup = new Map<string, VariableKey>()
for (const key of VARIABLE_KEYS) {
  lookup.set(key.toLowerCase(), key)
  for (const alias of VARIABLES[key].aliases) {
    lookup.set(alias.toLowerCase(), key)
  }
}

/** Accepts the API key (`pm25`), the CSV column (`pm_2_5`) or a listed alias. */
export const resolveVariableKey = (raw: string): VariableKey | null =>
  lookup.get(raw.trim().toLowerCase()) ?? null

export const parseVariableList = (raw: string | undefined): string[] | null => {
  if (raw === undefined) {
    return null
  }
  const entries = raw
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
  return entries.length ? entries : null
}

export const mapVariables = <T>(build: (key: VariableKey) => T): Record<VariableKey, T> => ({
  temperature: build('temperature'),
  humidity: build('humidity'),
  pressure: build('pressure'),
  windSpeed: build('windSpeed'),
  windDirection: build('windDirection'),
  pm1: build('pm1'),
  pm25: build('pm25'),
  pm10: build('pm10'),
  aqi: build('aqi'),
  precipitation: build('precipitation'),
})
