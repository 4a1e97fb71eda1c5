import type { Reading, ReadingTable } from './readings.js'
import { describe, mean, minMax, type Distribution } from './stats.js'
import { inRange, pickCanonical, toStationInfo, type StationInfo } from './stations.js'
import {
  mapVariables,
  resolveVariableKey,
  VARIABLE_KEYS,
  VARIABLES,
  type VariableKey,
} from './variables.js'

export type VariableSummary = Distribution & {
  missingCount: number
  missingPercentage: number
}

export type LatestMeasurements = {
  timestamp: string
  measurements: Partial<Record<VariableKey, number>>
}

export type StationSummary = StationInfo & {
  location: { latitude: number; longitude: number }
  totalRecords: number
  dateRange: { start: string; end: string }
  stats: Record<VariableKey, VariableSummary | null>
  dataQuality: {
    totalRecords: number
    imputed: Partial<Record<VariableKey, { imputedCount: number; imputedPercentage: number }>>
  }
  latest: LatestMeasurements
}

export type VariableInfo = {
  key: VariableKey
  column: string
  label: string
  description: string
  unit: string
  validRange: { min: number; max: number }
  stationsWithData: number
  totalMeasurements: number
  missingRecords: number
  completeness: number
  hasImputedFlag: boolean
}

export type GlobalStats = {
  totalStations: number
  totalRecords: number
  equipmentTypes: Record<string, number>
  dateRange: { start: string; end: string; daysCovered: number } | null
  completeness: Record<VariableKey, number>
  variables: Record<VariableKey, Distribution | null>
}

export type TemporalCoverage = {
  totalDays: number
  measurementsPerDay: Distribution | null
  hourlyDistribution: Record<string, number>
}

export type GeographicCoverage = {
  totalStations: number
  boundingBox: { north: number; south: number; east: number; west: number } | null
  center: { latitude: number; longitude: number } | null
}

export type SystemInfo = {
  name: string
  description: string
  version: string
  totalRecords: number
  generatedAt: string
  dataSource: string
}

export type ChatbotData = {
  systemInfo: SystemInfo
  stations: StationSummary[]
  variables: VariableInfo[]
  globalStats: GlobalStats
  temporalCoverage: TemporalCoverage
  geographicCoverage: GeographicCoverage
  contextInfo: Record<string, string>
}

export type SystemIdentity = {
  appName: string
  appVersion: string
  dataSource: string
}

export type FilteredDataQuery = {
  stationIds?: number[]
  variables?: string[]
  start?: Date
  end?: Date
  includeRawData: boolean
  maxRecords: number
}

export type FilteredRecord = {
  timestamp: string
  stationId: number
  stationName: string
  lat: number
  lon: number
} & Partial<Record<VariableKey, number | null>>

export type FilteredData = {
  totalRecords: number
  stationsCount: number
  dateRange: { start: string; end: string } | null
  variables: VariableKey[]
  data?: FilteredRecord[]
}

const DAY_MS = 86_400_000

const percentage = (part: number, whole: number) => (whole ? (part / whole) * 100 : 0)

const timeRange = (rows: readonly Reading[]) => {
  const bounds = minMax(rows.map((reading) => reading.timestamp.getTime()))
  if (!bounds) {
    return null
  }
  return {
    start: new Date(bounds.min).toISOString(),
    end: new Date(bounds.max).toISOString(),
    spanMs: bounds.max - bounds.min,
  }
}

const summarizeVariable = (table: ReadingTable, key: VariableKey): VariableSummary | null => {
  const distribution = describe(table.values(key))
  if (!distribution) {
    return null
  }
  const missingCount = table.size - distribution.count
  return {
    ...distribution,
    missingCount,
    missingPercentage: percentage(missingCount, table.size),
  }
}

/** Latest timestamp of the station plus, per variable, the most recent non-null value. */
export const latestMeasurements = (table: ReadingTable): LatestMeasurements | null => {
  const ordered = [...table.rows].sort(
    (left, right) => right.timestamp.getTime() - left.timestamp.getTime(),
  )
  if (!ordered.length) {
    return null
  }

  const measurements: Partial<Record<VariableKey, number>> = {}
  for (const key of VARIABLE_KEYS) {
    const match = ordered.find((reading) => reading.values[key] !== null)
    const value = match?.values[key]
    if (value !== undefined && value !== null) {
      measurements[key] = value
    }
  }

  return {
    timestamp: ordered[0].timestamp.toISOString(),
    measurements,
  }
}

const summarizeStation = (group: ReadingTable): StationSummary | null => {
  const canonical = pickCanonical(group.rows)
  const range = timeRange(group.rows)
  const latest = latestMeasurements(group)
  if (!canonical || !range || !latest) {
    return null
  }

  const imputed: StationSummary['dataQuality']['imputed'] = {}
  for (const key of VARIABLE_KEYS) {
    if (!VARIABLES[key].hasImputedFlag) {
      continue
    }
    const imputedCount = group.rows.filter((reading) => reading.imputed[key]).length
    imputed[key] = {
      imputedCount,
      imputedPercentage: percentage(imputedCount, group.size),
    }
  }

  return {
    ...toStationInfo(canonical),
    location: { latitude: canonical.lat, longitude: canonical.lon },
    totalRecords: group.size,
    dateRange: { start: range.start, end: range.end },
    stats: mapVariables((key) => summarizeVariable(group, key)),
    dataQuality: { totalRecords: group.size, imputed },
    latest,
  }
}

/** Canonical station summaries sorted by id, optionally restricted to `stationIds`. */
export const summarizeStations = (
  table: ReadingTable,
  stationIds?: readonly number[],
): StationSummary[] => {
  const wanted = stationIds?.length ? new Set(stationIds) : null
  const summaries: StationSummary[] = []
  for (const [stationId, group] of table.groupByStation()) {
    if (wanted && !wanted.has(stationId)) {
      continue
    }
    const summary = summarizeStation(group)
    if (summary) {
      summaries.push(summary)
    }
  }
  return summaries
}

export const describeVariables = (
  table: ReadingTable,
  keys: readonly VariableKey[] = VARIABLE_KEYS,
): VariableInfo[] =>
  keys.map((key) => {
    const descriptor = VARIABLES[key]
    const totalMeasurements = table.values(key).length
    const stationsWithData = new Set(
      table.rows.filter((reading) => reading.values[key] !== null).map((reading) => reading.stationId),
    ).size

    return {
      key,
      column: descriptor.column,
      label: descriptor.label,
      description: descriptor.description,
      unit: descriptor.unit,
      validRange: descriptor.validRange,
      stationsWithData,
      totalMeasurements,
      missingRecords: table.size - totalMeasurements,
      completeness: percentage(totalMeasurements, table.size),
      hasImputedFlag: descriptor.hasImputedFlag,
    }
  })

export const globalStats = (table: ReadingTable): GlobalStats => {
  const equipmentTypes: Record<string, number> = {}
  for (const reading of table.rows) {
    equipmentTypes[reading.equipmentType] = (equipmentTypes[reading.equipmentType] ?? 0) + 1
  }
  const range = timeRange(table.rows)

  return {
    totalStations: table.groupByStation().size,
    totalRecords: table.size,
    equipmentTypes,
    dateRange: range
      ? { start: range.start, end: range.end, daysCovered: Math.floor(range.spanMs / DAY_MS) }
      : null,
    completeness: mapVariables((key) => percentage(table.values(key).length, table.size)),
    variables: mapVariables((key) => describe(table.values(key))),
  }
}

export const temporalCoverage = (table: ReadingTable): TemporalCoverage => {
  const perDay = new Map<string, number>()
  const perHour = new Map<number, number>()
  for (const reading of table.rows) {
    const iso = reading.timestamp.toISOString()
    const day = iso.slice(0, 10)
    perDay.set(day, (perDay.get(day) ?? 0) + 1)
    const hour = reading.timestamp.getUTCHours()
    perHour.set(hour, (perHour.get(hour) ?? 0) + 1)
  }

  const hourlyDistribution: Record<string, number> = {}
  for (const hour of [...perHour.keys()].sort((left, right) => left - right)) {
    hourlyDistribution[String(hour)] = perHour.get(hour) ?? 0
  }

  return {
    totalDays: perDay.size,
    measurementsPerDay: describe([...perDay.values()]),
    hourlyDistribution,
  }
}

export const geographicCoverage = (table: ReadingTable): GeographicCoverage => {
  const stations = summarizeStations(table)
  const latitudes = stations.map((station) => station.lat)
  const longitudes = stations.map((station) => station.lon)
  const latBounds = minMax(latitudes)
  const lonBounds = minMax(longitudes)
  const latCenter = mean(latitudes)
  const lonCenter = mean(longitudes)

  return {
    totalStations: stations.length,
    boundingBox:
      latBounds && lonBounds
        ? { north: latBounds.max, south: latBounds.min, east: lonBounds.max, west: lonBounds.min }
        : null,
    center:
      latCenter !== null && lonCenter !== null
        ? { latitude: latCenter, longitude: lonCenter }
        : null,
  }
}

const contextInfo = (table: ReadingTable): Record<string, string> => {
  const range = timeRange(table.rows)
  return {
    purpose:
      'Este sistema monitorea estaciones meteorológicas con datos de calidad del aire y clima',
    dataTypes:
      'Incluye temperatura, humedad, presión, viento, partículas PM, índice de calidad del aire y precipitación',
    geographicScope: 'Red de estaciones distribuidas geográficamente',
    temporalScope: range
      ? `Datos desde ${range.start.slice(0, 10)} hasta ${range.end.slice(0, 10)}`
      : 'Sin datos cargados',
    dataQuality: 'Datos procesados con imputación de valores faltantes y limpieza de outliers',
    usageNotes: 'Los datos pueden tener valores imputados marcados con flags específicos',
  }
}

export const buildChatbotData = (
  table: ReadingTable,
  identity: SystemIdentity,
  now: Date = new Date(),
): ChatbotData => ({
  systemInfo: {
    name: identity.appName,
    description: 'Sistema de monitoreo de estaciones meteorológicas',
    version: identity.appVersion,
    totalRecords: table.size,
    generatedAt: now.toISOString(),
    dataSource: identity.dataSource,
  },
  stations: summarizeStations(table),
  variables: describeVariables(table),
  globalStats: globalStats(table),
  temporalCoverage: temporalCoverage(table),
  geographicCoverage: geographicCoverage(table),
  contextInfo: contextInfo(table),
})

/** Rows matching the query in time order, capped at the first `maxRecords`. */
export const filteredData = (table: ReadingTable, query: FilteredDataQuery): FilteredData => {
  const stationFilter = query.stationIds?.length ? new Set(query.stationIds) : null
  const keys: VariableKey[] = query.variables?.length
    ? query.variables
        .map(resolveVariableKey)
        .filter((key): key is VariableKey => key !== null)
    : [...VARIABLE_KEYS]

  const rows = table.rows
    .filter(
      (reading) =>
        (!stationFilter || stationFilter.has(reading.stationId)) &&
        inRange(reading, query.start, query.end),
    )
    .sort((left, right) => left.timestamp.getTime() - right.timestamp.getTime())
    .slice(0, Math.max(0, query.maxRecords))

  const range = timeRange(rows)
  const result: FilteredData = {
    totalRecords: rows.length,
    stationsCount: new Set(rows.map((reading) => reading.stationId)).size,
    dateRange: range ? { start: range.start, end: range.end } : null,
    variables: keys,
  }

  if (query.includeRawData) {
    result.data = rows.map((reading) => {
      const record: FilteredRecord = {
        timestamp: reading.timestamp.toISOString(),
        stationId: reading.stationId,
        stationName: reading.stationName,
        lat: reading.lat,
        lon: reading.lon,
      }
      for (const key of keys) {
        record[key] = reading.values[key]
      }
      return record
    })
  }

  return result
}
