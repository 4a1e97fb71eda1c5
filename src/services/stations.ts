import { parseTimestamp, type Reading, type ReadingTable } from './readings.js'
import { mean, minMax, round2, roundOrNull } from './stats.js'
import { mapVariables, resolveVariableKey, type VariableKey } from './variables.js'

export type StationInfo = {
  stationId: number
  stationName: string
  equipmentType: string
  lat: number
  lon: number
}

export type DayRange = {
  date: string
  start: Date
  end: Date
}

export type VariableStat = {
  average: number
  min: number
  max: number
  count: number
}

/** Daily means under the field names the map client reads. */
export type MapAverages = {
  temp: number | null
  hum: number | null
  pm_1p0: number | null
  pm_2p5: number | null
  pm_10p0: number | null
  ica: number | null
  precipitacion: number | null
  ts: null
}

export type StationDailyAverages = StationInfo & {
  recordCount: number
  averages: Record<string, VariableStat | null>
  data: MapAverages
}

export type DailyAverages = {
  date: string
  totalStations: number
  stationsWithData: number
  variables: string[]
  stations: StationDailyAverages[]
}

export type StationAveragesResult =
  | {
      stationId: number
      date: string
      recordCount: number
      averages: Record<string, VariableStat | null>
    }
  | {
      stationId: number
      date: string
      recordCount: 0
      averages: null
      message: string
    }

export type ReadingJson = StationInfo & {
  timestamp: string
  values: Record<VariableKey, number | null>
  imputed: Record<VariableKey, boolean>
}

export type MapPoint = {
  stationId: number
  stationName: string
  lat: number
  lon: number
  timestamp: string
  temperature: number | null
  humidity: number | null
  pressure: number | null
  pm25: number | null
  aqi: number | null
  precipitation: number | null
}

export type FramePoint = {
  stationId: number
  stationName: string
  lat: number
  lon: number
  value: number | null
}

export type AnimationQuery = {
  start?: Date
  end?: Date
  intervalMs: number
  interval: string
  variable: VariableKey
}

export type AnimationResult = {
  variable: VariableKey
  interval: string
  frames: Record<string, FramePoint[]>
  timestamps: string[]
}

export type TimeSeriesQuery = {
  stationIds?: number[]
  start?: Date
  end?: Date
  variables: string[]
}

export type TimeSeriesRecord = {
  timestamp: string
  stationId: number
  stationName: string
} & Partial<Record<VariableKey, number | null>>

export type DataSummary = {
  totalRecords: number
  stationsCount: number
  dateRange: { start: string; end: string } | null
  variables: Record<
    VariableKey,
    { available: number; min: number | null; max: number | null; mean: number | null }
  >
}

export type DetailedMeasurement = { timestamp: number } & Record<VariableKey, number | null>

export type DetailedData = {
  stationId: number
  stationName: string | null
  date: string
  totalMeasurements: number
  measurements: DetailedMeasurement[]
}

type BucketEntry = { first: Reading; values: number[] }

const EQUIPMENT_PRIORITY: Record<string, number> = {
  'VUE+AIR': 1,
  PRO: 2,
  AIR: 3,
}

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/
const INTERVAL_PATTERN = /^(\d+)\s*(min|h|d)$/i
const UNIT_MS: Record<string, number> = {
  min: 60_000,
  h: 3_600_000,
  d: 86_400_000,
}

export const NO_STATION_DATA_MESSAGE =
  'No hay datos disponibles para esta estación en la fecha especificada'

const equipmentRank = (equipmentType: string) => EQUIPMENT_PRIORITY[equipmentType] ?? 999

/** `YYYY-MM-DD` to the closed UTC range of that day, or `null` when the date does not exist. */
export const parseDay = (raw: string | undefined): DayRange | null => {
  const match = ISO_DAY.exec(String(raw ?? '').trim())
  if (!match) {
    return null
  }

  const [, year, month, day] = match
  const start = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
  if (Number.isNaN(start.getTime()) || start.toISOString().slice(0, 10) !== match[0]) {
    return null
  }

  return {
    date: match[0],
    start,
    end: new Date(start.getTime() + UNIT_MS.d - 1),
  }
}

/** A day (midnight UTC) or a date-time; date-times without an offset are UTC. */
export const parseDateTime = (raw: string | undefined): Date | null => {
  const trimmed = String(raw ?? '').trim()
  if (ISO_DAY.test(trimmed)) {
    return parseDay(trimmed)?.start ?? null
  }
  return parseTimestamp(trimmed)
}

export const parseInterval = (raw: string | undefined) => {
  const match = INTERVAL_PATTERN.exec(String(raw ?? '').trim())
  if (!match) {
    return null
  }
  const amount = Number(match[1])
  if (amount <= 0) {
    return null
  }
  return amount * UNIT_MS[match[2].toLowerCase()]
}

export const toStationInfo = (reading: Reading): StationInfo => ({
  stationId: reading.stationId,
  stationName: reading.stationName,
  equipmentType: reading.equipmentType,
  lat: reading.lat,
  lon: reading.lon,
})

/** First row of the best-ranked equipment type. */
export const pickCanonical = (rows: readonly Reading[]): Reading | null => {
  let best: Reading | null = null
  for (const row of rows) {
    if (!best || equipmentRank(row.equipmentType) < equipmentRank(best.equipmentType)) {
      best = row
    }
  }
  return best
}

export const inRange = (reading: Reading, start?: Date, end?: Date) => {
  const time = reading.timestamp.getTime()
  if (start && time < start.getTime()) {
    return false
  }
  if (end && time > end.getTime()) {
    return false
  }
  return true
}

const byTime = (left: Reading, right: Reading) =>
  left.timestamp.getTime() - right.timestamp.getTime()

export const variableStat = (values: readonly number[]): VariableStat | null => {
  const average = mean(values)
  const bounds = minMax(values)
  if (average === null || bounds === null) {
    return null
  }
  return {
    average: round2(average),
    min: round2(bounds.min),
    max: round2(bounds.max),
    count: values.length,
  }
}

export const toReadingJson = (reading: Reading): ReadingJson => ({
  ...toStationInfo(reading),
  timestamp: reading.timestamp.toISOString(),
  values: mapVariables((key) => reading.values[key]),
  imputed: mapVariables((key) => reading.imputed[key]),
})

export const averagesForDate = (
  table: ReadingTable,
  day: DayRange,
  variables: readonly string[],
  stationId?: number,
): DailyAverages => {
  const daily = table.filter(
    (reading) =>
      inRange(reading, day.start, day.end) &&
      (stationId === undefined || reading.stationId === stationId),
  )

  const stations: StationDailyAverages[] = []
  for (const group of daily.groupByStation().values()) {
    const canonical = pickCanonical(group.rows)
    if (!canonical) {
      continue
    }

    const averages: Record<string, VariableStat | null> = {}
    const byKey: Partial<Record<VariableKey, VariableStat | null>> = {}
    for (const name of variables) {
      const key = resolveVariableKey(name)
      const stat = key ? variableStat(group.values(key)) : null
      averages[name] = stat
      if (key) {
        byKey[key] = stat
      }
    }

    stations.push({
      ...toStationInfo(canonical),
      recordCount: group.size,
      averages,
      data: {
        temp: byKey.temperature?.average ?? null,
        hum: byKey.humidity?.average ?? null,
        pm_1p0: byKey.pm1?.average ?? null,
        pm_2p5: byKey.pm25?.average ?? null,
        pm_10p0: byKey.pm10?.average ?? null,
        ica: byKey.aqi?.average ?? null,
        precipitacion: byKey.precipitation?.average ?? null,
        ts: null,
      },
    })
  }

  return {
    date: day.date,
    totalStations: stations.length,
    // every station with readings that day, even when no requested variable has samples
    stationsWithData: stations.length,
    variables: [...variables],
    stations,
  }
}

export const stationAverages = (
  table: ReadingTable,
  stationId: number,
  day: DayRange,
  variables: readonly string[],
): StationAveragesResult => {
  const [station] = averagesForDate(table, day, variables, stationId).stations
  if (!station) {
    return {
      stationId,
      date: day.date,
      recordCount: 0,
      averages: null,
      message: NO_STATION_DATA_MESSAGE,
    }
  }
  return {
    stationId,
    date: day.date,
    recordCount: station.recordCount,
    averages: station.averages,
  }
}

/** One entry per station id, ranked VUE+AIR > PRO > AIR > other, sorted by id. */
export const canonicalStations = (table: ReadingTable): StationInfo[] => {
  const stations: StationInfo[] = []
  for (const group of table.groupByStation().values()) {
    const canonical = pickCanonical(group.rows)
    if (canonical) {
      stations.push(toStationInfo(canonical))
    }
  }
  return stations
}

/** Every distinct (id, name, type, position) combination, sorted by id. */
export const listStations = (table: ReadingTable): StationInfo[] => {
  const seen = new Set<string>()
  const stations: StationInfo[] = []
  for (const reading of table.rows) {
    const info = toStationInfo(reading)
    const identity = JSON.stringify(info)
    if (!seen.has(identity)) {
      seen.add(identity)
      stations.push(info)
    }
  }
  return stations.sort((left, right) => left.stationId - right.stationId)
}

/** Stations reported with AIR equipment and never with VUE+AIR. */
export const airlinkStations = (table: ReadingTable): StationInfo[] => {
  const stations: StationInfo[] = []
  for (const group of table.groupByStation().values()) {
    if (group.rows.some((reading) => reading.equipmentType === 'VUE+AIR')) {
      continue
    }
    const airRow = group.rows.find((reading) => reading.equipmentType === 'AIR')
    if (airRow) {
      stations.push(toStationInfo(airRow))
    }
  }
  return stations
}

export const stationReadings = (
  table: ReadingTable,
  stationId: number,
  start?: Date,
  end?: Date,
): ReadingJson[] =>
  table.rows
    .filter((reading) => reading.stationId === stationId && inRange(reading, start, end))
    .sort(byTime)
    .map(toReadingJson)

export const mapSnapshot = (
  table: ReadingTable,
  at: Date,
  toleranceMinutes = 30,
): MapPoint[] => {
  const toleranceMs = toleranceMinutes * UNIT_MS.min
  const window = table.filter(
    (reading) => Math.abs(reading.timestamp.getTime() - at.getTime()) <= toleranceMs,
  )

  const points: MapPoint[] = []
  for (const group of window.groupByStation().values()) {
    let closest: Reading | null = null
    let closestDiff = Number.POSITIVE_INFINITY
    for (const reading of group.rows) {
      const diff = Math.abs(reading.timestamp.getTime() - at.getTime())
      if (diff < closestDiff) {
        closest = reading
        closestDiff = diff
      }
    }
    if (!closest) {
      continue
    }

    points.push({
      stationId: closest.stationId,
      stationName: closest.stationName,
      lat: closest.lat,
      lon: closest.lon,
      timestamp: closest.timestamp.toISOString(),
      temperature: closest.values.temperature,
      humidity: closest.values.humidity,
      pressure: closest.values.pressure,
      pm25: closest.values.pm25,
      aqi: closest.values.aqi,
      precipitation: closest.values.precipitation,
    })
  }
  return points
}

/** Per-station means over fixed buckets aligned to the epoch; empty buckets are skipped. */
export const animationFrames = (table: ReadingTable, query: AnimationQuery): AnimationResult => {
  const scoped = table.filter((reading) => inRange(reading, query.start, query.end))
  const buckets = new Map<number, Map<number, BucketEntry>>()

  for (const reading of scoped.rows) {
    const bucket =
      Math.floor(reading.timestamp.getTime() / query.intervalMs) * query.intervalMs
    const stations = buckets.get(bucket) ?? new Map<number, BucketEntry>()
    buckets.set(bucket, stations)

    const entry = stations.get(reading.stationId) ?? { first: reading, values: [] }
    stations.set(reading.stationId, entry)

    const value = reading.values[query.variable]
    if (value !== null) {
      entry.values.push(value)
    }
  }

  const frames: Record<string, FramePoint[]> = {}
  const ordered = [...buckets.entries()].sort(([left], [right]) => left - right)
  for (const [bucket, stations] of ordered) {
    frames[new Date(bucket).toISOString()] = [...stations.entries()]
      .sort(([left], [right]) => left - right)
      .map(([stationId, { first, values }]) => ({
        stationId,
        stationName: first.stationName,
        lat: first.lat,
        lon: first.lon,
        value: roundOrNull(mean(values)),
      }))
  }

  return {
    variable: query.variable,
    interval: query.interval,
    frames,
    timestamps: Object.keys(frames),
  }
}

export const timeSeries = (table: ReadingTable, query: TimeSeriesQuery) => {
  const stationFilter = query.stationIds?.length ? new Set(query.stationIds) : null
  const keys = query.variables
    .map(resolveVariableKey)
    .filter((key): key is VariableKey => key !== null)

  const data: TimeSeriesRecord[] = table.rows
    .filter(
      (reading) =>
        (!stationFilter || stationFilter.has(reading.stationId)) &&
        inRange(reading, query.start, query.end),
    )
    .sort(byTime)
    .map((reading) => {
      const record: TimeSeriesRecord = {
        timestamp: reading.timestamp.toISOString(),
        stationId: reading.stationId,
        stationName: reading.stationName,
      }
      for (const key of keys) {
        record[key] = reading.values[key]
      }
      return record
    })

  return {
    data,
    variables: [...query.variables],
    totalRecords: data.length,
  }
}

export const dataSummary = (table: ReadingTable): DataSummary => {
  const times = table.rows.map((reading) => reading.timestamp.getTime())
  const range = minMax(times)

  return {
    totalRecords: table.size,
    stationsCount: new Set(table.rows.map((reading) => reading.stationId)).size,
    dateRange: range
      ? {
          start: new Date(range.min).toISOString(),
          end: new Date(range.max).toISOString(),
        }
      : null,
    variables: mapVariables((key) => {
      const values = table.values(key)
      const bounds = minMax(values)
      return {
        available: values.length,
        min: bounds?.min ?? null,
        max: bounds?.max ?? null,
        mean: roundOrNull(mean(values)),
      }
    }),
  }
}

export const detailedData = (
  table: ReadingTable,
  stationId: number,
  day: DayRange,
): DetailedData => {
  const rows = table.rows
    .filter((reading) => reading.stationId === stationId && inRange(reading, day.start, day.end))
    .sort(byTime)

  return {
    stationId,
    stationName: rows.length ? rows[0].stationName : null,
    date: day.date,
    totalMeasurements: rows.length,
    measurements: rows.map((reading) => ({
      timestamp: reading.timestamp.getTime(),
      ...mapVariables((key) => roundOrNull(reading.values[key])),
    })),
  }
}
