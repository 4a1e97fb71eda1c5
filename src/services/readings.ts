import { readFile } from 'node:fs/promises'
import { parse } from 'csv-parse/sync'
import { log } from './log.js'
import { mapVariables, VARIABLES, type VariableKey } from './variables.js'

export type Measurements = Readonly<Record<VariableKey, number | null>>
export type ImputedFlags = Readonly<Record<VariableKey, boolean>>

export type Reading = Readonly<{
  timestamp: Date
  stationId: number
  stationName: string
  equipmentType: string
  lat: number
  lon: number
  values: Measurements
  imputed: ImputedFlags
}>

export type ReadingTable = {
  readonly rows: readonly Reading[]
  readonly size: number
  filter: (predicate: (reading: Reading) => boolean) => ReadingTable
  groupByStation: () => Map<number, ReadingTable>
  column: (key: VariableKey) => Array<number | null>
  values: (key: VariableKey) => number[]
}

export type ReadingStore = {
  readonly source: string
  load: () => Promise<ReadingTable>
  isLoaded: () => boolean
}

type CsvRecord = Record<string, string>

const MISSING_TOKENS = new Set(['', 'na', 'nan', 'null', 'none'])
const TRUE_TOKENS = new Set(['true', '1', 'yes', 'y'])
const OFFSET_SUFFIX = /(z|[+-]\d{2}(:?\d{2})?)$/i

export const createReadingTable = (rows: readonly Reading[]): ReadingTable => ({
  rows,
  size: rows.length,
  filter: (predicate) => createReadingTable(rows.filter(predicate)),
  groupByStation: () => {
    const groups = new Map<number, Reading[]>()
    for (const row of rows) {
      const bucket = groups.get(row.stationId)
      if (bucket) {
        bucket.push(row)
      } else {
        groups.set(row.stationId, [row])
      }
    }

    const ordered = new Map<number, ReadingTable>()
    for (const stationId of [...groups.keys()].sort((left, right) => left - right)) {
      ordered.set(stationId, createReadingTable(groups.get(stationId) ?? []))
    }
    return ordered
  },
  column: (key) => rows.map((row) => row.values[key]),
  values: (key) => {
    const present: number[] = []
    for (const row of rows) {
      const value = row.values[key]
      if (value !== null) {
        present.push(value)
      }
    }
    return present
  },
})

export const parseMeasurement = (raw: string | undefined): number | null => {
  if (raw === undefined) {
    return null
  }

  const trimmed = raw.trim()
  if (MISSING_TOKENS.has(trimmed.toLowerCase())) {
    return null
  }

  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : null
}

export const parseImputedFlag = (raw: string | undefined): boolean =>
  TRUE_TOKENS.has(String(raw ?? '').trim().toLowerCase())

export const parseTimestamp = (raw: string | undefined): Date | null => {
  const trimmed = String(raw ?? '').trim()
  if (!trimmed) {
    return null
  }

  const isoLike = trimmed.replace(' ', 'T')
  const withZone = OFFSET_SUFFIX.test(isoLike) ? isoLike : `${isoLike}Z`
  const parsed = new Date(withZone)
  return Number.isNaN(parsed.getTime()) ? null : parsed
}

const isCsvRecord = (value: unknown): value is CsvRecord =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  Object.values(value).every((entry) => typeof entry === 'string')

const requireNumber = (record: CsvRecord, column: string, line: number) => {
  const value = parseMeasurement(record[column])
  if (value === null) {
    throw new Error(`Row ${line}: column "${column}" is missing or not numeric.`)
  }
  return value
}

const toReading = (record: CsvRecord, line: number): Reading => {
  const timestamp = parseTimestamp(record.timestamp)
  if (!timestamp) {
    throw new Error(`Row ${line}: invalid timestamp "${record.timestamp ?? ''}".`)
  }

  const stationId = requireNumber(record, 'station_id', line)
  if (!Number.isInteger(stationId)) {
    throw new Error(`Row ${line}: station_id must be an integer.`)
  }

  const values = mapVariables((key) => parseMeasurement(record[VARIABLES[key].column]))
  const imputed = mapVariables((key) => {
    const { column, hasImputedFlag } = VARIABLES[key]
    return hasImputedFlag ? parseImputedFlag(record[`${column}_imputed`]) : false
  })

  return Object.freeze({
    timestamp,
    stationId,
    stationName: record.station_name?.trim() || `Estación ${stationId}`,
    equipmentType: record.tipo_equipo?.trim() || 'UNKNOWN',
    lat: requireNumber(record, 'lat', line),
    lon: requireNumber(record, 'lon', line),
    values: Object.freeze(values),
    imputed: Object.freeze(imputed),
  })
}

export const parseReadingsCsv = (text: string): Reading[] => {
  const records: unknown = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  })

  if (!Array.isArray(records)) {
    throw new Error('CSV parser returned an unexpected payload.')
  }

  return records.map((record: unknown, index) => {
    // header is line 1
    const line = index + 2
    if (!isCsvRecord(record)) {
      throw new Error(`Row ${line}: malformed record.`)
    }
    return toReading(record, line)
  })
}

export const createReadingStore = (
  source: string,
  readText: (path: string) => Promise<string> = (path) => readFile(path, 'utf-8'),
): ReadingStore => {
  let table: ReadingTable | null = null
  let loadInFlight: Promise<ReadingTable> | null = null

  const load = async (): Promise<ReadingTable> => {
    if (table) {
      return table
    }

    if (loadInFlight) {
      return loadInFlight
    }

    loadInFlight = (async () => {
      try {
        log.info(`[Readings] Loading data from ${source}`)
        const rows = parseReadingsCsv(await readText(source))
        table = createReadingTable(rows)
        log.info(`[Readings] Loaded ${rows.length} records.`)
        return table
      } finally {
        loadInFlight = null
      }
    })()

    return loadInFlight
  }

  return {
    source,
    load,
    isLoaded: () => table !== null,
  }
}
