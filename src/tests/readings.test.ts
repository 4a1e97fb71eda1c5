import { describe, expect, it, vi } from 'vitest'
import {
  createReadingStore,
  parseImputedFlag,
  parseMeasurement,
  parseReadingsCsv,
  parseTimestamp,
} from '../services/readings.js'
import { FIXTURE_CSV, loadFixtureTable } from './helpers.js'

describe('parseMeasurement', () => {
  it('reads numbers and maps missing tokens to null', () => {
    expect(parseMeasurement(' 12.5 ')).toBe(12.5)
    expect(parseMeasurement('NA')).toBeNull()
    expect(parseMeasurement('')).toBeNull()
    expect(parseMeasurement('abc')).toBeNull()
    expect(parseMeasurement(undefined)).toBeNull()
  })
})

describe('parseImputedFlag', () => {
  it('accepts only the truthy tokens', () => {
    expect(parseImputedFlag('TRUE')).toBe(true)
    expect(parseImputedFlag('y')).toBe(true)
    expect(parseImputedFlag('1')).toBe(true)
    expect(parseImputedFlag('FALSE')).toBe(false)
    expect(parseImputedFlag('maybe')).toBe(false)
    expect(parseImputedFlag(undefined)).toBe(false)
  })
})

describe('parseTimestamp', () => {
  it('treats timestamps without an offset as UTC', () => {
    expect(parseTimestamp('2025-03-01 08:00:00')?.toISOString()).toBe('2025-03-01T08:00:00.000Z')
  })

  it('applies explicit offsets', () => {
    expect(parseTimestamp('2025-03-01 08:00:00+00:00')?.toISOString()).toBe(
      '2025-03-01T08:00:00.000Z',
    )
    expect(parseTimestamp('2025-03-01T03:00:00-05:00')?.toISOString()).toBe(
      '2025-03-01T08:00:00.000Z',
    )
  })

  it('rejects garbage', () => {
    expect(parseTimestamp('not-a-date')).toBeNull()
    expect(parseTimestamp('')).toBeNull()
  })
})

describe('parseReadingsCsv', () => {
  it('normalizes the fixture rows', () => {
    const rows = parseReadingsCsv(FIXTURE_CSV)

    expect(rows).toHaveLength(7)
    expect(rows[0].stationName).toBe('Halley UIS')
    expect(rows[0].equipmentType).toBe('VUE+AIR')
    expect(rows[0].values.pm25).toBe(10)
    expect(rows[1].values.humidity).toBeNull()
    expect(rows[1].imputed.temperature).toBe(true)
    expect(rows[1].imputed.humidity).toBe(false)
    expect(rows[2].values.temperature).toBeNull()
    expect(rows[6].timestamp.toISOString()).toBe('2025-03-01T23:59:59.000Z')
  })

  it('fails on an unparsable timestamp', () => {
    const csv = 'timestamp,station_id,lat,lon\nnot-a-date,1,7,-73\n'
    expect(() => parseReadingsCsv(csv)).toThrow('Row 2: invalid timestamp "not-a-date".')
  })

  it('fails on a missing coordinate', () => {
    const csv = 'timestamp,station_id,lat,lon\n2025-03-01 00:00:00,1,,-73\n'
    expect(() => parseReadingsCsv(csv)).toThrow('Row 2: column "lat" is missing or not numeric.')
  })
})

describe('ReadingTable', () => {
  it('groups by station id in ascending order', () => {
    const table = loadFixtureTable()
    const groups = table.groupByStation()

    expect([...groups.keys()]).toEqual([1, 2, 3])
    expect(groups.get(1)?.size).toBe(3)
  })

  it('keeps nulls in columns and drops them in values', () => {
    const table = loadFixtureTable()

    expect(table.column('humidity')).toEqual([70, null, 66, 60, 65, 55, 58])
    expect(table.values('temperature')).toEqual([20, 24, 22, 21])
  })

  it('filters into a new table', () => {
    const table = loadFixtureTable()
    const parque = table.filter((reading) => reading.stationId === 2)

    expect(parque.size).toBe(2)
    expect(table.size).toBe(7)
  })
})

describe('createReadingStore', () => {
  it('shares one load between concurrent callers', async () => {
    const readText = vi.fn(async (_path: string) => FIXTURE_CSV)
    const store = createReadingStore('memory.csv', readText)

    expect(store.isLoaded()).toBe(false)
    const [first, second] = await Promise.all([store.load(), store.load()])

    expect(first).toBe(second)
    expect(readText).toHaveBeenCalledTimes(1)
    expect(store.isLoaded()).toBe(true)

    await store.load()
    expect(readText).toHaveBeenCalledTimes(1)
  })

  it('propagates read failures without caching a table', async () => {
    const readText = vi.fn(async (_path: string): Promise<string> => {
      throw new Error('ENOENT')
    })
    const store = createReadingStore('missing.csv', readText)

    await expect(store.load()).rejects.toThrow('ENOENT')
    expect(store.isLoaded()).toBe(false)
  })
})
