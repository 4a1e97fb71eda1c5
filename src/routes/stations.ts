import { Router, type Request } from 'express'
import { z } from 'zod'
import { log } from '../services/log.js'
import type { ReadingStore } from '../services/readings.js'
import {
  airlinkStations,
  animationFrames,
  averagesForDate,
  canonicalStations,
  dataSummary,
  detailedData,
  listStations,
  mapSnapshot,
  parseDateTime,
  parseDay,
  parseInterval,
  stationAverages,
  stationReadings,
  timeSeries,
} from '../services/stations.js'
import {
  DEFAULT_AVERAGE_VARIABLES,
  parseVariableList,
  resolveVariableKey,
  VARIABLES,
} from '../services/variables.js'

const DEFAULT_SERIES_VARIABLES = ['temperature', 'humidity', 'pressure', 'pm25', 'aqi', 'precipitation']
const DEFAULT_AVERAGE_COLUMNS = DEFAULT_AVERAGE_VARIABLES.map((key) => VARIABLES[key].column)

const dateTimeString = z.string().transform((value, ctx) => {
  const parsed = parseDateTime(value)
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date "${value}".` })
    return z.NEVER
  }
  return parsed
})

const animationSchema = z.object({
  startDate: dateTimeString.optional(),
  endDate: dateTimeString.optional(),
  timeInterval: z.string().default('1H'),
  variable: z.string().default('temperature'),
})

const timeSeriesSchema = z.object({
  stationIds: z.array(z.number().int()).optional(),
  startDate: dateTimeString.optional(),
  endDate: dateTimeString.optional(),
  variables: z.array(z.string().min(1)).min(1).default(DEFAULT_SERIES_VARIABLES),
})

const readQuery = (req: Request, name: string) =>
  typeof req.query[name] === 'string' ? String(req.query[name]) : undefined

const readStationId = (req: Request) => {
  const raw = req.params.id
  return /^-?\d+$/.test(raw) ? Number(raw) : null
}

const issueMessage = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')

export const createStationsRouter = (store: ReadingStore) => {
  const router = Router()

  router.get('/', async (_req, res) => {
    try {
      const table = await store.load()
      return res.json(listStations(table))
    } catch (error) {
      log.error('[Stations] Failed to list stations:', error)
      return res.status(500).json({ error: 'Failed to load stations.' })
    }
  })

  router.get('/airlink', async (_req, res) => {
    try {
      const stations = airlinkStations(await store.load())
      if (!stations.length) {
        log.warn('[Stations] No AirLink-only stations found.')
      }
      return res.json({ totalStations: stations.length, stations })
    } catch (error) {
      log.error('[Stations] Failed to list AirLink stations:', error)
      return res.status(500).json({ error: 'Failed to load AirLink stations.' })
    }
  })

  router.get('/summary', async (_req, res) => {
    try {
      const stations = canonicalStations(await store.load())
      return res.json({ totalStations: stations.length, stations })
    } catch (error) {
      log.error('[Stations] Failed to summarize stations:', error)
      return res.status(500).json({ error: 'Failed to load stations.' })
    }
  })

  router.get('/summary/data', async (_req, res) => {
    try {
      return res.json(dataSummary(await store.load()))
    } catch (error) {
      log.error('[Stations] Failed to build data summary:', error)
      return res.status(500).json({ error: 'Failed to build data summary.' })
    }
  })

  router.get('/averages', async (req, res) => {
    const rawDate = readQuery(req, 'date')
    const day = parseDay(rawDate)
    if (!day) {
      return res.status(400).json({ error: `Invalid date "${rawDate ?? ''}". Use YYYY-MM-DD.` })
    }
    const variables = parseVariableList(readQuery(req, 'variables')) ?? DEFAULT_AVERAGE_COLUMNS

    try {
      const result = averagesForDate(await store.load(), day, variables)
      log.info(
        `[Stations] Averages for ${day.date}: ${result.stationsWithData}/${result.totalStations} stations with data.`,
      )
      return res.json(result)
    } catch (error) {
      log.error('[Stations] Failed to compute daily averages:', error)
      return res.status(500).json({ error: 'Failed to compute daily averages.' })
    }
  })

  router.get('/map/snapshot', async (req, res) => {
    const rawTimestamp = readQuery(req, 'timestamp')
    const at = parseDateTime(rawTimestamp)
    if (!at) {
      return res.status(400).json({ error: `Invalid timestamp "${rawTimestamp ?? ''}".` })
    }

    const rawTolerance = readQuery(req, 'toleranceMinutes')
    const tolerance = rawTolerance === undefined ? 30 : Number(rawTolerance)
    if (!Number.isInteger(tolerance) || tolerance < 0) {
      return res.status(400).json({ error: 'toleranceMinutes must be a non-negative integer.' })
    }

    try {
      return res.json(mapSnapshot(await store.load(), at, tolerance))
    } catch (error) {
      log.error('[Stations] Failed to build map snapshot:', error)
      return res.status(500).json({ error: 'Failed to build map snapshot.' })
    }
  })

  router.post('/map/animation', async (req, res) => {
    const parsed = animationSchema.safeParse(req.body ?? {})
    if (!parsed.success) {
      return res.status(400).json({ error: issueMessage(parsed.error) })
    }

    const { startDate, endDate, timeInterval, variable } = parsed.data
    const intervalMs = parseInterval(timeInterval)
    if (!intervalMs) {
      return res.status(400).json({ error: `Invalid time interval "${timeInterval}".` })
    }
    const key = resolveVariableKey(variable)
    if (!key) {
      return res.status(400).json({ error: `Unknown variable "${variable}".` })
    }

    try {
      const table = await store.load()
      return res.json(
        animationFrames(table, {
          start: startDate,
          end: endDate,
          intervalMs,
          interval: timeInterval,
          variable: key,
        }),
      )
    } catch (error) {
      log.error('[Stations] Failed to build animation frames:', error)
      return res.status(500).json({ error: 'Failed to build animation frames.' })
    }
  })

  router.post('/timeseries', async (req, res) => {
    const parsed = timeSeriesSchema.safeParse(req.body ?? {})
    if (!parsed.success) {
      return res.status(400).json({ error: issueMessage(parsed.error) })
    }

    const { stationIds, startDate, endDate, variables } = parsed.data
    try {
      const table = await store.load()
      return res.json(timeSeries(table, { stationIds, start: startDate, end: endDate, variables }))
    } catch (error) {
      log.error('[Stations] Failed to build time series:', error)
      return res.status(500).json({ error: 'Failed to build time series.' })
    }
  })

  router.get('/:id', async (req, res) => {
    const stationId = readStationId(req)
    if (stationId === null) {
      return res.status(400).json({ error: 'Station id must be an integer.' })
    }

    const rawStart = readQuery(req, 'startDate')
    const rawEnd = readQuery(req, 'endDate')
    const start = rawStart === undefined ? undefined : parseDateTime(rawStart)
    const end = rawEnd === undefined ? undefined : parseDateTime(rawEnd)
    if (start === null || end === null) {
      return res.status(400).json({ error: 'startDate and endDate must be ISO dates.' })
    }

    try {
      const readings = stationReadings(await store.load(), stationId, start, end)
      if (!readings.length) {
        return res.status(404).json({ error: 'Station not found.' })
      }
      return res.json(readings)
    } catch (error) {
      log.error(`[Stations] Failed to load readings for station ${stationId}:`, error)
      return res.status(500).json({ error: 'Failed to load station readings.' })
    }
  })

  router.get('/:id/averages', async (req, res) => {
    const stationId = readStationId(req)
    if (stationId === null) {
      return res.status(400).json({ error: 'Station id must be an integer.' })
    }
    const rawDate = readQuery(req, 'date')
    const day = parseDay(rawDate)
    if (!day) {
      return res.status(400).json({ error: `Invalid date "${rawDate ?? ''}". Use YYYY-MM-DD.` })
    }
    const variables = parseVariableList(readQuery(req, 'variables')) ?? DEFAULT_AVERAGE_COLUMNS

    try {
      const result = stationAverages(await store.load(), stationId, day, variables)
      log.info(`[Stations] Station ${stationId} on ${day.date}: ${result.recordCount} records.`)
      return res.json(result)
    } catch (error) {
      log.error(`[Stations] Failed to compute averages for station ${stationId}:`, error)
      return res.status(500).json({ error: 'Failed to compute station averages.' })
    }
  })

  router.get('/:id/detailed-data', async (req, res) => {
    const stationId = readStationId(req)
    if (stationId === null) {
      return res.status(400).json({ error: 'Station id must be an integer.' })
    }
    const rawDate = readQuery(req, 'date')
    const day = parseDay(rawDate)
    if (!day) {
      return res.status(400).json({ error: `Invalid date "${rawDate ?? ''}". Use YYYY-MM-DD.` })
    }

    try {
      const data = detailedData(await store.load(), stationId, day)
      if (!data.totalMeasurements) {
        log.warn(`[Stations] No readings for station ${stationId} on ${day.date}.`)
      }
      return res.json({ success: true, data })
    } catch (error) {
      log.error(`[Stations] Failed to load detailed data for station ${stationId}:`, error)
      return res.status(500).json({ error: 'Failed to load detailed data.' })
    }
  })

  return router
}
