import { Router, type Request } from 'express'
import { z } from 'zod'
import type { ChatService } from '../chat/chat-service.js'
import { INITIAL_CONTEXT, type ChatContext } from '../chat/intent.js'
import { log } from '../services/log.js'
import type { ReadingStore } from '../services/readings.js'
import { parseDateTime } from '../services/stations.js'
import {
  buildChatbotData,
  describeVariables,
  filteredData,
  summarizeStations,
  type SystemIdentity,
} from '../services/summary.js'
import {
  parseVariableList,
  resolveVariableKey,
  VARIABLE_KEYS,
  VARIABLES,
  type VariableKey,
} from '../services/variables.js'

type ChatbotRouterOptions = {
  store: ReadingStore
  chat: ChatService
  identity: SystemIdentity
  now?: () => Date
  sessions?: Map<string, ChatContext>
}

const DEFAULT_USER_ID = 'default'
const MAX_SESSIONS = 10_000

const optionalDate = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined) {
      return undefined
    }
    const parsed = parseDateTime(value)
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date "${value}".` })
      return z.NEVER
    }
    return parsed
  })

const querySchema = z.object({
  stations: z.array(z.number().int()).optional(),
  variables: z.array(z.string().min(1)).optional(),
  dateRange: z.object({ start: optionalDate, end: optionalDate }).optional(),
  includeRawData: z.boolean().default(false),
  maxRecords: z.number().int().nonnegative().default(1000),
})

const messageSchema = z.object({
  message: z.string(),
  userId: z.string().trim().min(1).optional(),
})

const readQuery = (req: Request, name: string) =>
  typeof req.query[name] === 'string' ? String(req.query[name]) : undefined

const parseStationIds = (raw: string | undefined) =>
  String(raw ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map(Number)
    .filter((value) => Number.isInteger(value))

const issueMessage = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ')

const CHAT_INFO = {
  name: 'Nubi ☁️',
  description: 'Asistente ambiental híbrido con IA para datos meteorológicos',
  version: '2.0.0',
  systemType: 'Hybrid (Heuristic + AI)',
  capabilities: [
    '🚀 Respuestas heurísticas instantáneas',
    '🤖 Análisis inteligente con Gemini IA',
    '📊 Consultar estado actual de estaciones',
    '📍 Listar estaciones disponibles',
    '📚 Explicar conceptos meteorológicos',
    '🌬️ Interpretar calidad del aire',
    '📈 Análisis comparativo de datos',
    '🔍 Preguntas abiertas sobre clima',
    '🛡️ Validación de alcance automática',
  ],
  commands: {
    a: 'Ver estaciones disponibles',
    b: 'Modo educativo - explicar conceptos',
    hola: 'Saludo inicial con opciones',
    '[nombre_estacion]': 'Estado actual de una estación',
    '¿qué es [variable]?': 'Explicación de conceptos',
  },
  variablesSupported: VARIABLE_KEYS.map((key) => VARIABLES[key].label),
  endpoints: {
    chat: '/api/chatbot/message - Chat conversacional',
    explain: '/api/chatbot/explain - Explicación experta con IA',
    data: '/api/chatbot/data - Datos estructurados completos',
    query: '/api/chatbot/query - Consultas filtradas',
    health: '/api/chatbot/health - Estado del servicio',
  },
}

export const createChatbotRouter = ({
  store,
  chat,
  identity,
  now = () => new Date(),
  sessions = new Map<string, ChatContext>(),
}: ChatbotRouterOptions) => {
  const router = Router()

  // only open menus are stored; a missing entry reads as INITIAL_CONTEXT
  const saveContext = (userId: string, context: ChatContext) => {
    sessions.delete(userId)
    if (context.lastMenu === 'none') {
      return
    }
    sessions.set(userId, context)
    if (sessions.size > MAX_SESSIONS) {
      const [oldest] = sessions.keys()
      sessions.delete(oldest)
    }
  }

  router.get('/data', async (_req, res) => {
    try {
      const data = buildChatbotData(await store.load(), identity, now())
      log.info(`[Chatbot] Data built: ${data.stations.length} stations, ${data.variables.length} variables.`)
      return res.json(data)
    } catch (error) {
      log.error('[Chatbot] Failed to build chatbot data:', error)
      return res.status(500).json({ error: 'Failed to build chatbot data.' })
    }
  })

  router.post('/query', async (req, res) => {
    const parsed = querySchema.safeParse(req.body ?? {})
    if (!parsed.success) {
      return res.status(400).json({ error: issueMessage(parsed.error) })
    }

    const { stations, variables, dateRange, includeRawData, maxRecords } = parsed.data
    try {
      const table = await store.load()
      return res.json(
        filteredData(table, {
          stationIds: stations,
          variables,
          start: dateRange?.start,
          end: dateRange?.end,
          includeRawData,
          maxRecords,
        }),
      )
    } catch (error) {
      log.error('[Chatbot] Failed to run filtered query:', error)
      return res.status(500).json({ error: 'Failed to run query.' })
    }
  })

  router.get('/stations/summary', async (req, res) => {
    try {
      const stationIds = parseStationIds(readQuery(req, 'stationIds'))
      return res.json({ stations: summarizeStations(await store.load(), stationIds) })
    } catch (error) {
      log.error('[Chatbot] Failed to summarize stations:', error)
      return res.status(500).json({ error: 'Failed to summarize stations.' })
    }
  })

  router.get('/variables/info', async (req, res) => {
    try {
      const requested = parseVariableList(readQuery(req, 'variables'))
      const keys = requested
        ? requested.map(resolveVariableKey).filter((key): key is VariableKey => key !== null)
        : undefined
      return res.json({ variables: describeVariables(await store.load(), keys) })
    } catch (error) {
      log.error('[Chatbot] Failed to describe variables:', error)
      return res.status(500).json({ error: 'Failed to describe variables.' })
    }
  })

  router.get('/context', async (_req, res) => {
    try {
      const data = buildChatbotData(await store.load(), identity, now())
      return res.json({
        systemInfo: data.systemInfo,
        contextInfo: data.contextInfo,
        globalStats: data.globalStats,
        temporalCoverage: data.temporalCoverage,
        geographicCoverage: data.geographicCoverage,
      })
    } catch (error) {
      log.error('[Chatbot] Failed to build context:', error)
      return res.status(500).json({ error: 'Failed to build context.' })
    }
  })

  router.get('/health', async (_req, res) => {
    try {
      const table = await store.load()
      return res.json({
        status: 'healthy',
        dataLoaded: true,
        totalStations: table.groupByStation().size,
        totalVariables: VARIABLE_KEYS.length,
        lastCheck: now().toISOString(),
        serviceReady: true,
      })
    } catch (error) {
      log.error('[Chatbot] Health check failed:', error)
      return res.json({ status: 'unhealthy', dataLoaded: false, serviceReady: false })
    }
  })

  router.post('/message', async (req, res) => {
    const parsed = messageSchema.safeParse(req.body ?? {})
    if (!parsed.success) {
      return res.status(400).json({ error: issueMessage(parsed.error) })
    }

    const { message, userId = DEFAULT_USER_ID } = parsed.data
    try {
      const context = sessions.get(userId) ?? INITIAL_CONTEXT
      const reply = await chat.handleMessage(message, context)
      saveContext(userId, reply.context)
      return res.json({
        response: reply.text,
        timestamp: now().toISOString(),
        status: 'success',
      })
    } catch (error) {
      log.error('[Chatbot] Failed to process chat message:', error)
      return res.status(500).json({ error: 'Failed to process the chat message.' })
    }
  })

  router.get('/chat/health', async (_req, res) => {
    let records = 0
    let stations = 0
    try {
      const table = await store.load()
      records = table.size
      stations = table.groupByStation().size
    } catch (error) {
      log.error('[Chatbot] Chat health could not load data:', error)
    }

    const dataAvailable = records > 0
    const status = !dataAvailable ? 'unhealthy' : chat.aiConfigured ? 'healthy' : 'degraded'
    const messages = {
      healthy: 'Sistema híbrido completamente funcional',
      degraded: 'Funcionando con respuestas heurísticas - Gemini no disponible',
      unhealthy: 'Datos meteorológicos no disponibles',
    }

    return res.json({
      status,
      service: 'Hybrid Chat Service',
      message: messages[status],
      timestamp: now().toISOString(),
      capabilities: {
        heuristicResponses: dataAvailable,
        geminiAi: chat.aiConfigured,
        dataRecords: records,
        stationsCount: stations,
      },
    })
  })

  router.get('/info', (_req, res) => {
    res.json(CHAT_INFO)
  })

  router.post('/explain', async (req, res) => {
    const parsed = messageSchema.safeParse(req.body ?? {})
    if (!parsed.success) {
      return res.status(400).json({ error: issueMessage(parsed.error) })
    }

    if (!chat.aiConfigured) {
      log.error('[Chatbot] Explain requested but Gemini is not configured.')
      return res.status(503).json({ error: 'AI service is not available.' })
    }

    try {
      const result = await chat.explain(parsed.data.message)
      if (!result.ok) {
        return res.status(503).json({ error: result.error })
      }
      return res.json({
        response: result.text,
        timestamp: now().toISOString(),
        status: 'success',
      })
    } catch (error) {
      log.error('[Chatbot] Failed to process explanation:', error)
      return res.status(500).json({ error: 'Failed to process the explanation.' })
    }
  })

  return router
}
