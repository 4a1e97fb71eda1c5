import cors from 'cors'
import express from 'express'
import { createChatService } from './chat/chat-service.js'
import type { ChatContext } from './chat/intent.js'
import type { AppConfig } from './config.js'
import type { AiClient } from './services/gemini.js'
import type { ReadingStore } from './services/readings.js'
import { createChatbotRouter } from './routes/chatbot.js'
import { createStationsRouter } from './routes/stations.js'

type AppOptions = {
  config: AppConfig
  store: ReadingStore
  ai: AiClient
  now?: () => Date
  random?: () => number
  sessions?: Map<string, ChatContext>
}

export const createApp = ({ config, store, ai, now, random, sessions }: AppOptions) => {
  const app = express()

  app.use(cors({ origin: config.corsOrigins.length ? config.corsOrigins : true }))
  app.use(express.json({ limit: '1mb' }))

  app.get('/', (_req, res) => {
    res.json({ message: config.appName, version: config.appVersion, status: 'healthy' })
  })

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', service: config.appName })
  })

  const chat = createChatService({
    store,
    ai,
    explainModels: config.gemini.explainModels,
    random,
  })

  app.use('/api/stations', createStationsRouter(store))
  app.use(
    '/api/chatbot',
    createChatbotRouter({
      store,
      chat,
      identity: {
        appName: config.appName,
        appVersion: config.appVersion,
        dataSource: config.dataFilePath,
      },
      now,
      sessions,
    }),
  )

  return app
}
