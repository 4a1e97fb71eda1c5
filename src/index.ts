import { createApp } from './app.js'
import { loadConfig } from './config.js'
import { createGeminiClient } from './services/gemini.js'
import { log, setLogLevel } from './services/log.js'
import { createReadingStore } from './services/readings.js'

const config = loadConfig()
setLogLevel(config.logLevel)

const store = createReadingStore(config.dataFilePath)
const ai = createGeminiClient(config.gemini)

const start = async () => {
  await store.load()

  const app = createApp({ config, store, ai })
  app.listen(config.port, config.host, () => {
    log.info(`[Server] ${config.appName} v${config.appVersion} listening on http://${config.host}:${config.port}`)
  })
}

start().catch((error: unknown) => {
  log.error('[Server] Failed to load station data:', error)
  process.exit(1)
})
