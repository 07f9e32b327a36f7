import { createServer } from 'node:http'
import { toNodeListener } from 'h3'
import { createStudyApp } from './app'
import { createDatabase } from './database/client'
import { loadConfig } from './utils/config'
import { OllamaInferenceClient } from './utils/inference'
import { configureLogger, useLogger } from './utils/logger'
import { SessionOrchestrator } from './utils/orchestrator'
import { UploadStorage } from './utils/storage'
import { DocumentStore } from './utils/store'

const config = loadConfig()
configureLogger(config.logLevel)
const logger = useLogger('server')

const store = new DocumentStore(createDatabase(config.databaseFile))
const inference = OllamaInferenceClient.connect(config.ollama.host, config.ollama.model)
const orchestrator = new SessionOrchestrator(store, inference, {
  contextMaxChars: config.contextMaxChars,
  historyMessages: config.historyMessages,
  generationRetries: config.generationRetries,
  retryInterruptedStream: config.retryInterruptedStream,
  storage: config.retainUploads ? new UploadStorage(config.uploadDir) : undefined,
})

const app = createStudyApp({ store, orchestrator, maxUploadBytes: config.maxUploadBytes })

createServer(toNodeListener(app)).listen(config.port, () => {
  logger.success(`Listening on http://localhost:${config.port} (model ${config.ollama.model} at ${config.ollama.host})`)
})
