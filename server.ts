import 'dotenv/config'

import { createApp } from './api/app.ts'
import { loadConfig } from './api/config.ts'
import { createServices } from './api/services.ts'
import { createLogger } from './src/server/logging.ts'

const log = createLogger('server')

const config = loadConfig()
const services = createServices(config)
const app = createApp({ config, services })

const server = app.listen(config.port, config.host, () => {
  log.info(`API server running at http://${config.host}:${config.port}`)
  log.info('configuration', {
    embeddingsProvider: config.embeddings.provider,
    embeddingsModel: config.embeddings.model,
    dbPath: config.dbPath,
    defaultCollection: config.defaultCollection,
    agentPolicy: config.agent.policy,
  })
})

function shutdown(signal: string): void {
  log.info(`received ${signal}, shutting down`)
  server.close(() => {
    services.close()
    process.exit(0)
  })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
