import 'dotenv/config'
import { createApp } from './api/_lib/app.ts'
import { getConfig } from '@infrastructure/config.ts'
import { closeDatabase, getDb } from '@infrastructure/db/database.ts'
import { logger } from '@infrastructure/logging/logger.ts'

const config = getConfig()

// Open and migrate before accepting requests
getDb()

const app = createApp()
const server = app.listen(config.port, () => {
  logger.info({ port: config.port, database: config.databasePath }, 'Recipe API listening')
})

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down')
  server.close((err) => {
    closeDatabase()
    if (err) {
      logger.error({ err }, 'Error while closing HTTP server')
      process.exit(1)
    }
    process.exit(0)
  })
}

process.on('SIGINT', () => shutdown('SIGINT'))
process.on('SIGTERM', () => shutdown('SIGTERM'))
