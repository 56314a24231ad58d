import { App } from './App.js'
import { logger } from '../utils/logger.js'

const app = new App()

function shutdown(reason: string): void {
  app.stop(reason).catch((error) => {
    logger.error('Shutdown failed', { error })
    process.exitCode = 1
  })
}

process.once('SIGINT', () => shutdown('SIGINT'))
process.once('SIGTERM', () => shutdown('SIGTERM'))

app.start().catch((error) => {
  logger.error('Fatal error', { error })
  process.exitCode = 1
  shutdown('startup failure')
})
