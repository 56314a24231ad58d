import type { Server } from 'node:http'
import { loadConfig, loadDotenv } from '../config/index.js'
import { closeLogger, configureLogger, logger } from '../utils/logger.js'
import { closeAttendanceStack, createAttendanceStack } from './container.js'
import type { AttendanceStack } from './container.js'
import { createServer, startHttpServer, stopHttpServer } from './server.js'

export class App {
  private server: Server | null = null
  private stack: AttendanceStack | null = null
  private stopping = false

  async start(): Promise<void> {
    loadDotenv()
    const config = loadConfig()
    await configureLogger({
      level: config.LOG_LEVEL,
      summaryPath: config.logSummaryPath,
      detailPath: config.logDetailPath,
    })
    logger.info('App starting')
    logger.debug('App config', {
      subdomain: config.credentials.subdomain,
      browserExecutablePath: config.BROWSER_EXECUTABLE_PATH ?? 'bundled',
      browserHeadless: config.BROWSER_HEADLESS,
      host: config.HOST,
      port: config.PORT,
      timezone: config.timezone,
      sessionMaxIdleSeconds: config.SESSION_MAX_IDLE_SECONDS,
      loginTimeoutMs: config.LOGIN_TIMEOUT_MS,
      actionTimeoutMs: config.ACTION_TIMEOUT_MS,
      actionMaxAttempts: config.ACTION_MAX_ATTEMPTS,
      actionRetryBackoffMs: config.ACTION_RETRY_BACKOFF_MS,
      logLevel: config.LOG_LEVEL,
      logSummaryPath: config.logSummaryPath,
      logDetailPath: config.logDetailPath,
    })

    this.stack = createAttendanceStack(config)

    const app = createServer({ engine: this.stack.engine, timezone: config.timezone })
    this.server = await startHttpServer(app, config.PORT, config.HOST)
    logger.info('App started', { host: config.HOST, port: config.PORT })
  }

  async stop(reason: string): Promise<void> {
    if (this.stopping) return
    this.stopping = true
    logger.info('App stopping', { reason })

    try {
      if (this.server) {
        await stopHttpServer(this.server)
        this.server = null
      }
    }
    finally {
      const stack = this.stack
      this.stack = null
      try {
        if (stack) {
          await closeAttendanceStack(stack)
        }
      }
      finally {
        logger.info('App stopped')
        await closeLogger()
      }
    }
  }
}
