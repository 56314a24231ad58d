import type { Server } from 'node:http'
import express from 'express'
import type { Express, NextFunction, Request, RequestHandler, Response } from 'express'
import type { ZodError } from 'zod'
import type { ActionPerformer } from '../core/attendance/types.js'
import { asErrorMessage } from '../core/errors.js'
import { doorayCommandSchema, extractDate, parseDoorayCommand, resolveTargetDate } from '../integrations/dooray/command.js'
import {
  formatInvalidDate,
  formatMalformedRequest,
  formatOutcomeMessage,
  formatUnknownCommand,
  toDoorayResponse,
} from '../integrations/dooray/format.js'
import type { ActionKind, DoorayCommandPayload } from '../types/index.js'
import { logger as rootLogger } from '../utils/logger.js'
import { getZonedDate } from '../utils/time.js'

const logger = rootLogger.child('http')

const DOORAY_PATH = '/dooray'

export interface ServerOptions {
  engine: ActionPerformer
  timezone: string
  today?: () => string
}

function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next)
  }
}

function describeZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.join('.')
      return field ? `${field}: ${issue.message}` : issue.message
    })
    .join(', ')
}

function isBodyParseError(error: unknown): error is Error & { type: string } {
  return error instanceof Error
    && 'type' in error
    && error.type === 'entity.parse.failed'
}

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now()
  res.on('finish', () => {
    logger.info('Request handled', {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
    })
  })
  next()
}

export function createServer(options: ServerOptions): Express {
  const { engine } = options
  const today = options.today ?? (() => getZonedDate(options.timezone))
  const app = express()

  app.disable('x-powered-by')
  app.use(requestLogger)
  app.use(express.json({ limit: '100kb' }))

  app.get('/health', (_req, res) => {
    res.json({ ok: true })
  })

  const directAction = (kind: ActionKind) => asyncHandler(async (req, res) => {
    const payload = doorayCommandSchema.safeParse(req.body ?? {})
    const body: DoorayCommandPayload = payload.success ? payload.data : {}
    const baseDate = req.query.base_date
    if (baseDate !== undefined && typeof baseDate !== 'string') {
      res.status(400).json({ status: 'INVALID_REQUEST', message: 'base_date must be a single YYYY-MM-DD value' })
      return
    }

    const queryDate = baseDate?.trim()
    const target = resolveTargetDate(queryDate ?? extractDate(body.text), today())
    if (!target.ok) {
      const source = queryDate === undefined ? 'date in text' : 'base_date'
      res.status(400).json({ status: 'INVALID_REQUEST', message: `Invalid ${source}: ${target.value}` })
      return
    }

    const requesterName = body.userName?.trim() || undefined
    const outcome = await engine.perform({ kind, targetDate: target.date, requesterName })
    res.json({ status: outcome.status, message: formatOutcomeMessage(outcome, requesterName) })
  })

  app.post('/enter', directAction('ENTER'))
  app.post('/leave', directAction('LEAVE'))

  app.post(DOORAY_PATH, asyncHandler(async (req, res) => {
    const payload = doorayCommandSchema.safeParse(req.body)
    if (!payload.success) {
      logger.warn('Dooray payload rejected', { error: describeZodError(payload.error) })
      res.json(toDoorayResponse(formatMalformedRequest(describeZodError(payload.error))))
      return
    }

    logger.info('Dooray command received', {
      command: payload.data.command,
      user: payload.data.userName,
      text: payload.data.text,
    })
    const parsed = parseDoorayCommand(payload.data, today())
    if (!parsed.ok) {
      const text = parsed.error === 'unknown-command'
        ? formatUnknownCommand(parsed.command)
        : formatInvalidDate(parsed.value)
      res.json(toDoorayResponse(text))
      return
    }

    const outcome = await engine.perform(parsed.request)
    res.json(toDoorayResponse(formatOutcomeMessage(outcome, parsed.request.requesterName)))
  }))

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const parseFailure = isBodyParseError(error)
    if (parseFailure) {
      logger.warn('Request body rejected', { path: req.path, error: error.message })
    }
    else {
      logger.error('Request failed', { path: req.path, error })
    }

    if (req.path === DOORAY_PATH) {
      const text = parseFailure
        ? formatMalformedRequest(error.message)
        : `처리 중 오류가 발생했습니다: ${asErrorMessage(error)}`
      res.json(toDoorayResponse(text))
      return
    }
    if (parseFailure) {
      res.status(400).json({ status: 'INVALID_REQUEST', message: error.message })
      return
    }
    res.status(500).json({ status: 'FATAL_ERROR', message: asErrorMessage(error) })
  })

  return app
}

export function startHttpServer(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host)
    server.once('listening', () => resolve(server))
    server.once('error', reject)
  })
}

export function stopHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error)
        return
      }
      resolve()
    })
  })
}
