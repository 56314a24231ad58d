import { setTimeout as delay } from 'node:timers/promises'
import type { ActionOutcome, ActionRequest, OutcomeStatus } from '../../types/index.js'
import { PortalError, asErrorMessage } from '../errors.js'
import { logger as rootLogger } from '../../utils/logger.js'
import { SerialQueue } from '../../utils/queue.js'
import type { PortalSession } from '../session/types.js'
import { DEFAULT_OUTCOME_RULES, describePageResult, interpretPageResult } from './interpreter.js'
import type { OutcomeRule } from './interpreter.js'
import type { ActionPerformer, AttendanceExecutor, SessionProvider } from './types.js'

const logger = rootLogger.child('engine')

export interface ActionEngineOptions {
  sessions: SessionProvider
  executor: AttendanceExecutor
  maxAttempts: number
  backoffMs: number
  rules?: readonly OutcomeRule[]
  sleep?: (ms: number) => Promise<void>
}

interface AttemptResult {
  outcome: ActionOutcome
  retry: boolean
}

export class ActionEngine implements ActionPerformer {
  private readonly sessions: SessionProvider
  private readonly executor: AttendanceExecutor
  private readonly maxAttempts: number
  private readonly backoffMs: number
  private readonly rules: readonly OutcomeRule[]
  private readonly sleep: (ms: number) => Promise<void>
  private readonly queue = new SerialQueue()

  constructor(options: ActionEngineOptions) {
    this.sessions = options.sessions
    this.executor = options.executor
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts))
    this.backoffMs = Math.max(0, options.backoffMs)
    this.rules = options.rules ?? DEFAULT_OUTCOME_RULES
    this.sleep = options.sleep ?? (ms => delay(ms))
  }

  /** Number of requests admitted and not yet finished, including the running one. */
  get pending(): number {
    return this.queue.pending
  }

  perform(request: ActionRequest): Promise<ActionOutcome> {
    if (this.queue.pending > 0) {
      logger.debug('Request queued behind in-flight action', {
        kind: request.kind,
        date: request.targetDate,
        ahead: this.queue.pending,
      })
    }
    return this.queue.run(() => this.performExclusive(request))
  }

  private async performExclusive(request: ActionRequest): Promise<ActionOutcome> {
    const startedAt = Date.now()
    logger.info('Attendance action started', {
      kind: request.kind,
      date: request.targetDate,
      requester: request.requesterName ?? 'unknown',
    })

    let result = await this.attempt(request, 1)
    for (let attempt = 2; attempt <= this.maxAttempts && result.retry; attempt += 1) {
      const waitMs = this.backoffMs * (attempt - 1)
      logger.warn('Attendance attempt failed; retrying', {
        attempt: attempt - 1,
        status: result.outcome.status,
        detail: result.outcome.detail,
        waitMs,
      })
      await this.sleep(waitMs)
      result = await this.attempt(request, attempt)
    }

    const { outcome } = result
    const level = outcome.status === 'SUCCESS' || outcome.status === 'ALREADY_DONE' ? 'info' : 'warn'
    logger[level]('Attendance action completed', {
      kind: outcome.kind,
      date: outcome.recordedDate,
      status: outcome.status,
      attempts: outcome.attempts,
      detail: outcome.detail,
      durationMs: Date.now() - startedAt,
    })
    return outcome
  }

  private async attempt(request: ActionRequest, attempt: number): Promise<AttemptResult> {
    const build = (status: OutcomeStatus, detail: string): ActionOutcome => ({
      status,
      kind: request.kind,
      recordedDate: request.targetDate,
      detail,
      attempts: attempt,
    })

    let session: PortalSession | null = null
    try {
      session = await this.sessions.acquire()
      const page = await this.executor.submit(session, request)
      const status = interpretPageResult(page, this.rules)
      const outcome = build(status, describePageResult(page))
      logger.debug('Portal state interpreted', {
        attempt,
        sessionId: session.id,
        page: page.kind,
        httpStatus: page.kind === 'response' ? page.httpStatus : undefined,
        status,
      })

      if (status === 'TRANSIENT_ERROR') {
        await this.sessions.invalidate(session)
        return { outcome, retry: true }
      }
      this.sessions.touch(session)
      return { outcome, retry: false }
    }
    catch (error) {
      if (session) {
        await this.sessions.invalidate(session)
      }
      if (error instanceof PortalError) {
        const status: OutcomeStatus = error.reason === 'timeout' ? 'TRANSIENT_ERROR' : 'FATAL_ERROR'
        logger.warn('Portal error during attendance attempt', {
          attempt,
          error: error.name,
          reason: error.reason,
          message: error.message,
        })
        return { outcome: build(status, error.message), retry: error.retryable }
      }
      logger.error('Unexpected error during attendance attempt', { attempt, error })
      return { outcome: build('FATAL_ERROR', asErrorMessage(error)), retry: false }
    }
  }
}
