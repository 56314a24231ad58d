import type { AttendanceExecutor } from '../../core/attendance/types.js'
import { NavigationError, SessionExpiredError } from '../../core/errors.js'
import type { PortalApiResponse, PortalSession } from '../../core/session/types.js'
import type { ActionRequest, PageResult } from '../../types/index.js'
import { logger as rootLogger } from '../../utils/logger.js'
import { isTimeoutError } from './browser.js'
import { buildApiHeaders, buildEndpoints, isLoginSurface } from './endpoints.js'
import type { DoorayEndpoints } from './endpoints.js'
import { readResultHeader } from './result.js'

const logger = rootLogger.child('dooray:action')

export interface DoorayAttendanceExecutorOptions {
  subdomain: string
  timeoutMs: number
}

function redirectTarget(response: PortalApiResponse): string | null {
  const status = response.status()
  const location = response.headers()['location']
  if (status < 300 || status >= 400 || !location) return null
  try {
    return new URL(location, response.url()).toString()
  }
  catch {
    return null
  }
}

export class DoorayAttendanceExecutor implements AttendanceExecutor {
  private readonly endpoints: DoorayEndpoints
  private readonly timeoutMs: number

  constructor(options: DoorayAttendanceExecutorOptions) {
    this.endpoints = buildEndpoints(options.subdomain)
    this.timeoutMs = options.timeoutMs
  }

  async submit(session: PortalSession, request: ActionRequest): Promise<PageResult> {
    const url = this.endpoints.workingTimesUrl
    logger.info('Working-times request', {
      url,
      kind: request.kind,
      date: request.targetDate,
      sessionId: session.id,
    })

    let response: PortalApiResponse
    let text: string
    try {
      // maxRedirects 0: a 3xx comes back as the answer and no other host sees the session.
      response = await session.context.request.post(url, {
        data: { baseDate: request.targetDate, attendanceType: request.kind },
        headers: buildApiHeaders(this.endpoints),
        timeout: this.timeoutMs,
        maxRedirects: 0,
        failOnStatusCode: false,
      })
      text = await response.text()
    }
    catch (error) {
      if (isTimeoutError(error)) {
        logger.warn('Working-times request timed out', { timeoutMs: this.timeoutMs })
        return { kind: 'timeout', waitedMs: this.timeoutMs }
      }
      logger.error('Working-times request failed', { error })
      const message = error instanceof Error ? error.message : String(error)
      throw new NavigationError(`Attendance surface unreachable: ${message}`, 'unreachable', { cause: error })
    }

    const status = response.status()
    const location = redirectTarget(response)
    logger.debug('Working-times response', { status, location, body: text.slice(0, 500) })

    if (status === 401 || status === 403 || (location !== null && isLoginSurface(location))) {
      throw new SessionExpiredError(`Portal no longer accepts the session (HTTP ${status})`)
    }

    const header = readResultHeader(text)
    return {
      kind: 'response',
      httpStatus: status,
      text,
      isSuccessful: header?.isSuccessful,
      resultCode: header?.resultCode,
      resultMessage: header?.resultMessage,
    }
  }
}
