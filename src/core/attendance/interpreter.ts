import type { OutcomeStatus, PageResult } from '../../types/index.js'

export interface OutcomeRule {
  name: string
  status: OutcomeStatus
  matches: (page: PageResult) => boolean
}

const DETAIL_LIMIT = 500

const ALREADY_PATTERN = /\balready\b|이미(?!지)/i
const POLICY_PATTERN = /outside\b.*\b(hours|window|time)|\bnot allowed\b|허용되지 않|가능한 시간|시간이 아닙니다/i
const TRANSIENT_TEXT_PATTERN = /timed? ?out|network|temporarily|일시적/i
const TRANSIENT_HTTP_STATUSES = new Set([408, 429])

/** Only the message of the portal's JSON result header; raw bodies (error pages, HTML) carry no verdict. */
function portalMessage(page: PageResult): string {
  if (page.kind === 'timeout') return ''
  return page.resultMessage ?? ''
}

function isHttpOk(status: number): boolean {
  return status >= 200 && status < 300
}

export const DEFAULT_OUTCOME_RULES: readonly OutcomeRule[] = [
  {
    name: 'timeout',
    status: 'TRANSIENT_ERROR',
    matches: page => page.kind === 'timeout',
  },
  {
    name: 'success',
    status: 'SUCCESS',
    matches: page => page.kind === 'response'
      && isHttpOk(page.httpStatus)
      && page.isSuccessful === true
      && (page.resultCode === undefined || page.resultCode === 0),
  },
  {
    name: 'transient-http',
    status: 'TRANSIENT_ERROR',
    matches: page => page.kind === 'response'
      && (TRANSIENT_HTTP_STATUSES.has(page.httpStatus) || page.httpStatus >= 500),
  },
  {
    name: 'already-recorded',
    status: 'ALREADY_DONE',
    matches: page => ALREADY_PATTERN.test(portalMessage(page)),
  },
  {
    name: 'policy-window',
    status: 'POLICY_REJECTED',
    matches: page => POLICY_PATTERN.test(portalMessage(page)),
  },
  {
    name: 'transient-text',
    status: 'TRANSIENT_ERROR',
    matches: page => TRANSIENT_TEXT_PATTERN.test(portalMessage(page)),
  },
]

/**
 * Ordered, first match wins. Anything no rule recognizes is FATAL_ERROR.
 */
export function interpretPageResult(
  page: PageResult,
  rules: readonly OutcomeRule[] = DEFAULT_OUTCOME_RULES,
): OutcomeStatus {
  const rule = rules.find(candidate => candidate.matches(page))
  return rule ? rule.status : 'FATAL_ERROR'
}

export function describePageResult(page: PageResult): string {
  if (page.kind === 'timeout') {
    return `No response from portal within ${page.waitedMs}ms`
  }
  const message = page.resultMessage?.trim()
  if (message) return message
  const text = page.text.replace(/\s+/g, ' ').trim()
  if (text.length === 0) return `HTTP ${page.httpStatus}`
  return text.length > DETAIL_LIMIT ? `${text.slice(0, DETAIL_LIMIT)}...` : text
}
