export type ActionKind = 'ENTER' | 'LEAVE'

export const OUTCOME_STATUSES = [
  'SUCCESS',
  'ALREADY_DONE',
  'POLICY_REJECTED',
  'TRANSIENT_ERROR',
  'FATAL_ERROR',
] as const

export type OutcomeStatus = typeof OUTCOME_STATUSES[number]

export interface Credentials {
  readonly username: string
  readonly password: string
  readonly subdomain: string
}

export interface ActionRequest {
  readonly kind: ActionKind
  /** YYYY-MM-DD */
  readonly targetDate: string
  readonly requesterName?: string
}

export interface ActionOutcome {
  readonly status: OutcomeStatus
  readonly kind: ActionKind
  readonly recordedDate: string
  readonly detail: string
  readonly attempts: number
}

export interface ResponsePageResult {
  kind: 'response'
  httpStatus: number
  text: string
  isSuccessful?: boolean
  resultCode?: number
  resultMessage?: string
}

export interface TimeoutPageResult {
  kind: 'timeout'
  waitedMs: number
}

export type PageResult = ResponsePageResult | TimeoutPageResult

export interface DoorayCommandPayload {
  tenantId?: string
  tenantDomain?: string
  channelId?: string
  channelName?: string
  userId?: string
  userName?: string
  command?: string
  text?: string
  responseUrl?: string
  appToken?: string
  cmdToken?: string
  triggerId?: string
}

export interface DoorayCommandResponse {
  responseType: 'ephemeral' | 'inChannel'
  text: string
}
