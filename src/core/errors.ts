export type PortalErrorReason = 'rejected' | 'timeout' | 'unreachable' | 'landmark' | 'expired'

export class PortalError extends Error {
  readonly reason: PortalErrorReason

  constructor(message: string, reason: PortalErrorReason, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PortalError'
    this.reason = reason
  }

  get retryable(): boolean {
    return this.reason !== 'rejected'
  }
}

/** Login sequence failed. */
export class AuthError extends PortalError {
  constructor(message: string, reason: PortalErrorReason, options?: { cause?: unknown }) {
    super(message, reason, options)
    this.name = 'AuthError'
  }
}

/** The attendance surface could not be reached. */
export class NavigationError extends PortalError {
  constructor(message: string, reason: PortalErrorReason, options?: { cause?: unknown }) {
    super(message, reason, options)
    this.name = 'NavigationError'
  }
}

export class SessionExpiredError extends PortalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'expired', options)
    this.name = 'SessionExpiredError'
  }
}

export class ConfigError extends Error {
  readonly keys: string[]

  constructor(message: string, keys: string[]) {
    super(message)
    this.name = 'ConfigError'
    this.keys = keys
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
