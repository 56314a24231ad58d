import type { Credentials } from '../../types/index.js'
import { logger as rootLogger } from '../../utils/logger.js'
import type { PortalAuthClient, PortalSession } from './types.js'

const logger = rootLogger.child('session')

export interface SessionManagerOptions {
  credentials: Credentials
  authClient: PortalAuthClient
  maxIdleMs: number
  now?: () => number
}

/**
 * Owns the single authenticated portal session and its browser context.
 * Login happens lazily on acquire, and again once the session goes idle past
 * maxIdleMs or is invalidated. Login failures surface as AuthError; retries
 * are the caller's.
 */
export class SessionManager {
  private readonly credentials: Credentials
  private readonly authClient: PortalAuthClient
  private readonly maxIdleMs: number
  private readonly now: () => number
  private current: PortalSession | null = null
  private pendingLogin: Promise<PortalSession> | null = null
  private nextId = 1
  private logins = 0

  constructor(options: SessionManagerOptions) {
    this.credentials = options.credentials
    this.authClient = options.authClient
    this.maxIdleMs = options.maxIdleMs
    this.now = options.now ?? Date.now
  }

  get loginCount(): number {
    return this.logins
  }

  isUsable(session: PortalSession | null): session is PortalSession {
    if (!session || !session.alive) return false
    return this.now() - session.lastActivityAt < this.maxIdleMs
  }

  async acquire(): Promise<PortalSession> {
    if (this.isUsable(this.current)) {
      return this.current
    }
    if (this.pendingLogin) {
      return this.pendingLogin
    }

    this.pendingLogin = this.renew(this.current)
    try {
      return await this.pendingLogin
    }
    finally {
      this.pendingLogin = null
    }
  }

  touch(session: PortalSession): void {
    if (!session.alive) return
    session.lastActivityAt = this.now()
  }

  async invalidate(session: PortalSession): Promise<void> {
    if (!session.alive) return
    logger.info('Session invalidated', { sessionId: session.id })
    await this.discard(session)
  }

  async close(): Promise<void> {
    if (this.current) {
      logger.info('Session closed', { sessionId: this.current.id })
      await this.discard(this.current)
    }
  }

  private async renew(stale: PortalSession | null): Promise<PortalSession> {
    if (stale) {
      logger.info('Session stale; logging in again', {
        sessionId: stale.id,
        alive: stale.alive,
        idleMs: this.now() - stale.lastActivityAt,
      })
      await this.discard(stale)
    }
    return this.login()
  }

  private async discard(session: PortalSession): Promise<void> {
    if (this.current === session) {
      this.current = null
    }
    if (!session.alive) return
    session.alive = false
    try {
      await session.context.close()
    }
    catch (error) {
      logger.warn('Browser context did not close cleanly', { sessionId: session.id, error })
    }
  }

  private async login(): Promise<PortalSession> {
    const startedAt = this.now()
    logger.info('Logging in to portal', { subdomain: this.credentials.subdomain })
    this.logins += 1
    const context = await this.authClient.login(this.credentials)
    const createdAt = this.now()
    const session: PortalSession = {
      id: this.nextId,
      createdAt,
      lastActivityAt: createdAt,
      alive: true,
      context,
    }
    this.nextId += 1
    this.current = session
    logger.info('Portal login succeeded', {
      sessionId: session.id,
      durationMs: createdAt - startedAt,
    })
    return session
  }
}
