import type { ActionOutcome, ActionRequest, PageResult } from '../../types/index.js'
import type { PortalSession } from '../session/types.js'

export interface AttendanceExecutor {
  /**
   * Submits the action and waits for a terminal portal state or the timeout.
   * Throws NavigationError when the surface is unreachable and
   * SessionExpiredError when the portal no longer accepts the session.
   */
  submit(session: PortalSession, request: ActionRequest): Promise<PageResult>
}

export interface SessionProvider {
  acquire(): Promise<PortalSession>
  touch(session: PortalSession): void
  invalidate(session: PortalSession): Promise<void>
}

export interface ActionPerformer {
  perform(request: ActionRequest): Promise<ActionOutcome>
}
