import type { AppConfig } from '../config/index.js'
import { ActionEngine } from '../core/attendance/engine.js'
import { SessionManager } from '../core/session/manager.js'
import { DoorayAuthClient } from '../integrations/dooray/auth.js'
import { ChromiumBrowser } from '../integrations/dooray/browser.js'
import type { PortalBrowser } from '../integrations/dooray/browser.js'
import { DoorayAttendanceExecutor } from '../integrations/dooray/executor.js'

export interface AttendanceStack {
  browser: PortalBrowser
  sessions: SessionManager
  engine: ActionEngine
}

export function createAttendanceStack(config: AppConfig): AttendanceStack {
  const { credentials } = config
  const browser = new ChromiumBrowser({
    executablePath: config.BROWSER_EXECUTABLE_PATH,
    headless: config.BROWSER_HEADLESS,
  })
  const sessions = new SessionManager({
    credentials,
    authClient: new DoorayAuthClient({ browser, timeoutMs: config.LOGIN_TIMEOUT_MS }),
    maxIdleMs: config.SESSION_MAX_IDLE_SECONDS * 1000,
  })
  const engine = new ActionEngine({
    sessions,
    executor: new DoorayAttendanceExecutor({
      subdomain: credentials.subdomain,
      timeoutMs: config.ACTION_TIMEOUT_MS,
    }),
    maxAttempts: config.ACTION_MAX_ATTEMPTS,
    backoffMs: config.ACTION_RETRY_BACKOFF_MS,
  })
  return { browser, sessions, engine }
}

/** Closes the session's context, then the browser process. */
export async function closeAttendanceStack(stack: AttendanceStack): Promise<void> {
  try {
    await stack.sessions.close()
  }
  finally {
    await stack.browser.close()
  }
}
