import { AuthError } from '../../core/errors.js'
import type { PortalAuthClient, PortalContext } from '../../core/session/types.js'
import type { Credentials } from '../../types/index.js'
import { logger as rootLogger } from '../../utils/logger.js'
import { isTimeoutError } from './browser.js'
import type { DoorayBrowserContext, LoginPage, PortalBrowser } from './browser.js'
import { buildEndpoints, isLoginSurface } from './endpoints.js'
import type { DoorayEndpoints } from './endpoints.js'

const logger = rootLogger.child('dooray:auth')

const SUBDOMAIN_INPUT = 'input[id=subdomain]'
const SUBDOMAIN_NEXT = 'button[type=button]'
const USERNAME_INPUT = 'input[type=text]'
const PASSWORD_INPUT = 'input[type=password]'
const SUBMIT_BUTTON = 'button[type=submit]'

export interface DoorayAuthClientOptions {
  browser: PortalBrowser
  timeoutMs: number
}

type LoginStep = 'browser' | 'login page' | 'organization' | 'credential submit' | 'landmark'

export class DoorayAuthClient implements PortalAuthClient {
  private readonly browser: PortalBrowser
  private readonly timeoutMs: number

  constructor(options: DoorayAuthClientOptions) {
    this.browser = options.browser
    this.timeoutMs = options.timeoutMs
  }

  async login(credentials: Credentials): Promise<PortalContext> {
    const endpoints = buildEndpoints(credentials.subdomain)
    const context = await this.step('browser', () => this.browser.newContext())

    try {
      const page = await this.step('browser', () => context.newPage())
      await this.signIn(page, credentials, endpoints)
      await this.confirmLandmark(page, context, endpoints)
      await page.close()
      return context
    }
    catch (error) {
      await context.close().catch((closeError: unknown) => {
        logger.warn('Browser context did not close after failed login', { error: closeError })
      })
      throw error
    }
  }

  private async signIn(page: LoginPage, credentials: Credentials, endpoints: DoorayEndpoints): Promise<void> {
    const timeout = this.timeoutMs

    await this.step('login page', () => page.goto(endpoints.loginUrl, { waitUntil: 'domcontentloaded', timeout }))
    logger.debug('Login page loaded', { url: page.url() })

    await this.step('organization', async () => {
      await page.locator(SUBDOMAIN_INPUT).first().fill(credentials.subdomain, { timeout })
      await page.locator(SUBDOMAIN_NEXT).first().click({ timeout })
      await page.locator(PASSWORD_INPUT).first().waitFor({ state: 'visible', timeout })
    })
    logger.debug('Organization selected', { subdomain: credentials.subdomain })

    await this.step('credential submit', async () => {
      await page.locator(USERNAME_INPUT).first().fill(credentials.username, { timeout })
      await page.locator(PASSWORD_INPUT).first().fill(credentials.password, { timeout })
      await page.locator(SUBMIT_BUTTON).first().click({ timeout })
    })

    try {
      await page.waitForURL(url => !isLoginSurface(url.toString()), { timeout })
    }
    catch (error) {
      if (isTimeoutError(error)) {
        throw new AuthError('Portal rejected credentials: still on the login page after submit', 'rejected', { cause: error })
      }
      throw this.stepFailure('credential submit', error)
    }
    logger.debug('Credentials accepted', { url: page.url() })
  }

  private async confirmLandmark(page: LoginPage, context: DoorayBrowserContext, endpoints: DoorayEndpoints): Promise<void> {
    await this.step('landmark', () => page.goto(endpoints.homeUrl, { waitUntil: 'load', timeout: this.timeoutMs }))
    const cookies = await this.step('landmark', () => context.cookies(endpoints.origin))
    if (isLoginSurface(page.url()) || cookies.length === 0) {
      throw new AuthError('Post-login page never appeared', 'landmark')
    }
    logger.debug('Post-login landmark reached', { url: page.url(), cookies: cookies.length })
  }

  private async step<T>(step: LoginStep, run: () => Promise<T>): Promise<T> {
    try {
      return await run()
    }
    catch (error) {
      throw this.stepFailure(step, error)
    }
  }

  private stepFailure(step: LoginStep, error: unknown): AuthError {
    if (error instanceof AuthError) return error
    if (isTimeoutError(error)) {
      return new AuthError(`Login step "${step}" timed out after ${this.timeoutMs}ms`, 'timeout', { cause: error })
    }
    const message = error instanceof Error ? error.message : String(error)
    return new AuthError(`Login step "${step}" failed: ${message}`, 'unreachable', { cause: error })
  }
}
