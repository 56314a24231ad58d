import { chromium, errors } from 'playwright-core'
import type { Browser } from 'playwright-core'
import type { PortalContext } from '../../core/session/types.js'
import { logger as rootLogger } from '../../utils/logger.js'
import { USER_AGENT } from './endpoints.js'

const logger = rootLogger.child('dooray:browser')

export interface LoginLocator {
  first(): LoginLocator
  fill(value: string, options?: { timeout?: number }): Promise<void>
  click(options?: { timeout?: number }): Promise<void>
  waitFor(options?: { state?: 'attached' | 'detached' | 'visible' | 'hidden'; timeout?: number }): Promise<void>
}

export interface LoginPage {
  goto(url: string, options?: { waitUntil?: 'load' | 'domcontentloaded'; timeout?: number }): Promise<unknown>
  locator(selector: string): LoginLocator
  waitForLoadState(state?: 'load' | 'domcontentloaded', options?: { timeout?: number }): Promise<void>
  waitForURL(url: (url: URL) => boolean, options?: { timeout?: number }): Promise<void>
  url(): string
  close(): Promise<void>
}

export interface DoorayBrowserContext extends PortalContext {
  newPage(): Promise<LoginPage>
  cookies(urls?: string): Promise<ReadonlyArray<{ name: string }>>
}

export interface PortalBrowser {
  newContext(): Promise<DoorayBrowserContext>
  close(): Promise<void>
}

export interface ChromiumBrowserOptions {
  executablePath?: string
  headless: boolean
}

export function isTimeoutError(error: unknown): boolean {
  if (error instanceof errors.TimeoutError) return true
  return error instanceof Error && error.name === 'TimeoutError'
}

/** One Chromium process, launched on first use; every session gets its own context. */
export class ChromiumBrowser implements PortalBrowser {
  private readonly options: ChromiumBrowserOptions
  private launching: Promise<Browser> | null = null

  constructor(options: ChromiumBrowserOptions) {
    this.options = options
  }

  async newContext(): Promise<DoorayBrowserContext> {
    const browser = await this.browser()
    return browser.newContext({
      userAgent: USER_AGENT,
      bypassCSP: true,
      locale: 'ko-KR',
      viewport: { width: 1280, height: 800 },
    })
  }

  async close(): Promise<void> {
    const launching = this.launching
    this.launching = null
    if (!launching) return
    const browser = await launching
    await browser.close()
    logger.info('Browser closed')
  }

  private browser(): Promise<Browser> {
    if (this.launching) return this.launching
    logger.info('Launching browser', {
      headless: this.options.headless,
      executablePath: this.options.executablePath ?? 'bundled',
    })
    const launching = chromium.launch({
      headless: this.options.headless,
      executablePath: this.options.executablePath,
      args: ['--disable-blink-features=AutomationControlled'],
    }).catch((error: unknown) => {
      this.launching = null
      throw error
    })
    this.launching = launching
    return launching
  }
}
