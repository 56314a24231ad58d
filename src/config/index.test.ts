import path from 'node:path'
import { describe, expect, it } from 'vitest'
import { ConfigError } from '../core/errors.js'
import { loadConfig } from './index.js'

const REQUIRED = {
  DOORAY_LOGIN_USERNAME: 'tester',
  DOORAY_LOGIN_PASSWORD: 'test-secret',
  DOORAY_SUBDOMAIN: 'example',
}

describe('loadConfig', () => {
  it('applies defaults around the required credentials', () => {
    const config = loadConfig({ ...REQUIRED })

    expect(config.credentials).toEqual({ username: 'tester', password: 'test-secret', subdomain: 'example' })
    expect(Object.isFrozen(config.credentials)).toBe(true)
    expect(config.PORT).toBe(8000)
    expect(config.HOST).toBe('0.0.0.0')
    expect(config.timezone).toBe('Asia/Seoul')
    expect(config.LOG_LEVEL).toBe('info')
    expect(config.SESSION_MAX_IDLE_SECONDS).toBe(1800)
    expect(config.LOGIN_TIMEOUT_MS).toBe(30000)
    expect(config.ACTION_TIMEOUT_MS).toBe(30000)
    expect(config.ACTION_MAX_ATTEMPTS).toBe(2)
    expect(config.ACTION_RETRY_BACKOFF_MS).toBe(1000)
    expect(config.BROWSER_EXECUTABLE_PATH).toBeUndefined()
    expect(config.BROWSER_HEADLESS).toBe(true)
    expect(config.logSummaryPath).toBe(path.join('.data', 'logs', 'summary.log'))
    expect(config.logDetailPath).toBe(path.join('.data', 'logs', 'detail.log'))
    expect('DOORAY_LOGIN_PASSWORD' in config).toBe(false)
  })

  it('parses overrides from strings', () => {
    const config = loadConfig({
      ...REQUIRED,
      PORT: '9000',
      TZ: 'UTC',
      LOG_LEVEL: 'DEBUG',
      ACTION_MAX_ATTEMPTS: '4',
      ACTION_RETRY_BACKOFF_MS: '0',
      DATA_PATH: '/var/lib/attendance',
      BROWSER_EXECUTABLE_PATH: '/usr/bin/chromium',
      BROWSER_HEADLESS: 'off',
    })

    expect(config.PORT).toBe(9000)
    expect(config.timezone).toBe('UTC')
    expect(config.LOG_LEVEL).toBe('debug')
    expect(config.ACTION_MAX_ATTEMPTS).toBe(4)
    expect(config.ACTION_RETRY_BACKOFF_MS).toBe(0)
    expect(config.BROWSER_EXECUTABLE_PATH).toBe('/usr/bin/chromium')
    expect(config.BROWSER_HEADLESS).toBe(false)
    expect(config.logSummaryPath).toBe(path.join('/var/lib/attendance', 'logs', 'summary.log'))
  })

  it('lists every missing required setting', () => {
    const error = (() => {
      try {
        loadConfig({ DOORAY_LOGIN_USERNAME: 'tester', DOORAY_SUBDOMAIN: '   ' })
      }
      catch (caught) {
        return caught
      }
      return null
    })()

    expect(error).toBeInstanceOf(ConfigError)
    expect(error).toMatchObject({
      message: 'Missing required settings: DOORAY_LOGIN_PASSWORD, DOORAY_SUBDOMAIN',
      keys: ['DOORAY_LOGIN_PASSWORD', 'DOORAY_SUBDOMAIN'],
    })
  })

  it('rejects out-of-range numbers', () => {
    expect(() => loadConfig({ ...REQUIRED, ACTION_MAX_ATTEMPTS: '0', LOGIN_TIMEOUT_MS: 'soon' }))
      .toThrow('Invalid settings: LOGIN_TIMEOUT_MS, ACTION_MAX_ATTEMPTS')
  })

  it('rejects an unknown time zone at load time', () => {
    expect(() => loadConfig({ ...REQUIRED, TZ: 'Mars/Olympus' })).toThrow(ConfigError)
    expect(() => loadConfig({ ...REQUIRED, TZ: 'Mars/Olympus' })).toThrow('Invalid settings: TZ')
  })
})
