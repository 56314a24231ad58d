import path from 'node:path'
import dotenv from 'dotenv'
import { z } from 'zod'
import { ConfigError } from '../core/errors.js'
import type { Credentials } from '../types/index.js'
import { DEFAULT_TIMEZONE } from '../utils/time.js'

const REQUIRED_KEYS = ['DOORAY_LOGIN_USERNAME', 'DOORAY_LOGIN_PASSWORD', 'DOORAY_SUBDOMAIN'] as const

const optionalString = z.preprocess((value) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return typeof value === 'string' ? value.trim() : value
}, z.string().optional())

const integerSchema = (defaultValue: number, minValue: number) => z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) return undefined
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return value
}, z.number().int().min(minValue).default(defaultValue))

const boolSchema = (defaultValue: boolean) => z.preprocess((value) => {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (normalized === '') return undefined
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  }
  return value
}, z.boolean().default(defaultValue))

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone: value })
    return true
  }
  catch {
    return false
  }
}

const timeZoneSchema = optionalString.refine(
  value => value === undefined || isTimeZone(value),
  { message: 'Unknown time zone' },
)

const logLevelSchema = z.preprocess((value) => {
  if (typeof value === 'string') return value.trim().toLowerCase()
  return value
}, z.enum(['debug', 'info', 'warn', 'error']).default('info'))

const envSchema = z.object({
  DOORAY_LOGIN_USERNAME: optionalString,
  DOORAY_LOGIN_PASSWORD: optionalString,
  DOORAY_SUBDOMAIN: optionalString,
  BROWSER_EXECUTABLE_PATH: optionalString,
  BROWSER_HEADLESS: boolSchema(true),
  PORT: integerSchema(8000, 0),
  HOST: z.string().default('0.0.0.0'),
  TZ: timeZoneSchema,
  DATA_PATH: z.string().default('.data'),
  LOG_LEVEL: logLevelSchema,
  LOG_SUMMARY_PATH: optionalString,
  LOG_DETAIL_PATH: optionalString,
  SESSION_MAX_IDLE_SECONDS: integerSchema(1800, 1),
  LOGIN_TIMEOUT_MS: integerSchema(30000, 1000),
  ACTION_TIMEOUT_MS: integerSchema(30000, 1000),
  ACTION_MAX_ATTEMPTS: integerSchema(2, 1),
  ACTION_RETRY_BACKOFF_MS: integerSchema(1000, 0),
})

type ParsedEnv = z.infer<typeof envSchema>

export type AppConfig = Omit<ParsedEnv, typeof REQUIRED_KEYS[number]> & {
  credentials: Credentials
  timezone: string
  logSummaryPath: string
  logDetailPath: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const keys = Array.from(new Set(result.error.issues.map(issue => issue.path.join('.'))))
    throw new ConfigError(`Invalid settings: ${keys.join(', ')}`, keys)
  }

  const parsed = result.data
  const missing = REQUIRED_KEYS.filter(key => !parsed[key])
  const username = parsed.DOORAY_LOGIN_USERNAME
  const password = parsed.DOORAY_LOGIN_PASSWORD
  const subdomain = parsed.DOORAY_SUBDOMAIN
  if (!username || !password || !subdomain) {
    throw new ConfigError(`Missing required settings: ${missing.join(', ')}`, missing)
  }

  const logsPath = path.join(parsed.DATA_PATH, 'logs')
  const {
    DOORAY_LOGIN_USERNAME: _username,
    DOORAY_LOGIN_PASSWORD: _password,
    DOORAY_SUBDOMAIN: _subdomain,
    ...rest
  } = parsed

  return {
    ...rest,
    credentials: Object.freeze({ username, password, subdomain }),
    timezone: parsed.TZ ?? DEFAULT_TIMEZONE,
    logSummaryPath: parsed.LOG_SUMMARY_PATH ?? path.join(logsPath, 'summary.log'),
    logDetailPath: parsed.LOG_DETAIL_PATH ?? path.join(logsPath, 'detail.log'),
  }
}

/** Reads `.env` into process.env; existing variables win. */
export function loadDotenv(): void {
  dotenv.config()
}
