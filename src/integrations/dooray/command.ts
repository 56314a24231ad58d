import { z } from 'zod'
import type { ActionKind, ActionRequest, DoorayCommandPayload } from '../../types/index.js'
import { isCalendarDate } from '../../utils/time.js'

const DATE_IN_TEXT = /\d{4}-\d{2}-\d{2}/

const COMMAND_KINDS: Record<string, ActionKind> = {
  '/출근': 'ENTER',
  '/enter': 'ENTER',
  '/퇴근': 'LEAVE',
  '/leave': 'LEAVE',
}

export const SUPPORTED_COMMANDS = ['/출근', '/퇴근'] as const

const optionalText = z.string().nullish().transform(value => value ?? undefined)

export const doorayCommandSchema = z.object({
  tenantId: optionalText,
  tenantDomain: optionalText,
  channelId: optionalText,
  channelName: optionalText,
  userId: optionalText,
  userName: optionalText,
  command: optionalText,
  text: optionalText,
  responseUrl: optionalText,
  appToken: optionalText,
  cmdToken: optionalText,
  triggerId: optionalText,
})

export type ParsedCommand =
  | { ok: true; request: ActionRequest }
  | { ok: false; error: 'unknown-command'; command: string }
  | { ok: false; error: 'invalid-date'; value: string }

export function parseCommandKind(command: string | undefined): ActionKind | null {
  const normalized = (command ?? '').trim().toLowerCase()
  return COMMAND_KINDS[normalized] ?? null
}

/** First YYYY-MM-DD in the text, or null when there is none. */
export function extractDate(text: string | undefined): string | null {
  if (!text) return null
  const match = DATE_IN_TEXT.exec(text.trim())
  return match ? match[0] : null
}

export function resolveTargetDate(
  explicit: string | null,
  today: string,
): { ok: true; date: string } | { ok: false; value: string } {
  if (explicit === null) return { ok: true, date: today }
  if (!isCalendarDate(explicit)) return { ok: false, value: explicit }
  return { ok: true, date: explicit }
}

export function parseDoorayCommand(payload: DoorayCommandPayload, today: string): ParsedCommand {
  const command = (payload.command ?? '').trim()
  const kind = parseCommandKind(command)
  if (!kind) {
    return { ok: false, error: 'unknown-command', command }
  }
  const target = resolveTargetDate(extractDate(payload.text), today)
  if (!target.ok) {
    return { ok: false, error: 'invalid-date', value: target.value }
  }
  return {
    ok: true,
    request: {
      kind,
      targetDate: target.date,
      requesterName: payload.userName?.trim() || undefined,
    },
  }
}
