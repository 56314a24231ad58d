export const DEFAULT_TIMEZONE = 'Asia/Seoul'

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

export function getZonedDate(timeZone: string = DEFAULT_TIMEZONE, date: Date = new Date()): string {
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(date)
}

// YYYY-MM-DD naming a day that exists on the calendar (rejects 2026-02-30).
export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value)
  if (!match) return false
  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const date = new Date(Date.UTC(year, month - 1, day))
  return date.getUTCFullYear() === year
    && date.getUTCMonth() === month - 1
    && date.getUTCDate() === day
}
