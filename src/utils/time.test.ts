import { describe, expect, it } from 'vitest'
import { getZonedDate, isCalendarDate } from './time.js'

describe('getZonedDate', () => {
  it('formats the calendar date in the given zone', () => {
    const instant = new Date('2026-01-06T16:30:00Z')
    expect(getZonedDate('Asia/Seoul', instant)).toBe('2026-01-07')
    expect(getZonedDate('UTC', instant)).toBe('2026-01-06')
  })
})

describe('isCalendarDate', () => {
  it('accepts real days only', () => {
    expect(isCalendarDate('2026-01-07')).toBe(true)
    expect(isCalendarDate('2028-02-29')).toBe(true)
    expect(isCalendarDate('2026-02-29')).toBe(false)
    expect(isCalendarDate('2026-1-7')).toBe(false)
    expect(isCalendarDate('2026-01-07T00:00')).toBe(false)
  })
})
