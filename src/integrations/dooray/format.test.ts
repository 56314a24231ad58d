import { describe, expect, it } from 'vitest'
import type { ActionOutcome } from '../../types/index.js'
import { formatOutcomeMessage, formatUnknownCommand, toDoorayResponse } from './format.js'

function outcome(overrides: Partial<ActionOutcome>): ActionOutcome {
  return {
    status: 'SUCCESS',
    kind: 'ENTER',
    recordedDate: '2026-01-07',
    detail: '',
    attempts: 1,
    ...overrides,
  }
}

describe('formatOutcomeMessage', () => {
  it('renders each status', () => {
    expect(formatOutcomeMessage(outcome({}), '홍길동')).toBe('홍길동님, 2026-01-07 출근 처리가 완료되었습니다.')
    expect(formatOutcomeMessage(outcome({ status: 'ALREADY_DONE', kind: 'LEAVE' }), '홍길동'))
      .toBe('홍길동님, 2026-01-07 퇴근은 이미 기록되어 있습니다.')
    expect(formatOutcomeMessage(outcome({ status: 'POLICY_REJECTED', kind: 'LEAVE', detail: '퇴근 가능한 시간이 아닙니다.' }), '홍길동'))
      .toBe('홍길동님, 퇴근 처리 실패: 퇴근 가능한 시간이 아닙니다.')
    expect(formatOutcomeMessage(outcome({ status: 'TRANSIENT_ERROR', detail: 'No response from portal within 30000ms' }), '홍길동'))
      .toBe('홍길동님, 일시적인 오류로 출근 처리에 실패했습니다. 잠시 후 다시 시도해 주세요. (No response from portal within 30000ms)')
    expect(formatOutcomeMessage(outcome({ status: 'FATAL_ERROR', detail: 'Post-login page never appeared' }), '홍길동'))
      .toBe('홍길동님, 출근 처리 중 오류가 발생했습니다: Post-login page never appeared')
  })

  it('falls back to a generic requester name', () => {
    expect(formatOutcomeMessage(outcome({}))).toBe('사용자님, 2026-01-07 출근 처리가 완료되었습니다.')
    expect(formatOutcomeMessage(outcome({}), '  ')).toBe('사용자님, 2026-01-07 출근 처리가 완료되었습니다.')
  })
})

describe('Dooray responses', () => {
  it('wraps text as an ephemeral reply', () => {
    expect(toDoorayResponse(formatUnknownCommand('/점심'))).toEqual({
      responseType: 'ephemeral',
      text: '알 수 없는 명령어입니다: /점심\n사용 가능: /출근, /퇴근',
    })
  })
})
