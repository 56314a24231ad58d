import type { ActionKind, ActionOutcome, DoorayCommandResponse } from '../../types/index.js'
import { SUPPORTED_COMMANDS } from './command.js'

const DEFAULT_REQUESTER = '사용자'

export function formatActionName(kind: ActionKind): string {
  return kind === 'ENTER' ? '출근' : '퇴근'
}

export function formatOutcomeMessage(outcome: ActionOutcome, requesterName?: string): string {
  const user = requesterName?.trim() || DEFAULT_REQUESTER
  const action = formatActionName(outcome.kind)
  const date = outcome.recordedDate

  switch (outcome.status) {
    case 'SUCCESS':
      return `${user}님, ${date} ${action} 처리가 완료되었습니다.`
    case 'ALREADY_DONE':
      return `${user}님, ${date} ${action}은 이미 기록되어 있습니다.`
    case 'POLICY_REJECTED':
      return `${user}님, ${action} 처리 실패: ${outcome.detail}`
    case 'TRANSIENT_ERROR':
      return `${user}님, 일시적인 오류로 ${action} 처리에 실패했습니다. 잠시 후 다시 시도해 주세요. (${outcome.detail})`
    case 'FATAL_ERROR':
      return `${user}님, ${action} 처리 중 오류가 발생했습니다: ${outcome.detail}`
  }
}

export function formatUnknownCommand(command: string): string {
  return `알 수 없는 명령어입니다: ${command}\n사용 가능: ${SUPPORTED_COMMANDS.join(', ')}`
}

export function formatInvalidDate(value: string): string {
  return `잘못된 날짜입니다: ${value} (YYYY-MM-DD 형식의 실제 날짜를 입력해 주세요)`
}

export function formatMalformedRequest(reason: string): string {
  return `요청 형식 오류: ${reason}`
}

export function toDoorayResponse(text: string): DoorayCommandResponse {
  return { responseType: 'ephemeral', text }
}
