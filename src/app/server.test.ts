import type { Server } from 'node:http'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { ActionOutcome, ActionRequest } from '../types/index.js'
import { createServer, startHttpServer, stopHttpServer } from './server.js'

const TODAY = '2026-01-07'

function outcomeFor(request: ActionRequest, overrides: Partial<ActionOutcome> = {}): ActionOutcome {
  return {
    status: 'SUCCESS',
    kind: request.kind,
    recordedDate: request.targetDate,
    detail: '',
    attempts: 1,
    ...overrides,
  }
}

describe('HTTP server', () => {
  let server: Server
  let baseUrl: string
  const perform = vi.fn(async (request: ActionRequest) => outcomeFor(request))

  beforeEach(async () => {
    perform.mockClear()
    perform.mockImplementation(async (request: ActionRequest) => outcomeFor(request))
    const app = createServer({ engine: { perform }, timezone: 'Asia/Seoul', today: () => TODAY })
    server = await startHttpServer(app, 0, '127.0.0.1')
    const address = server.address()
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port')
    }
    baseUrl = `http://127.0.0.1:${address.port}`
  })

  afterEach(async () => {
    await stopHttpServer(server)
  })

  const postJson = (path: string, body: unknown) => fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  })

  it('answers health checks without touching the engine', async () => {
    const response = await fetch(`${baseUrl}/health`)

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({ ok: true })
    expect(perform).not.toHaveBeenCalled()
  })

  it('records ENTER for today on a bare POST /enter', async () => {
    const response = await fetch(`${baseUrl}/enter`, { method: 'POST' })

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({
      status: 'SUCCESS',
      message: '사용자님, 2026-01-07 출근 처리가 완료되었습니다.',
    })
    expect(perform).toHaveBeenCalledWith({ kind: 'ENTER', targetDate: TODAY, requesterName: undefined })
  })

  it('takes the date from base_date on POST /leave', async () => {
    perform.mockImplementation(async (request: ActionRequest) => outcomeFor(request, {
      status: 'POLICY_REJECTED',
      detail: '퇴근 가능한 시간이 아닙니다.',
    }))

    const response = await fetch(`${baseUrl}/leave?base_date=2026-01-05`, { method: 'POST' })

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({
      status: 'POLICY_REJECTED',
      message: '사용자님, 퇴근 처리 실패: 퇴근 가능한 시간이 아닙니다.',
    })
    expect(perform).toHaveBeenCalledWith({ kind: 'LEAVE', targetDate: '2026-01-05', requesterName: undefined })
  })

  it('accepts a Dooray-style body on the direct endpoints', async () => {
    const response = await postJson('/enter', { text: '2026-01-06', userName: '홍길동' })

    expect(await response.json()).toEqual({
      status: 'SUCCESS',
      message: '홍길동님, 2026-01-06 출근 처리가 완료되었습니다.',
    })
  })

  it('rejects an impossible base_date with 400', async () => {
    const response = await fetch(`${baseUrl}/enter?base_date=2026-02-30`, { method: 'POST' })

    expect(response.status).toBe(400)
    expect(await response.json()).toEqual({ status: 'INVALID_REQUEST', message: 'Invalid base_date: 2026-02-30' })
    expect(perform).not.toHaveBeenCalled()
  })

  it('names the body text when the impossible date came from there', async () => {
    const response = await postJson('/leave', { userName: '홍길동', text: '2026-02-30' })

    expect(response.status).toBe(400)
    expect(await response.json()).toEqual({ status: 'INVALID_REQUEST', message: 'Invalid date in text: 2026-02-30' })
    expect(perform).not.toHaveBeenCalled()
  })

  it('rejects malformed JSON on the direct endpoints with 400', async () => {
    const response = await postJson('/leave', '{"text":')

    expect(response.status).toBe(400)
    expect(await response.json()).toMatchObject({ status: 'INVALID_REQUEST' })
    expect(perform).not.toHaveBeenCalled()
  })

  it('keeps business failures at HTTP 200', async () => {
    perform.mockImplementation(async (request: ActionRequest) => outcomeFor(request, {
      status: 'TRANSIENT_ERROR',
      detail: 'No response from portal within 30000ms',
      attempts: 2,
    }))

    const response = await fetch(`${baseUrl}/enter`, { method: 'POST' })

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({
      status: 'TRANSIENT_ERROR',
      message: '사용자님, 일시적인 오류로 출근 처리에 실패했습니다. 잠시 후 다시 시도해 주세요. (No response from portal within 30000ms)',
    })
  })

  describe('POST /dooray', () => {
    it('runs a slash command and renders the outcome', async () => {
      perform.mockImplementation(async (request: ActionRequest) => outcomeFor(request, { status: 'ALREADY_DONE' }))

      const response = await postJson('/dooray', {
        tenantId: 't-1',
        channelId: 'c-1',
        userId: 'u-1',
        userName: '홍길동',
        command: '/출근',
        text: '2026-01-05',
        cmdToken: 'test-token',
      })

      expect(response.status).toBe(200)
      expect(await response.json()).toEqual({
        responseType: 'ephemeral',
        text: '홍길동님, 2026-01-05 출근은 이미 기록되어 있습니다.',
      })
      expect(perform).toHaveBeenCalledWith({ kind: 'ENTER', targetDate: '2026-01-05', requesterName: '홍길동' })
    })

    it('answers unknown commands without performing anything', async () => {
      const response = await postJson('/dooray', { command: '/점심', userName: '홍길동' })

      expect(response.status).toBe(200)
      expect(await response.json()).toEqual({
        responseType: 'ephemeral',
        text: '알 수 없는 명령어입니다: /점심\n사용 가능: /출근, /퇴근',
      })
      expect(perform).not.toHaveBeenCalled()
    })

    it('answers an invalid date in the command text', async () => {
      const response = await postJson('/dooray', { command: '/퇴근', text: '2026-02-30' })

      expect(await response.json()).toEqual({
        responseType: 'ephemeral',
        text: '잘못된 날짜입니다: 2026-02-30 (YYYY-MM-DD 형식의 실제 날짜를 입력해 주세요)',
      })
    })

    it('answers a payload with wrongly typed fields', async () => {
      const response = await postJson('/dooray', { command: 42 })

      expect(response.status).toBe(200)
      expect(await response.json()).toEqual({
        responseType: 'ephemeral',
        text: '요청 형식 오류: command: Expected string, received number',
      })
    })

    it('answers malformed JSON with HTTP 200', async () => {
      const response = await postJson('/dooray', '{"command":')

      expect(response.status).toBe(200)
      expect(await response.json()).toMatchObject({
        responseType: 'ephemeral',
        text: expect.stringMatching(/^요청 형식 오류: /),
      })
    })

    it('still answers 200 when the engine itself fails', async () => {
      perform.mockRejectedValueOnce(new Error('engine offline'))

      const response = await postJson('/dooray', { command: '/출근' })

      expect(response.status).toBe(200)
      expect(await response.json()).toEqual({
        responseType: 'ephemeral',
        text: '처리 중 오류가 발생했습니다: engine offline',
      })
    })
  })
})
