export interface PortalResultHeader {
  isSuccessful?: boolean
  resultCode?: number
  resultMessage?: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Reads the `header` block Dooray puts on its JSON API responses, if present. */
export function readResultHeader(text: string): PortalResultHeader | null {
  let payload: unknown
  try {
    payload = JSON.parse(text)
  }
  catch {
    return null
  }
  if (!isRecord(payload) || !isRecord(payload.header)) return null
  const { isSuccessful, resultCode, resultMessage } = payload.header
  return {
    isSuccessful: typeof isSuccessful === 'boolean' ? isSuccessful : undefined,
    resultCode: typeof resultCode === 'number' ? resultCode : undefined,
    resultMessage: typeof resultMessage === 'string' ? resultMessage : undefined,
  }
}
