import type { Credentials } from '../../types/index.js'

export interface PortalApiResponse {
  status(): number
  url(): string
  headers(): Record<string, string>
  text(): Promise<string>
}

export interface PortalPostOptions {
  data: Record<string, string>
  headers: Record<string, string>
  timeout: number
  maxRedirects: number
  failOnStatusCode: boolean
}

/** HTTP client that shares the authenticated context's cookie store. */
export interface PortalRequestClient {
  post(url: string, options: PortalPostOptions): Promise<PortalApiResponse>
}

/** An authenticated browser context; the session owns it and closes it. */
export interface PortalContext {
  readonly request: PortalRequestClient
  close(): Promise<void>
}

export interface PortalSession {
  readonly id: number
  readonly createdAt: number
  lastActivityAt: number
  alive: boolean
  readonly context: PortalContext
}

export interface PortalAuthClient {
  /** Runs the full login sequence and returns the authenticated context. Throws AuthError. */
  login(credentials: Credentials): Promise<PortalContext>
}
