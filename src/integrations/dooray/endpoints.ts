export const PORTAL_HOST = 'dooray.com'
export const LOGIN_URL = `https://${PORTAL_HOST}/orgs`
export const WORKING_TIMES_PATH = '/wapi/work-schedule/v1/working-times'
export const USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/110.0.0.0 Safari/537.36'
const ACCEPT_LANGUAGE = 'ko-KR,ko;q=0.9,en-US;q=0.8,en;q=0.7'
const LOGIN_PATH_PREFIXES = ['/orgs', '/login', '/auth']

export interface DoorayEndpoints {
  origin: string
  loginUrl: string
  homeUrl: string
  workingTimesUrl: string
}

export function buildEndpoints(subdomain: string): DoorayEndpoints {
  const origin = `https://${subdomain}.${PORTAL_HOST}`
  return {
    origin,
    loginUrl: LOGIN_URL,
    homeUrl: `${origin}/`,
    workingTimesUrl: `${origin}${WORKING_TIMES_PATH}`,
  }
}

export function buildApiHeaders(endpoints: DoorayEndpoints): Record<string, string> {
  return {
    accept: 'application/json, text/plain, */*',
    'accept-language': ACCEPT_LANGUAGE,
    'content-type': 'application/json',
    origin: endpoints.origin,
    referer: `${endpoints.origin}/`,
  }
}

/** The organisation picker on the bare portal host, or a sign-in path on the tenant. */
export function isLoginSurface(url: string): boolean {
  try {
    const parsed = new URL(url)
    if (parsed.hostname === PORTAL_HOST || parsed.hostname === `www.${PORTAL_HOST}`) return true
    return LOGIN_PATH_PREFIXES.some(prefix => parsed.pathname === prefix || parsed.pathname.startsWith(`${prefix}/`))
  }
  catch {
    return false
  }
}
