import * as cookie from 'cookie'

import { SESSION_COOKIE } from '../core/prelude'

/**
 * The request's cookies, keyed by name. Values are kept exactly as sent:
 * nothing is unquoted or percent-decoded.
 */
class Cookie extends Map<string, string> {
  static from (header: string): Cookie {
    return new Cookie(parseCookies(header))
  }
}

function parseCookies (header: string): Map<string, string> {
  const cookies = new Map<string, string>()
  if (!header) {
    return cookies
  }

  for (const entry of header.split(';')) {
    const idx = entry.indexOf('=')
    if (idx === -1) {
      continue
    }
    // later duplicates overwrite earlier ones
    cookies.set(entry.slice(0, idx).trim(), entry.slice(idx + 1).trim())
  }
  return cookies
}

function buildSetCookie (sessionId: string): string {
  return cookie.serialize(SESSION_COOKIE, sessionId, {
    path: '/',
    httpOnly: true,
    sameSite: 'strict',
  })
}

export { Cookie, parseCookies, buildSetCookie }
