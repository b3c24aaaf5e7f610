import { HeaderList } from '../core/handler'
import { Next } from '../core/middleware'
import { Context } from '../data/context'

/**
 * Adds `headers` to every response, error responses included. A handler that
 * declares its own `Content-Type` replaces the one set here.
 */
function applyHeaders (headers: Record<string, string> | HeaderList = {}) {
  const list: HeaderList = Array.isArray(headers) ? headers : Object.entries(headers)
  return (next: Next) => {
    return async function applyHeadersMiddleware (context: Context) {
      context.responseHeaders.push(...list)
      return next(context)
    }
  }
}

type XFOMode = 'DENY' | 'SAMEORIGIN'
function applyXFO (mode: XFOMode) {
  if (!['DENY', 'SAMEORIGIN'].includes(mode)) {
    throw new Error('applyXFO(): Allowed x-frame-options directives are DENY and SAMEORIGIN.')
  }
  return applyHeaders({ 'X-Frame-Options': mode })
}

export { XFOMode, applyHeaders, applyXFO }
