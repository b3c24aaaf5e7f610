import bole from 'bole'
import { ServerResponse } from 'http'
import { once } from 'events'

import { BodyParser, decodeBody } from './body'
import { bindArguments } from './bind'
import { Next } from './middleware'
import { FALLBACK_HANDLER, SESSION_COOKIE } from './prelude'
import { NormalizedResponse, classify, errorResponse, normalize } from './response'
import { Route, Router } from './routes'
import { SessionStore } from './sessions'
import { _collect } from './utils'
import { HeaderList } from './handler'
import { Context } from '../data/context'
import {
  HandlerFailureError,
  InvalidResponseShapeError,
  RouteNotFoundError,
  isHttpError,
} from '../data/errors'

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH'])

interface DispatcherOptions {
  router: Router,
  sessions: SessionStore,
  bodyParser: BodyParser,
  logger?: bole.Logger
}

/**
 * The innermost step of the middleware chain: session, body, route, bind,
 * invoke, normalize. Failures at any step become an error response; nothing
 * is retried.
 */
function dispatcher ({
  router,
  sessions,
  bodyParser,
  logger = bole('minnow:dispatch'),
}: DispatcherOptions): Next {
  return async function dispatch (context: Context): Promise<NormalizedResponse> {
    context.state = 'resolving-session'
    const { session } = sessions.resolve(context.cookie.get(SESSION_COOKIE))
    context.session = session

    try {
      if (BODY_METHODS.has(context.method)) {
        context.state = 'buffering-body'
        const raw = await _collect(context.request)

        context.state = 'decoding-body'
        const { fields, files } = decodeBody(bodyParser, raw, context.headers['content-type'])
        context.body = fields
        context.files = files
      }

      context.state = 'resolving-route'
      const match = router.resolve(context.path)
      context.segments = match.segments
      if (!match.route) {
        throw new RouteNotFoundError(context.path)
      }
      context.handlerName = match.route.name
      context.params = match.params

      context.state = 'binding-arguments'
      const args = bindArguments(match.route.parameters, {
        params: match.params,
        query: context.query,
        body: context.body,
        files: context.files,
        session,
      })

      // the fallback took nothing from a non-empty path: nothing matched.
      if (match.route.name === FALLBACK_HANDLER && args.length === 0 && match.segments.length > 0) {
        throw new RouteNotFoundError(context.path)
      }

      context.state = 'invoking'
      const result = await invoke(match.route, context, args)

      context.state = 'normalizing-response'
      return normalize(classify(result), {
        sessionId: session.id,
        headers: context.responseHeaders,
      })
    } catch (err) {
      return fail(context, err, logger)
    }
  }
}

async function invoke (route: Route, context: Context, args: unknown[]): Promise<unknown> {
  try {
    const result: unknown = await Reflect.apply(route.handler, context, args)
    return result
  } catch (err) {
    throw new HandlerFailureError(route.name, err)
  }
}

function fail (context: Context, err: unknown, logger: bole.Logger): NormalizedResponse {
  const state = context.state
  context.state = 'error'
  context.error = err

  if (err instanceof HandlerFailureError) {
    logger.error(err.cause, `handler "${err.handler}" failed; request_id="${context.id}"`)
  } else if (isHttpError(err) && err.status < 500) {
    logger.warn(`${err.kind} while ${state}: ${err.message}; request_id="${context.id}"`)
  } else if (isHttpError(err)) {
    logger.error(`${err.kind} while ${state}: ${err.message}; request_id="${context.id}"`)
  } else {
    logger.error(err, `unexpected failure while ${state}; request_id="${context.id}"`)
  }

  return errorResponse(err, {
    sessionId: context.session.id,
    headers: context.responseHeaders,
  })
}

/**
 * Writes the status line and headers exactly once, then the body. A streamed
 * body that fails after that point cannot change the status any more: the
 * failure is logged as a late failure, a best-effort error body is written,
 * and the response is ended.
 */
async function emit (
  context: Context,
  res: ServerResponse,
  response: NormalizedResponse,
  logger: bole.Logger = bole('minnow:dispatch'),
) {
  context.state = 'emitting'
  try {
    writeHead(res, response)
  } catch (err) {
    // headers pushed by middleware are not validated until Node sees them
    context.error = err
    logger.error(err, `could not write response headers; request_id="${context.id}"`)
    for (const name of res.getHeaderNames()) {
      res.removeHeader(name)
    }
    response = errorResponse(new InvalidResponseShapeError('invalid response header'), {
      sessionId: context.session.id,
    })
    writeHead(res, response)
  }

  if (Buffer.isBuffer(response.body)) {
    res.end(response.body)
    context.state = context.error === undefined ? 'done' : 'error'
    return
  }

  try {
    for await (const chunk of response.body) {
      if (!res.write(chunk) && !await drained(res)) {
        break
      }
    }
    res.end()
  } catch (err) {
    context.error = err
    logger.error({
      lateFailure: true,
      id: context.id,
      handler: context.handlerName,
      status: response.status,
      message: `late failure while streaming the response body: ${err instanceof Error ? err.message : String(err)}`,
    })
    res.end('500 Internal Server Error')
  }
  context.state = context.error === undefined ? 'done' : 'error'
}

function writeHead (res: ServerResponse, response: NormalizedResponse) {
  for (const [name, value] of groupHeaders(response.headers)) {
    res.setHeader(name, value)
  }
  res.writeHead(response.status, response.reason)
}

// Resolves false when the response closed before it drained. Whichever
// listener loses the race is removed.
async function drained (res: ServerResponse): Promise<boolean> {
  if (res.destroyed) {
    return false
  }

  const controller = new AbortController()
  const { signal } = controller
  try {
    await Promise.race([once(res, 'drain', { signal }), once(res, 'close', { signal })])
  } finally {
    controller.abort()
  }
  return !res.destroyed
}

function groupHeaders (headers: HeaderList): Array<[string, string | string[]]> {
  const grouped = new Map<string, { name: string, values: string[] }>()
  for (const [name, value] of headers) {
    const key = name.toLowerCase()
    const entry = grouped.get(key)
    if (entry) {
      entry.values.push(value)
    } else {
      grouped.set(key, { name, values: [value] })
    }
  }

  return [...grouped.values()].map(({ name, values }): [string, string | string[]] => (
    [name, values.length === 1 ? values[0] : values]
  ))
}

export { DispatcherOptions, dispatcher, drained, emit, groupHeaders }
