import bole from 'bole'
import http, { IncomingMessage, ServerResponse } from 'http'

import { BodyParserDefinition, buildBodyParser } from '../core/body'
import { dispatcher, emit } from '../core/dispatch'
import { MiddlewareConfig, buildMiddleware } from '../core/middleware'
import { SESSION_COOKIE } from '../core/prelude'
import { NormalizedResponse, errorResponse } from '../core/response'
import { Router } from '../core/routes'
import { SessionStore } from '../core/sessions'
import { multipart } from '../body/multipart'
import { urlEncoded } from '../body/urlencoded'
import { Context } from '../data/context'

type RequestListener = (req: IncomingMessage, res: ServerResponse) => void

interface ListenerOptions {
  handlers?: Record<string, unknown>,
  middleware?: MiddlewareConfig[],
  bodyParsers?: BodyParserDefinition[],
  sessions?: SessionStore,
  logger?: bole.Logger
}

interface ServerOptions extends ListenerOptions {
  sweepIntervalSeconds?: number
}

async function createListener ({
  handlers = {},
  middleware = [],
  bodyParsers = [urlEncoded, multipart],
  sessions = new SessionStore(),
  logger = bole('minnow:server'),
}: ListenerOptions = {}): Promise<RequestListener> {
  const router = new Router(handlers)
  const respond = await buildMiddleware(middleware, dispatcher({
    router,
    sessions,
    bodyParser: buildBodyParser(bodyParsers),
  }))

  async function onrequest (req: IncomingMessage, res: ServerResponse) {
    const context = new Context(req)

    let response: NormalizedResponse
    try {
      response = await respond(context)
    } catch (err) {
      // middleware threw outside of the dispatcher
      logger.error(err, `middleware failed; request_id="${context.id}"`)
      context.error = err
      const session = context.hasSession
        ? context.session
        : sessions.resolve(context.cookie.get(SESSION_COOKIE)).session
      response = errorResponse(err, { sessionId: session.id, headers: context.responseHeaders })
    }

    await emit(context, res, response, logger)
  }

  return (req, res) => {
    onrequest(req, res).catch(err => {
      logger.error(err, 'could not write response')
      res.destroy()
    })
  }
}

async function runserver ({
  sweepIntervalSeconds = Number(process.env.SESSION_SWEEP_INTERVAL) || 300,
  sessions = new SessionStore(),
  ...options
}: ServerOptions = {}) {
  const server = http.createServer(await createListener({ ...options, sessions }))

  sessions.startSweeping(sweepIntervalSeconds * 1000)
  server.on('close', () => sessions.close())

  return server
}

export { ListenerOptions, RequestListener, ServerOptions, createListener, runserver }
