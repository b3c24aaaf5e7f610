import bole from 'bole'
import bistre from 'bistre'
import isDev from 'are-we-dev'

import { Next } from '../core/middleware'
import { serviceName } from '../core/prelude'
import { Context } from '../data/context'

type LogSink = Pick<bole.Logger, 'info'>

function log ({
  logger = bole(serviceName),
  level = process.env.LOG_LEVEL || 'debug',
  stream = process.stdout,
}: {
  logger?: LogSink,
  level?: string,
  stream?: NodeJS.WritableStream
} = {}) {
  if (isDev()) {
    const pretty = bistre({ time: true })
    pretty.pipe(stream)
    stream = pretty
  }
  bole.output({ level, stream })

  return function logMiddleware (next: Next) {
    return async function inner (context: Context) {
      const response = await next(context)

      logger.info({
        message: `${response.status} ${context.method} ${context.request.url}`,
        id: context.id,
        ip: context.remote,
        host: context.host,
        method: context.method,
        url: context.request.url,
        handler: context.handlerName,
        elapsed: Date.now() - context.start,
        status: response.status,
        userAgent: context.headers['user-agent'],
        referer: context.headers.referer
      })

      return response
    }
  }
}

export { LogSink, log }
