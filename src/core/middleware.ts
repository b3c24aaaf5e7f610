import { Context } from '../data/context'
import { NormalizedResponse } from './response'

interface Next {
  (context: Context): Promise<NormalizedResponse>
}

interface Adaptor {
  (next: Next): Next | Promise<Next>
}

interface Middleware {
  // configuration arguments differ per middleware
  (...args: any[]): Adaptor
}

type MiddlewareConfig = Middleware | [Middleware, ...unknown[]]

/**
 * Wraps `inner` in the configured middleware. The first entry is outermost:
 * it sees the request first and the response last.
 */
async function buildMiddleware (middleware: MiddlewareConfig[], inner: Next): Promise<Next> {
  const adaptors = middleware.map((config: MiddlewareConfig) => {
    const [mw, ...args] = Array.isArray(config) ? config : [config]
    return mw(...args)
  })

  return adaptors.reduceRight(async (lhs: Promise<Next>, rhs: Adaptor): Promise<Next> => {
    return rhs(await lhs)
  }, Promise.resolve(inner))
}

export { Adaptor, Middleware, MiddlewareConfig, Next, buildMiddleware }
