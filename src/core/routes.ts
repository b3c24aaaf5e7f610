import querystring from 'querystring'

import { Handler, Parameter, describeParameters, isHandler } from './handler'
import { FALLBACK_HANDLER } from './prelude'

interface Route {
  name: string,
  handler: Handler,
  parameters: Parameter[]
}

interface RouteMatch {
  name: string,
  route?: Route,
  // every segment of the request path, handler name included
  segments: string[],
  // the segments left over for positional binding
  params: string[],
  fallback: boolean
}

class Router {
  private table = new Map<string, Route>()

  constructor (handlers: Record<string, unknown> = {}) {
    for (const [name, handler] of Object.entries(handlers)) {
      if (isHandler(handler)) {
        this.table.set(name, { name, handler, parameters: describeParameters(handler) })
      }
    }
  }

  get names () {
    return [...this.table.keys()]
  }

  has (name: string) {
    return this.table.has(name)
  }

  resolve (pathname: string): RouteMatch {
    const segments = splitPath(pathname)
    if (segments.length === 0) {
      return { name: FALLBACK_HANDLER, route: this.table.get(FALLBACK_HANDLER), segments, params: [], fallback: false }
    }

    const [name, ...rest] = segments
    const route = this.table.get(name)
    if (route) {
      return { name, route, segments, params: rest, fallback: false }
    }

    return { name: FALLBACK_HANDLER, route: this.table.get(FALLBACK_HANDLER), segments, params: [...segments], fallback: true }
  }
}

function splitPath (pathname: string): string[] {
  const path = querystring.unescape(pathname).replace(/^\/+/, '')
  return path ? path.split('/') : []
}

export { Route, RouteMatch, Router, splitPath }
