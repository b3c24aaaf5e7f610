import type { Context } from '../data/context'

type Chunk = string | Uint8Array
type Body = Chunk | Iterable<Chunk> | AsyncIterable<Chunk>
type HeaderList = Array<[string, string]>

/** What a handler may return: a bare body, `[status, body]` or `[status, body, headers]`. */
type Response = Body | [number, Body] | [number, Body, HeaderList]

type ParameterConfig = string | { name: string, default?: unknown }

interface Parameter {
  name: string,
  hasDefault: boolean,
  default?: unknown
}

interface Handler {
  (this: Context, ...args: never[]): Response | Promise<Response>
  params?: ParameterConfig[]
}

function describeParameters (handler: Handler): Parameter[] {
  return (handler.params || []).map(param => {
    if (typeof param === 'string') {
      return { name: param, hasDefault: false }
    }
    return 'default' in param
      ? { name: param.name, hasDefault: true, default: param.default }
      : { name: param.name, hasDefault: false }
  })
}

function isHandler (value: unknown): value is Handler {
  return typeof value === 'function'
}

export {
  Body,
  Chunk,
  Handler,
  HeaderList,
  Parameter,
  ParameterConfig,
  Response,
  describeParameters,
  isHandler,
}
