import { HeaderList } from './handler'
import { buildSetCookie } from '../data/cookie'
import { InvalidResponseShapeError, isHttpError } from '../data/errors'
import { SESSION_COOKIE } from './prelude'

// Chunks inside iterables are checked lazily, as they are produced.
type ResponseBody = string | Uint8Array | Iterable<unknown> | AsyncIterable<unknown>

type HandlerReturn =
  | { kind: 'body', body: ResponseBody }
  | { kind: 'status-body', status: number, body: ResponseBody }
  | { kind: 'status-body-headers', status: number, body: ResponseBody, headers: HeaderList }

interface NormalizedResponse {
  status: number,
  reason: string,
  headers: HeaderList,
  body: Buffer | AsyncIterable<Buffer>
}

interface NormalizeOptions {
  sessionId: string,
  // headers set before the handler ran, e.g. by middleware
  headers?: HeaderList
}

const REASONS: Record<number, string> = {
  200: 'OK',
  206: 'Partial Content',
  302: 'Found',
  400: 'Bad Request',
  403: 'Forbidden',
  404: 'Not Found',
  500: 'Internal Server Error',
}

const DEFAULT_CONTENT_TYPE = 'text/html; charset=utf-8'

function reasonPhrase (status: number) {
  return REASONS[status] || 'OK'
}

function classify (result: unknown): HandlerReturn {
  if (Array.isArray(result)) {
    const tuple: unknown[] = result
    if (tuple.length !== 2 && tuple.length !== 3) {
      throw new InvalidResponseShapeError(`expected [status, body] or [status, body, headers], got ${tuple.length} elements`)
    }

    const [status, body, headers] = tuple
    if (!isStatus(status)) {
      throw new InvalidResponseShapeError(`invalid status ${String(status)}`)
    }
    if (!isResponseBody(body)) {
      throw new InvalidResponseShapeError(`invalid body of type ${typeof body}`)
    }
    if (tuple.length === 2) {
      return { kind: 'status-body', status, body }
    }
    if (!isHeaderList(headers)) {
      throw new InvalidResponseShapeError('headers must be a list of [name, value] string pairs')
    }
    return { kind: 'status-body-headers', status, body, headers }
  }

  if (isResponseBody(result)) {
    return { kind: 'body', body: result }
  }

  throw new InvalidResponseShapeError(`unsupported return value of type ${result === null ? 'null' : typeof result}`)
}

function normalize (ret: HandlerReturn, { sessionId, headers = [] }: NormalizeOptions): NormalizedResponse {
  let status = 200
  let declared: HeaderList = []
  switch (ret.kind) {
    case 'body':
      break
    case 'status-body':
      status = ret.status
      break
    case 'status-body-headers':
      status = ret.status
      declared = ret.headers
      break
  }

  return {
    status,
    reason: reasonPhrase(status),
    headers: ensureHeaders([...headers, ...declared], sessionId),
    body: toBody(ret.body)
  }
}

/**
 * Client-facing response for a failed request. 5xx bodies are fixed strings;
 * the failure itself is only ever logged.
 */
function errorResponse (err: unknown, { sessionId, headers = [] }: NormalizeOptions): NormalizedResponse {
  const status = isHttpError(err) ? err.status : 500
  const message = isHttpError(err) ? err.message : '500 Internal Server Error'

  return {
    status,
    reason: reasonPhrase(status),
    headers: ensureHeaders([...headers], sessionId),
    body: Buffer.from(message, 'utf8')
  }
}

/**
 * Leaves exactly one `Content-Type` and one session `Set-Cookie` in the list.
 * Later entries win, so a handler's headers replace pre-populated ones; the
 * defaults are appended only when no entry is left.
 */
function ensureHeaders (headers: HeaderList, sessionId: string): HeaderList {
  const lastContentType = findLastIndex(headers, isContentType)
  const lastSessionCookie = findLastIndex(headers, isSessionCookie)
  const result: HeaderList = headers.filter((header, idx) => (
    (!isContentType(header) || idx === lastContentType) &&
    (!isSessionCookie(header) || idx === lastSessionCookie)
  ))

  if (lastSessionCookie === -1) {
    result.push(['Set-Cookie', buildSetCookie(sessionId)])
  }
  if (lastContentType === -1) {
    result.push(['Content-Type', DEFAULT_CONTENT_TYPE])
  }
  return result
}

function isContentType ([name]: [string, string]) {
  return name.toLowerCase() === 'content-type'
}

function isSessionCookie ([name, value]: [string, string]) {
  return name.toLowerCase() === 'set-cookie' && value.includes(`${SESSION_COOKIE}=`)
}

function findLastIndex (headers: HeaderList, test: (header: [string, string]) => boolean) {
  for (let idx = headers.length - 1; idx >= 0; --idx) {
    if (test(headers[idx])) {
      return idx
    }
  }
  return -1
}

function toBody (body: ResponseBody): Buffer | AsyncIterable<Buffer> {
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf8')
  }
  if (body instanceof Uint8Array) {
    return toBuffer(body)
  }
  return chunks(body)
}

async function * chunks (body: Iterable<unknown> | AsyncIterable<unknown>): AsyncGenerator<Buffer> {
  if (isAsyncIterable(body)) {
    for await (const chunk of body) {
      yield toChunk(chunk)
    }
  } else {
    for (const chunk of body) {
      yield toChunk(chunk)
    }
  }
}

function toChunk (chunk: unknown): Buffer {
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8')
  }
  if (chunk instanceof Uint8Array) {
    return toBuffer(chunk)
  }
  throw new InvalidResponseShapeError(`invalid body chunk of type ${chunk === null ? 'null' : typeof chunk}`)
}

function toBuffer (bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
}

function isStatus (value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 100 && value <= 999
}

function isResponseBody (value: unknown): value is ResponseBody {
  if (typeof value === 'string' || value instanceof Uint8Array) {
    return true
  }
  return !Array.isArray(value) && (isAsyncIterable(value) || isIterable(value))
}

function isIterable (value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value && typeof value[Symbol.iterator] === 'function'
}

function isAsyncIterable (value: unknown): value is AsyncIterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value && typeof value[Symbol.asyncIterator] === 'function'
}

// Same rules Node applies in `setHeader`, checked before anything is written.
const TOKEN = /^[\^_`a-zA-Z\-0-9!#$%&'*+.|~]+$/
const INVALID_VALUE = /[^\t\x20-\x7e\x80-\xff]/

function isHeaderList (value: unknown): value is HeaderList {
  if (!Array.isArray(value)) {
    return false
  }
  const entries: unknown[] = value
  return entries.every(entry => {
    if (!Array.isArray(entry) || entry.length !== 2) {
      return false
    }
    const [name, val]: unknown[] = entry
    return typeof name === 'string' && typeof val === 'string' && isValidHeader(name, val)
  })
}

function isValidHeader (name: string, value: string) {
  return TOKEN.test(name) && !INVALID_VALUE.test(value)
}

export {
  HandlerReturn,
  NormalizeOptions,
  NormalizedResponse,
  ResponseBody,
  classify,
  ensureHeaders,
  isValidHeader,
  errorResponse,
  normalize,
  reasonPhrase,
}
