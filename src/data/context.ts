import { IncomingMessage } from 'http'
import querystring from 'querystring'
import * as uuid from 'uuid'
import { URL } from 'url'

import { Fields, Files } from '../core/body'
import { HeaderList } from '../core/handler'
import { toFields } from '../body/urlencoded'
import { Session } from './session'
import { Cookie } from './cookie'

type DispatchState =
  | 'receiving-headers'
  | 'resolving-session'
  | 'buffering-body'
  | 'decoding-body'
  | 'resolving-route'
  | 'binding-arguments'
  | 'invoking'
  | 'normalizing-response'
  | 'emitting'
  | 'done'
  | 'error'

/**
 * Everything known about one request. Owned by the dispatcher for the
 * lifetime of the request, and passed to handlers as `this`.
 */
class Context {
  private _parsedUrl?: URL
  private _query?: Fields
  private _cookie?: Cookie
  private _session?: Session

  public id: string
  public start: number
  public remote: string
  public host: string
  public state: DispatchState = 'receiving-headers'

  /** Set once the request has failed; the request then ends in the `error` state. */
  public error?: unknown

  /** Name of the handler the request was routed to. */
  public handlerName?: string

  /** Every segment of the decoded request path. */
  public segments: string[] = []

  /** Path segments left over for positional binding once the handler is chosen. */
  public params: string[] = []

  public body: Fields = new Map()
  public files: Files = new Map()

  /**
   * Headers to send ahead of whatever the handler declares. Middleware may
   * push to this before calling `next`.
   */
  public responseHeaders: HeaderList = []

  constructor (public request: IncomingMessage) {
    this.start = Date.now()
    this.remote = request.socket
      ? (request.socket.remoteAddress || '').replace('::ffff:', '')
      : ''
    const [host] = (request.headers.host || '').split(':')
    this.host = host

    this.id = String(request.headers['x-request-id'] || uuid.v4())
  }

  get method (): string {
    return this.request.method || 'GET'
  }

  get headers () {
    return this.request.headers
  }

  get url () {
    if (!this._parsedUrl) {
      // Only the path and query are read, so the base never comes from the
      // Host header. Origin-form targets are appended rather than resolved,
      // keeping `//a/b` a path.
      const target = String(this.request.url || '/')
      this._parsedUrl = target.startsWith('/')
        ? new URL(`http://localhost${target}`)
        : new URL(target, 'http://localhost')
    }
    return this._parsedUrl
  }

  get path () {
    return this.url.pathname
  }

  get query (): Fields {
    this._query = this._query || toFields(querystring.parse(this.url.search.slice(1)))
    return this._query
  }

  get cookie (): Cookie {
    this._cookie = this._cookie || Cookie.from(this.headers.cookie || '')
    return this._cookie
  }

  get session (): Session {
    if (!this._session) {
      throw new Error('context.session is not available until the dispatcher has resolved it')
    }
    return this._session
  }

  set session (session: Session) {
    this._session = session
  }

  get hasSession () {
    return Boolean(this._session)
  }
}

export { Context, DispatchState }
