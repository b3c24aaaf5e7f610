import { STATUS } from '../core/prelude'

type ErrorKind =
  | 'MalformedBody'
  | 'MissingParameter'
  | 'RouteNotFound'
  | 'InvalidResponseShape'
  | 'HandlerFailure'

abstract class HttpError extends Error {
  // don't use default values on computed symbol props; assign them in the
  // constructor instead.
  [STATUS]: number
  abstract readonly kind: ErrorKind

  constructor (message: string, status: number, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this[STATUS] = status
  }

  get status () {
    return this[STATUS]
  }
}

class MalformedBodyError extends HttpError {
  readonly kind = 'MalformedBody'

  constructor (reason: string) {
    super(`400 Bad Request: ${reason}`, 400)
  }
}

class MissingParameterError extends HttpError {
  readonly kind = 'MissingParameter'

  constructor (public parameter: string) {
    super(`400 Bad Request: Missing required parameter '${parameter}'`, 400)
  }
}

class RouteNotFoundError extends HttpError {
  readonly kind = 'RouteNotFound'

  constructor (public pathname: string) {
    super('404 Not Found', 404)
    Error.captureStackTrace(this, RouteNotFoundError)
  }
}

class InvalidResponseShapeError extends HttpError {
  readonly kind = 'InvalidResponseShape'

  constructor (public detail: string) {
    super('500 Internal Server Error: Invalid response shape', 500)
  }
}

class HandlerFailureError extends HttpError {
  readonly kind = 'HandlerFailure'

  constructor (public handler: string, cause: unknown) {
    super('500 Internal Server Error', 500, { cause })
  }
}

class TemplateUnavailableError extends Error {
  constructor (name: string) {
    super(`Cannot render "${name}": no template engine configured (call configureTemplates() first)`)
    this.name = 'TemplateUnavailableError'
  }
}

function isHttpError (err: unknown): err is HttpError {
  return err instanceof HttpError
}

export {
  ErrorKind,
  HttpError,
  MalformedBodyError,
  MissingParameterError,
  RouteNotFoundError,
  InvalidResponseShapeError,
  HandlerFailureError,
  TemplateUnavailableError,
  isHttpError,
}
