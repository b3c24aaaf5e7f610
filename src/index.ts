export { runserver, createListener, ListenerOptions, ServerOptions } from './bin/runserver'
export { buildBodyParser, decodeBody, parseContentType, BodyParser, BodyParserDefinition, DecodedBody, Fields, Files, FileRecord } from './core/body'
export { bindArguments, BindingSources } from './core/bind'
export { dispatcher, emit } from './core/dispatch'
export { Handler, HeaderList, Response, ParameterConfig } from './core/handler'
export { buildMiddleware, Adaptor, Middleware, MiddlewareConfig, Next } from './core/middleware'
export { FALLBACK_HANDLER, SESSION_COOKIE, SESSION_TIMEOUT_SECONDS } from './core/prelude'
export { classify, normalize, errorResponse, reasonPhrase, NormalizedResponse } from './core/response'
export { Router, Route, RouteMatch } from './core/routes'
export { SessionStore } from './core/sessions'
export { urlEncoded } from './body/urlencoded'
export { multipart } from './body/multipart'
export { Context } from './data/context'
export { Cookie, parseCookies, buildSetCookie } from './data/cookie'
export { Session } from './data/session'
export * from './data/errors'
export { applyHeaders, applyXFO } from './middleware/apply-headers'
export { log } from './middleware/log'
export { configureTemplates, render } from './helpers/render'
export { serveStatic } from './helpers/static'
export { redirect } from './helpers/redirect'
