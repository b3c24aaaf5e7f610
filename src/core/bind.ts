import { Fields, Files } from './body'
import { Parameter } from './handler'
import { MissingParameterError } from '../data/errors'

interface BindingSources {
  params: readonly string[],
  query: Fields,
  body: Fields,
  files: Files,
  session: ReadonlyMap<string, unknown>
}

/**
 * Resolves each declared parameter, in order, from: the next unclaimed path
 * segment, the query string, the body, uploaded files, the session, and
 * finally the declared default. Throws {@link MissingParameterError} for the
 * first parameter none of those supply.
 */
function bindArguments (parameters: readonly Parameter[], sources: BindingSources): unknown[] {
  const positional = [...sources.params]
  const args: unknown[] = []

  for (const param of parameters) {
    args.push(bindOne(param, positional, sources))
  }

  return args
}

function bindOne (param: Parameter, positional: string[], sources: BindingSources): unknown {
  const segment = positional.shift()
  if (segment !== undefined) {
    return segment
  }

  const fromQuery = sources.query.get(param.name)
  if (fromQuery) {
    return fromQuery[0]
  }

  const fromBody = sources.body.get(param.name)
  if (fromBody) {
    return fromBody[0]
  }

  const file = sources.files.get(param.name)
  if (file) {
    return file
  }

  if (sources.session.has(param.name)) {
    return sources.session.get(param.name)
  }

  if (param.hasDefault) {
    return param.default
  }

  throw new MissingParameterError(param.name)
}

export { BindingSources, bindArguments }
