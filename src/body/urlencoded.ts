import querystring from 'querystring'

import { BodyInput, BodyParser, Fields } from '../core/body'

function urlEncoded (next: BodyParser) {
  return (input: BodyInput) => {
    if (
      input.contentType.type !== 'application' ||
      input.contentType.subtype !== 'x-www-form-urlencoded'
    ) {
      return next(input)
    }

    // XXX: AFAICT there's no way to get the querystring parser to throw, hence
    // the lack of a try/catch here.
    return {
      fields: toFields(querystring.parse(input.raw.toString('utf8'))),
      files: new Map()
    }
  }
}

function toFields (parsed: querystring.ParsedUrlQuery): Fields {
  const fields: Fields = new Map()
  for (const [key, value] of Object.entries(parsed)) {
    if (value === undefined) {
      continue
    }
    fields.set(key, Array.isArray(value) ? value : [value])
  }
  return fields
}

export { urlEncoded, toFields }
