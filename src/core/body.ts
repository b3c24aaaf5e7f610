interface ContentType {
  vnd: string,
  type: string,
  subtype: string,
  charset: string,
  params: Map<string, string>
}

interface FileRecord {
  readonly filename: string,
  readonly contentType: string,
  readonly data: Buffer
}

type Fields = Map<string, string[]>
type Files = Map<string, FileRecord>

interface DecodedBody {
  fields: Fields,
  files: Files
}

interface BodyInput {
  raw: Buffer,
  contentType: ContentType
}

interface BodyParser {
  (input: BodyInput): DecodedBody
}

interface BodyParserDefinition {
  (next: BodyParser): BodyParser
}

function emptyBody (): DecodedBody {
  return { fields: new Map(), files: new Map() }
}

// Content types nobody claims decode to nothing; the core does not attempt
// generic parsing.
function buildBodyParser (bodyParsers: BodyParserDefinition[]): BodyParser {
  return bodyParsers.reduceRight((lhs: BodyParser, rhs: BodyParserDefinition) => rhs(lhs), emptyBody)
}

function decodeBody (bodyParser: BodyParser, raw: Buffer, header: string | undefined): DecodedBody {
  return bodyParser({ raw, contentType: parseContentType(header) })
}

function parseContentType (header: string | undefined): ContentType {
  const [contentType, ...attrs] = (header || 'application/octet-stream').split(';').map(xs => xs.trim())
  const params = new Map<string, string>()
  for (const attr of attrs) {
    const idx = attr.indexOf('=')
    if (idx === -1) {
      continue
    }
    params.set(attr.slice(0, idx).trim().toLowerCase(), unquote(attr.slice(idx + 1).trim()))
  }
  const charset = (params.get('charset') || 'utf-8').toLowerCase()
  const [type, vndsubtype = ''] = contentType.toLowerCase().split('/')
  const subtypeParts = vndsubtype.split('+')
  const subtype = subtypeParts.pop() || ''

  return {
    vnd: subtypeParts.join('+'),
    type,
    subtype,
    charset,
    params
  }
}

function unquote (value: string) {
  return value.replace(/^("(.*)")|('(.*)')$/, '$2$4')
}

export {
  BodyInput,
  BodyParser,
  BodyParserDefinition,
  ContentType,
  DecodedBody,
  Fields,
  FileRecord,
  Files,
  buildBodyParser,
  decodeBody,
  emptyBody,
  parseContentType,
  unquote,
}
