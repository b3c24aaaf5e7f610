import { BodyInput, BodyParser, DecodedBody, emptyBody, unquote } from '../core/body'
import { MalformedBodyError } from '../data/errors'

const CRLF = Buffer.from('\r\n')
const HEADER_END = Buffer.from('\r\n\r\n')
const CLOSE = Buffer.from('--')
const CLOSE_CRLF = Buffer.from('--\r\n')

function multipart (next: BodyParser) {
  return (input: BodyInput) => {
    if (
      input.contentType.type !== 'multipart' ||
      input.contentType.subtype !== 'form-data'
    ) {
      return next(input)
    }

    const boundary = input.contentType.params.get('boundary')
    if (!boundary) {
      throw new MalformedBodyError('Boundary not found in Content-Type header')
    }

    return parseMultipart(input.raw, boundary)
  }
}

/**
 * Splits `body` on `--<boundary>` and sorts each part into form fields or
 * file records. Parts without a blank line between headers and content, or
 * without a `name`, are skipped.
 */
function parseMultipart (body: Buffer, boundary: string): DecodedBody {
  const decoded = emptyBody()

  for (let section of split(body, Buffer.from(`--${boundary}`))) {
    if (section.length === 0 || section.equals(CLOSE) || section.equals(CLOSE_CRLF)) {
      continue
    }
    if (startsWith(section, CRLF)) {
      section = section.subarray(CRLF.length)
    }
    if (endsWith(section, CRLF)) {
      section = section.subarray(0, section.length - CRLF.length)
    }
    if (section.equals(CLOSE)) {
      continue
    }

    const idx = section.indexOf(HEADER_END)
    if (idx === -1) {
      continue
    }

    const headers = parseHeaders(section.subarray(0, idx).toString('utf8'))
    const content = section.subarray(idx + HEADER_END.length)
    const disposition = parseDisposition(headers.get('content-disposition') || '')
    const name = disposition.get('name')
    const filename = disposition.get('filename')

    if (name === undefined) {
      continue
    }

    if (filename) {
      decoded.files.set(name, {
        filename,
        contentType: headers.get('content-type') || 'application/octet-stream',
        data: Buffer.from(content)
      })
      continue
    }

    const values = decoded.fields.get(name)
    if (values) {
      values.push(content.toString('utf8'))
    } else {
      decoded.fields.set(name, [content.toString('utf8')])
    }
  }

  return decoded
}

function parseHeaders (block: string) {
  const headers = new Map<string, string>()
  for (const line of block.split('\r\n')) {
    const idx = line.indexOf(':')
    if (idx === -1) {
      continue
    }
    headers.set(line.slice(0, idx).trim().toLowerCase(), line.slice(idx + 1).trim())
  }
  return headers
}

function parseDisposition (value: string) {
  const params = new Map<string, string>()
  for (const part of value.split(';')) {
    const idx = part.indexOf('=')
    if (idx === -1) {
      continue
    }
    params.set(part.slice(0, idx).trim().toLowerCase(), unquote(part.slice(idx + 1).trim()))
  }
  return params
}

function split (buf: Buffer, separator: Buffer): Buffer[] {
  const parts: Buffer[] = []
  let start = 0
  let idx = buf.indexOf(separator, start)
  while (idx !== -1) {
    parts.push(buf.subarray(start, idx))
    start = idx + separator.length
    idx = buf.indexOf(separator, start)
  }
  parts.push(buf.subarray(start))
  return parts
}

function startsWith (buf: Buffer, prefix: Buffer) {
  return buf.length >= prefix.length && buf.subarray(0, prefix.length).equals(prefix)
}

function endsWith (buf: Buffer, suffix: Buffer) {
  return buf.length >= suffix.length && buf.subarray(buf.length - suffix.length).equals(suffix)
}

export { multipart, parseMultipart }
