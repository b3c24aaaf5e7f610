import querystring from 'querystring'
import t from 'tap'

import { buildBodyParser, decodeBody, parseContentType } from '../src/core/body'
import { multipart, parseMultipart } from '../src/body/multipart'
import { urlEncoded } from '../src/body/urlencoded'
import { MalformedBodyError } from '../src/data/errors'

const parser = buildBodyParser([urlEncoded, multipart])

function form (boundary: string, parts: string[][]) {
  return Buffer.from(
    parts.map(lines => `--${boundary}\r\n${lines.join('\r\n')}\r\n`).join('') + `--${boundary}--\r\n`
  )
}

t.test('parseContentType lowercases and reads parameters', async (assert) => {
  const contentType = parseContentType('Multipart/Form-Data; Boundary="abc"; charset=UTF-8')
  assert.equal(contentType.type, 'multipart')
  assert.equal(contentType.subtype, 'form-data')
  assert.equal(contentType.charset, 'utf-8')
  assert.equal(contentType.params.get('boundary'), 'abc')
})

t.test('parseContentType splits vendor prefixes', async (assert) => {
  const contentType = parseContentType('application/vnd.example+json')
  assert.equal(contentType.vnd, 'vnd.example')
  assert.equal(contentType.subtype, 'json')
})

t.test('url-encoded bodies keep every value in order', async (assert) => {
  const { fields, files } = decodeBody(parser, Buffer.from('a=1&b=two%20words&a=2&empty='), 'application/x-www-form-urlencoded')
  assert.same([...fields], [['a', ['1', '2']], ['b', ['two words']], ['empty', ['']]])
  assert.equal(files.size, 0)
})

t.test('unclaimed content types decode to nothing', async (assert) => {
  const { fields, files } = decodeBody(parser, Buffer.from('{"a":1}'), 'application/json')
  assert.equal(fields.size, 0)
  assert.equal(files.size, 0)
})

t.test('multipart separates fields and files', async (assert) => {
  const raw = form('XyZ', [
    ['Content-Disposition: form-data; name="title"', '', 'hello'],
    ['Content-Disposition: form-data; name="title"', '', 'again'],
    ['Content-Disposition: form-data; name="file"; filename="a.txt"', 'Content-Type: text/plain', '', 'abc'],
  ])

  const { fields, files } = decodeBody(parser, raw, 'multipart/form-data; boundary=XyZ')
  assert.same(fields.get('title'), ['hello', 'again'])

  const file = files.get('file')
  assert.ok(file)
  assert.equal(file?.filename, 'a.txt')
  assert.equal(file?.contentType, 'text/plain')
  assert.equal(file?.data.toString('utf8'), 'abc')
})

t.test('multipart file parts default to application/octet-stream', async (assert) => {
  const raw = form('b', [
    ['Content-Disposition: form-data; name="blob"; filename="x.bin"', '', '\u0001\u0002'],
  ])
  const { files } = parseMultipart(raw, 'b')
  assert.equal(files.get('blob')?.contentType, 'application/octet-stream')
  assert.same([...(files.get('blob')?.data || [])], [1, 2])
})

t.test('multipart keeps CRLF inside part content', async (assert) => {
  const raw = form('b', [
    ['Content-Disposition: form-data; name="text"', '', 'line one', 'line two'],
  ])
  const { fields } = parseMultipart(raw, 'b')
  assert.same(fields.get('text'), ['line one\r\nline two'])
})

t.test('multipart skips parts without a name or without a header terminator', async (assert) => {
  const raw = form('b', [
    ['Content-Disposition: form-data', '', 'nameless'],
    ['Content-Disposition: form-data; name="broken"'],
    ['Content-Disposition: form-data; name="kept"', '', 'yes'],
  ])
  const { fields, files } = parseMultipart(raw, 'b')
  assert.same([...fields], [['kept', ['yes']]])
  assert.equal(files.size, 0)
})

t.test('multipart without a boundary is malformed', async (assert) => {
  assert.throws(
    () => decodeBody(parser, Buffer.from(''), 'multipart/form-data'),
    new MalformedBodyError('Boundary not found in Content-Type header')
  )
})

t.test('url-encoded fields survive a querystring round trip', async (assert) => {
  const original = {
    tag: ['a&b', 'c=d', 'e f'],
    path: ['/x/y?z#w'],
    unicode: ['café ☕'],
    'key with spaces': ['+plus+'],
    empty: [''],
  }

  const raw = Buffer.from(querystring.stringify(original))
  const { fields } = decodeBody(parser, raw, 'application/x-www-form-urlencoded')
  assert.same(Object.fromEntries(fields), original)
})
