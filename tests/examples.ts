import path from 'path'
import t from 'tap'

import { handlers as fileUploads, uploads } from '../examples/file-uploads/handlers'
import { handlers as headers } from '../examples/headers/handlers'
import { handlers as pastebin, pastes } from '../examples/pastebin/handlers'
import { handlers as staticContent } from '../examples/static-content/handlers'
import { loadHandlers } from '../src/main'
import { testClient } from '../src/testing'

t.test('headers: security headers replace the defaults', async (assert) => {
  const client = await testClient({ handlers: headers })
  const response = await client.request({ url: '/' })

  assert.equal(response.payload, 'hello world')
  assert.equal(response.headers['content-type'], 'text/html')
  assert.equal(response.headers['x-frame-options'], 'DENY')
  assert.equal(response.headers['content-security-policy'], "default-src 'self'")
})

t.test('file-uploads: accepts a multi-part file', async (assert) => {
  const client = await testClient({ handlers: fileUploads })
  const payload = [
    '--upload',
    'Content-Disposition: form-data; name="file"; filename="a.txt"',
    'Content-Type: text/plain',
    '',
    'abc',
    '--upload--',
    '',
  ].join('\r\n')

  const response = await client.request({
    method: 'POST',
    url: '/upload',
    headers: { 'content-type': 'multipart/form-data; boundary=upload' },
    payload,
  })

  assert.equal(response.statusCode, 200)
  assert.equal(response.payload, "File 'a.txt' uploaded successfully (3 bytes).")
  assert.equal(uploads.size, 1)
})

t.test('file-uploads: rejects a post without a file', async (assert) => {
  const client = await testClient({ handlers: fileUploads })
  const response = await client.request({
    method: 'POST',
    url: '/upload',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    payload: '',
  })

  assert.equal(response.statusCode, 400)
  assert.equal(response.payload, 'No file uploaded.')
})

t.test('static-content: serves files through the fallback handler', async (assert) => {
  const client = await testClient({ handlers: staticContent })

  assert.equal((await client.request({ url: '/' })).payload, 'Hello, World!')

  const text = await client.request({ url: '/hello.txt' })
  assert.equal(text.statusCode, 200)
  assert.equal(text.payload, 'hello from disk\n')
  assert.equal(text.headers['content-type'], 'text/plain')

  const css = await client.request({ url: '/css/site.css' })
  assert.equal(css.headers['content-type'], 'text/css')

  const missing = await client.request({ url: '/missing.txt' })
  assert.equal(missing.statusCode, 404)
  assert.equal(missing.payload, '404 Not Found')
})

t.test('pastebin: create, view and delete a paste', async (assert) => {
  const client = await testClient({ handlers: pastebin })

  const form = await client.request({ url: '/' })
  assert.match(form.payload, /<textarea name="paste_content"/)

  const created = await client.request({
    method: 'POST',
    url: '/',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    payload: 'paste_content=%3Cb%3Ehi%3C%2Fb%3E',
  })
  assert.equal(created.statusCode, 302)
  const location = String(created.headers.location)
  assert.match(location, /^\/paste\/[0-9a-f-]{36}$/)
  assert.equal(pastes.size, 1)

  const view = await client.request({ url: location })
  assert.equal(view.statusCode, 200)
  assert.match(view.payload, '<pre id="paste">&lt;b&gt;hi&lt;/b&gt;</pre>')

  const deleted = await client.request({ url: `${location}?delete=delete` })
  assert.equal(deleted.statusCode, 302)
  assert.equal(deleted.headers.location, '/')
  assert.equal(pastes.size, 0)

  const gone = await client.request({ url: location })
  assert.equal(gone.statusCode, 404)
})

t.test('loadHandlers reads a module\'s handlers export', async (assert) => {
  const loaded = loadHandlers(path.join(__dirname, '..', 'examples', 'headers', 'handlers'))
  assert.equal(loaded.index, headers.index)
})
