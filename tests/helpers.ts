import path from 'path'
import t from 'tap'

import { TemplateUnavailableError } from '../src/data/errors'
import { redirect } from '../src/helpers/redirect'
import { configureTemplates, render, resetTemplates } from '../src/helpers/render'
import { serveStatic } from '../src/helpers/static'

const fixtures = path.join(__dirname, 'fixtures')
const root = path.join(fixtures, 'static')

t.test('render fails until templates are configured', async (assert) => {
  resetTemplates()
  await assert.rejects(render('hello.html'), new TemplateUnavailableError('hello.html'))
})

t.test('render fills in and escapes variables', async (assert) => {
  configureTemplates(path.join(fixtures, 'templates'))
  assert.teardown(resetTemplates)

  assert.equal(await render('hello.html', { name: '<b>world</b>' }), 'Hello, &lt;b&gt;world&lt;/b&gt;!')
})

t.test('render rejects unknown templates', async (assert) => {
  configureTemplates(path.join(fixtures, 'templates'))
  assert.teardown(resetTemplates)

  await assert.rejects(render('missing.html'))
})

t.test('serveStatic returns the file with its mime type', async (assert) => {
  assert.same(await serveStatic('note.txt', { root }), [200, Buffer.from('note'), [['Content-Type', 'text/plain']]])
})

t.test('serveStatic falls back to application/octet-stream', async (assert) => {
  assert.same(await serveStatic('blob.zzz', { root }), [200, Buffer.from('zz'), [['Content-Type', 'application/octet-stream']]])
})

t.test('serveStatic refuses paths outside the root', async (assert) => {
  assert.same(await serveStatic('../templates/hello.html', { root }), [403, '403 Forbidden'])
  assert.same(await serveStatic('/etc/passwd', { root }), [403, '403 Forbidden'])
})

t.test('serveStatic reports missing files and directories as 404', async (assert) => {
  assert.same(await serveStatic('nope.txt', { root }), [404, '404 Not Found'])
  assert.same(await serveStatic('.', { root }), [404, '404 Not Found'])
  assert.same(await serveStatic('note.txt/child', { root }), [404, '404 Not Found'])
})

t.test('redirect answers 302 with a location', async (assert) => {
  assert.same(redirect('/paste/1'), [
    302,
    "<html><head><meta http-equiv='refresh' content='0;url=/paste/1'></head></html>",
    [['Location', '/paste/1']],
  ])
})
