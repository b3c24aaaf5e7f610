import path from 'path'

import { Context, serveStatic } from '../../src'

const root = path.join(__dirname, 'static')

// Unknown paths fall through to `index`, which serves them from ./static.
async function index (this: Context, file: string) {
  if (!file) {
    return 'Hello, World!'
  }
  return serveStatic(this.params.join('/'), { root })
}
index.params = [{ name: 'file', default: '' }]

export const handlers = { index }
