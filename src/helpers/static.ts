import { promises as fs } from 'fs'
import mime from 'mime'
import path from 'path'

import { HeaderList } from '../core/handler'

type StaticResponse = [number, string] | [number, Buffer, HeaderList]

// Resolves `relativePath` under `root`, refusing anything that climbs out of it.
async function serveStatic (relativePath: string, { root = 'static' }: { root?: string } = {}): Promise<StaticResponse> {
  const base = path.resolve(root)
  const target = path.resolve(base, relativePath)
  if (target !== base && !target.startsWith(base + path.sep)) {
    return [403, '403 Forbidden']
  }

  const stat = await fs.stat(target).catch((err: NodeJS.ErrnoException) => {
    if (err.code === 'ENOENT' || err.code === 'ENOTDIR') {
      return null
    }
    throw err
  })
  if (!stat || !stat.isFile()) {
    return [404, '404 Not Found']
  }

  const data = await fs.readFile(target)
  const mimetype = mime.getType(target) || 'application/octet-stream'
  return [200, data, [['Content-Type', mimetype]]]
}

export { StaticResponse, serveStatic }
