import fs from 'fs'
import path from 'path'

const STATUS = Symbol.for('status')

const FALLBACK_HANDLER = 'index'
const SESSION_COOKIE = 'session_id'
const SESSION_TIMEOUT_SECONDS = 8 * 60 * 60

const serviceName = _getServiceName()

function _getServiceName (): string {
  if (process.env.SERVICE_NAME) {
    return process.env.SERVICE_NAME
  }

  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(process.cwd(), 'package.json'), 'utf8'))
    if (pkg && typeof pkg === 'object' && 'name' in pkg && typeof pkg.name === 'string') {
      return pkg.name.split('/').pop() || 'minnow'
    }
  } catch {
    // no readable package.json in the working directory
  }
  return 'minnow'
}

export {
  STATUS,
  FALLBACK_HANDLER,
  SESSION_COOKIE,
  SESSION_TIMEOUT_SECONDS,
  serviceName,
}
