#!/usr/bin/env node
import bole from 'bole'
import isDev from 'are-we-dev'
import path from 'path'

import { runserver } from './bin/runserver'
import { log } from './middleware/log'

function loadHandlers (target: string): Record<string, unknown> {
  const mod: unknown = require(path.resolve(target))
  if (!isRecord(mod)) {
    throw new Error(`${target} does not export any handlers`)
  }
  return isRecord(mod.handlers) ? mod.handlers : mod
}

function isRecord (value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' || typeof value === 'function') && value !== null
}

async function main (argv: string[]) {
  const [target] = argv
  if (!target) {
    throw new Error('usage: minnow <handlers-module>')
  }

  const logger = bole('minnow:server')
  const server = await runserver({
    handlers: loadHandlers(target),
    middleware: [log],
  })

  // Outside development, let open connections finish on the first ^C.
  if (!isDev()) {
    let isClosing = false
    process.on('SIGINT', () => {
      if (isClosing) {
        process.exit(1)
      }
      logger.info('Caught SIGINT, preparing to shutdown. If running on the command line another ^C will close the app immediately.')
      isClosing = true
      server.close()
    })
  }

  server.listen(Number(process.env.PORT) || 8000, () => {
    const addrinfo = server.address()
    if (!addrinfo) {
      return
    }
    logger.info(`now listening on port ${typeof addrinfo == 'string' ? addrinfo : addrinfo.port}`)
  })
}

/* istanbul ignore next */
if (require.main === module) {
  main(process.argv.slice(2)).catch((err: unknown) => {
    console.error(err instanceof Error ? err.stack : err)
    process.exit(1)
  })
}

export { loadHandlers, main }
