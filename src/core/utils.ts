import { Readable } from 'stream'

async function _collect (request: Readable) {
  const acc: Buffer[] = []
  for await (const chunk of request) {
    acc.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk)
  }
  return Buffer.concat(acc)
}

export { _collect }
