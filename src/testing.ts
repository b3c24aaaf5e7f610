import { inject } from '@hapi/shot'
import type { RequestOptions as ShotRequestOptions, ResponseObject } from '@hapi/shot'

import { ListenerOptions, createListener } from './bin/runserver'
import { SessionStore } from './core/sessions'

type TestRequestOptions = Partial<ShotRequestOptions> & { body?: string | Buffer }

interface TestClient {
  sessions: SessionStore,
  request(opts?: TestRequestOptions): Promise<ResponseObject>
}

/**
 * Builds the same request listener `runserver` would, and injects requests
 * into it without opening a socket.
 *
 * ```ts
 * const client = await testClient({ handlers })
 * const response = await client.request({ url: '/greet/42' })
 * ```
 */
async function testClient ({
  sessions = new SessionStore(),
  ...options
}: ListenerOptions = {}): Promise<TestClient> {
  const listener = await createListener({ ...options, sessions })

  return {
    sessions,
    request ({
      method = 'GET',
      url = '/',
      headers = {},
      body,
      payload,
      ...opts
    }: TestRequestOptions = {}) {
      return inject(listener, {
        method,
        url,
        headers,
        payload: payload || body,
        ...opts,
      })
    }
  }
}

export { TestClient, TestRequestOptions, testClient }
