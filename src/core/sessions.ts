import bole from 'bole'
import * as uuid from 'uuid'

import { SESSION_TIMEOUT_SECONDS } from './prelude'
import { Session } from '../data/session'

interface ResolvedSession {
  session: Session,
  created: boolean
}

/**
 * Process-wide map of session id to {@link Session}.
 *
 * Node runs every request on a single event loop, and neither `resolve` nor
 * `sweep` yields while it touches the map, so inserts, lookups and the bulk
 * eviction of a sweep can never interleave. Attribute bags are shared between
 * concurrent requests with the same id and are not locked.
 */
class SessionStore {
  public readonly timeoutMs: number
  private sessions = new Map<string, Session>()
  private sweeper?: NodeJS.Timeout
  private logger = bole('minnow:sessions')

  constructor ({
    timeoutSeconds = Number(process.env.SESSION_TIMEOUT) || SESSION_TIMEOUT_SECONDS,
  }: {
    timeoutSeconds?: number
  } = {}) {
    this.timeoutMs = timeoutSeconds * 1000
  }

  get size () {
    return this.sessions.size
  }

  has (id: string) {
    return this.sessions.has(id)
  }

  get (id: string) {
    return this.sessions.get(id)
  }

  resolve (id: string | undefined, now: number = Date.now()): ResolvedSession {
    const existing = id === undefined ? undefined : this.sessions.get(id)
    if (existing) {
      return { session: existing.touch(now), created: false }
    }

    let fresh = uuid.v4()
    while (this.sessions.has(fresh)) {
      fresh = uuid.v4()
    }

    const session = new Session(fresh, now)
    this.sessions.set(fresh, session)
    return { session, created: true }
  }

  sweep (now: number = Date.now()): number {
    let removed = 0
    for (const [id, session] of this.sessions) {
      if (session.isExpired(this.timeoutMs, now)) {
        this.sessions.delete(id)
        ++removed
      }
    }

    if (removed) {
      this.logger.debug(`swept ${removed} expired session(s); ${this.sessions.size} remain`)
    }
    return removed
  }

  startSweeping (intervalMs: number) {
    this.stopSweeping()
    this.sweeper = setInterval(() => this.sweep(), intervalMs)
    this.sweeper.unref()
  }

  stopSweeping () {
    if (this.sweeper) {
      clearInterval(this.sweeper)
      this.sweeper = undefined
    }
  }

  close () {
    this.stopSweeping()
    this.sessions.clear()
  }
}

export { ResolvedSession, SessionStore }
