/**
 * A session's attribute bag. Concurrent requests carrying the same session
 * id share one instance; writes are last-write-wins.
 */
class Session extends Map<string, unknown> {
  public lastAccess: number

  constructor (public readonly id: string, now: number = Date.now(), entries?: Iterable<readonly [string, unknown]>) {
    super(entries)
    this.lastAccess = now
  }

  touch (now: number = Date.now()) {
    this.lastAccess = now
    return this
  }

  isExpired (timeoutMs: number, now: number = Date.now()) {
    return this.lastAccess + timeoutMs <= now
  }
}

export { Session }
