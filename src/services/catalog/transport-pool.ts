import {
  LOCK_DOMAINS,
  type LockAccess,
  type LockCallbacks,
  type LockDomain,
  type TransportOptions,
  type TransportRequest,
  type TransportResponse,
} from '@root/types/transport.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'
import { Agent } from 'undici'
import type { CredentialStore } from './credential-store.js'

type DomainLock = ReturnType<typeof pLimit>

const KEEP_ALIVE_TIMEOUT_MS = 10_000
const KEEP_ALIVE_MAX_TIMEOUT_MS = 60_000

/**
 * State every request handle shares. Only touched between `onLock` and
 * `onUnlock` of the matching domain.
 */
export class SharedTransportContext {
  /** host -> cookie name -> value */
  readonly cookies = new Map<string, Map<string, string>>()

  private pool: Agent | undefined

  /** The shared keep-alive pool, undefined until the first request */
  get connectionPool(): Agent | undefined {
    return this.pool
  }

  cookieHeaderFor(host: string): string | undefined {
    const jar = this.cookies.get(host)
    if (!jar || jar.size === 0) return undefined
    return [...jar.entries()].map(([name, value]) => `${name}=${value}`).join('; ')
  }

  storeCookies(host: string, setCookieHeaders: readonly string[]): void {
    if (setCookieHeaders.length === 0) return
    let jar = this.cookies.get(host)
    if (!jar) {
      jar = new Map()
      this.cookies.set(host, jar)
    }
    for (const header of setCookieHeaders) {
      const pair = header.split(';', 1)[0]
      const separator = pair.indexOf('=')
      if (separator <= 0) continue
      jar.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim())
    }
  }

  /**
   * Keep-alive pool every handle dispatches through. Holds sockets, DNS
   * results and TLS sessions.
   */
  dispatcher(connectTimeoutMs: number): Agent {
    if (!this.pool) {
      this.pool = new Agent({
        keepAliveTimeout: KEEP_ALIVE_TIMEOUT_MS,
        keepAliveMaxTimeout: KEEP_ALIVE_MAX_TIMEOUT_MS,
        connect: { timeout: connectTimeoutMs },
      })
    }
    return this.pool
  }

  async closeConnections(): Promise<void> {
    const pool = this.pool
    this.pool = undefined
    if (pool) {
      await pool.close()
    }
  }
}

/**
 * One request slot bound to the pool's shared context. Obtain through
 * {@link SharedTransportPool.withHandle} so it is always released.
 */
export class RequestHandle {
  private released = false

  constructor(
    private readonly context: SharedTransportContext,
    private readonly locks: LockCallbacks,
    private readonly credentials: CredentialStore,
    private readonly options: TransportOptions,
    private readonly onRelease: () => void,
  ) {}

  async perform(request: TransportRequest): Promise<TransportResponse> {
    if (this.released) {
      throw new Error('Request handle used after release')
    }

    const url = new URL(request.url)
    const headers: Record<string, string> = {
      'User-Agent': this.options.userAgent,
    }

    const authorization = this.credentials.authorizationHeader()
    if (authorization) {
      headers.Authorization = authorization
    }

    const cookie = await this.withDomain('cookie', 'shared', () =>
      this.context.cookieHeaderFor(url.host),
    )
    if (cookie) {
      headers.Cookie = cookie
    }

    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded'
    }

    const dispatcher = await this.withDomain('connect', 'shared', () =>
      this.context.dispatcher(this.options.timeoutMs),
    )

    const response = await fetch(url, {
      method: request.method,
      headers,
      body: request.body,
      signal: AbortSignal.timeout(this.options.timeoutMs),
      dispatcher,
    })

    const body = Buffer.from(await response.arrayBuffer())

    await this.withDomain('cookie', 'single', () =>
      this.context.storeCookies(url.host, response.headers.getSetCookie()),
    )

    return {
      status: response.status,
      statusText: response.statusText,
      body,
    }
  }

  release(): void {
    if (this.released) return
    this.released = true
    this.onRelease()
  }

  private async withDomain<R>(
    domain: LockDomain,
    access: LockAccess,
    fn: () => R,
  ): Promise<R> {
    await this.locks.onLock(domain, access)
    try {
      return fn()
    } finally {
      this.locks.onUnlock(domain)
    }
  }
}

/**
 * Owns the shared transport context and one exclusive lock per domain.
 *
 * Handles only exist inside {@link withHandle}; {@link close} waits for the
 * last of them before tearing down, so the pool always outlives its handles.
 */
export class SharedTransportPool implements LockCallbacks {
  readonly context = new SharedTransportContext()

  private readonly locks: ReadonlyMap<LockDomain, DomainLock>
  private readonly releases = new Map<LockDomain, () => void>()
  private readonly log: FastifyBaseLogger
  private outstanding = 0
  private closed = false
  private drainWaiters: Array<() => void> = []

  constructor(
    private readonly credentials: CredentialStore,
    private readonly options: TransportOptions,
    baseLog: FastifyBaseLogger,
  ) {
    this.log = createServiceLogger(baseLog, 'TRANSPORT')
    this.locks = new Map(LOCK_DOMAINS.map((domain) => [domain, pLimit(1)]))
  }

  get outstandingHandles(): number {
    return this.outstanding
  }

  /**
   * Resolves once the domain's lock is held. Access mode is recorded only;
   * shared and single access both serialize.
   */
  async onLock(domain: LockDomain, access: LockAccess): Promise<void> {
    const lock = this.lockFor(domain)
    this.log.trace(`Lock ${domain} (${access})`)
    await new Promise<void>((acquired) => {
      void lock(
        () =>
          new Promise<void>((release) => {
            this.releases.set(domain, release)
            acquired()
          }),
      )
    })
  }

  onUnlock(domain: LockDomain): void {
    const release = this.releases.get(domain)
    if (!release) {
      this.log.warn(`Unlock of ${domain} without a matching lock`)
      return
    }
    this.releases.delete(domain)
    release()
  }

  acquireHandle(): RequestHandle {
    if (this.closed) {
      throw new Error('Transport pool is closed')
    }
    this.outstanding++
    return new RequestHandle(
      this.context,
      this,
      this.credentials,
      this.options,
      () => this.handleReleased(),
    )
  }

  /**
   * Runs `fn` with a fresh handle and releases it afterwards
   */
  async withHandle<R>(fn: (handle: RequestHandle) => Promise<R>): Promise<R> {
    const handle = this.acquireHandle()
    try {
      return await fn(handle)
    } finally {
      handle.release()
    }
  }

  /**
   * Stops handing out handles and resolves when every outstanding handle
   * has been released and the connection pool is shut.
   */
  async close(): Promise<void> {
    this.closed = true
    if (this.outstanding > 0) {
      this.log.debug(
        `Waiting for ${this.outstanding} request handles before closing`,
      )
      await new Promise<void>((resolve) => this.drainWaiters.push(resolve))
    }

    await this.onLock('cookie', 'single')
    this.context.cookies.clear()
    this.onUnlock('cookie')

    await this.onLock('connect', 'single')
    try {
      await this.context.closeConnections()
    } finally {
      this.onUnlock('connect')
    }
  }

  private lockFor(domain: LockDomain): DomainLock {
    const lock = this.locks.get(domain)
    if (!lock) {
      throw new Error(`Unknown lock domain ${domain}`)
    }
    return lock
  }

  private handleReleased(): void {
    this.outstanding--
    if (this.outstanding === 0 && this.drainWaiters.length > 0) {
      const waiters = this.drainWaiters
      this.drainWaiters = []
      for (const resolve of waiters) resolve()
    }
  }
}
