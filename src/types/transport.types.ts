import type { TransportError } from '@services/catalog/errors.js'

/**
 * Categories of shared transport state. Each domain gets exactly one lock.
 *
 * - `cookie`: the cookie jar every handle reads and writes
 * - `connect`: the keep-alive connection pool (sockets, DNS results and TLS
 *   sessions) every handle dispatches through
 */
export const LOCK_DOMAINS = ['cookie', 'connect'] as const

export type LockDomain = (typeof LOCK_DOMAINS)[number]

/**
 * Access the transport layer asks for. Both modes are served exclusively.
 */
export type LockAccess = 'shared' | 'single'

/**
 * Lock capability handed to every request handle
 */
export interface LockCallbacks {
  onLock(domain: LockDomain, access: LockAccess): Promise<void>
  onUnlock(domain: LockDomain): void
}

export type HttpMethod = 'GET' | 'POST'

export interface TransportRequest {
  method: HttpMethod
  url: string
  /** Form-encoded payload for POST requests */
  body?: string
}

export interface TransportResponse {
  status: number
  statusText: string
  body: Buffer
}

export type TransportResult =
  | { ok: true; status: number; body: Buffer }
  | { ok: false; error: TransportError }

export interface TransportOptions {
  /** Per-request timeout in milliseconds */
  timeoutMs: number
  userAgent: string
}
