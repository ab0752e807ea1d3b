import type {
  TransportRequest,
  TransportResult,
} from '@root/types/transport.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { TransportError } from './errors.js'
import type { SharedTransportPool } from './transport-pool.js'

/**
 * Appends a parameter to a fixed base path, escaped with the URL
 * component encoder fetch itself relies on.
 */
export function buildUrl(base: string, param: string): string {
  return `${base}${encodeURIComponent(param)}`
}

/**
 * Runs one request through a pooled handle. Never retries; a non-2xx
 * status or a network failure comes back as a {@link TransportError}.
 */
export class RequestExecutor {
  private readonly log: FastifyBaseLogger

  constructor(
    private readonly pool: SharedTransportPool,
    baseLog: FastifyBaseLogger,
  ) {
    this.log = createServiceLogger(baseLog, 'EXECUTOR')
  }

  async execute(request: TransportRequest): Promise<TransportResult> {
    return this.pool.withHandle(async (handle) => {
      try {
        this.log.debug(`${request.method} ${redactQuery(request.url)}`)
        const response = await handle.perform(request)

        if (response.status < 200 || response.status >= 300) {
          return {
            ok: false,
            error: new TransportError(
              response.status,
              `${response.status} ${response.statusText}`.trim(),
            ),
          }
        }

        return { ok: true, status: response.status, body: response.body }
      } catch (error) {
        return { ok: false, error: TransportError.fromCause(error) }
      }
    })
  }
}

function redactQuery(url: string): string {
  return url.replace(/([?&])(u|q)=([^&]+)/g, '$1$2=[REDACTED]')
}
