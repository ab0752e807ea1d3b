import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

export interface RouteErrorOptions {
  /** Overrides the default `Error in route METHOD /url` message */
  message?: string
  level?: 'error' | 'warn' | 'info'
  /** Extra fields merged into the log object */
  context?: Record<string, unknown>
  [key: string]: unknown
}

/**
 * Logs a failure inside a route handler with the route pattern attached
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  options: RouteErrorOptions = {},
): void {
  const { message, level = 'error', context, ...extra } = options
  const route = `${request.method} ${request.routeOptions?.url ?? request.url}`

  log[level](
    { error, route, ...context, ...extra },
    message ?? `Error in route ${route}`,
  )
}
