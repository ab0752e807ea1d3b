export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

export interface Config {
  // System Config
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  // Catalog Config
  catalogBaseUrl: string
  catalogUsername: string
  catalogPassword: string
  requestTimeoutMs: number
  userAgent: string
}
