import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

export type LogDestination = 'terminal' | 'file' | 'both'

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type CatalogLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..')

// Logger settings come from .env before Fastify's env plugin runs
config({ path: resolve(projectRoot, '.env') })

const PRETTY_OPTIONS = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

type SerializableError = Error | Record<string, unknown> | string | number | boolean

/**
 * Serializes errors for pino. Keeps message, name, status codes and cause;
 * drops the stack for 4xx statuses, which are expected catalog answers.
 */
export function createErrorSerializer() {
  return (err: SerializableError) => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode

    if (err instanceof Error) {
      serialized.type = err.constructor.name || 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    const statusCode =
      'statusCode' in err && typeof err.statusCode === 'number'
        ? err.statusCode
        : 'status' in err && typeof err.status === 'number'
          ? err.status
          : undefined
    const shouldIncludeStack = !statusCode || statusCode >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    // cause is non-enumerable on Error, so copy it explicitly
    if ('cause' in err && err.cause) {
      serialized.cause = serializeCause(err.cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (
        !['message', 'stack', 'name', 'status', 'statusCode', 'type'].includes(
          key,
        )
      ) {
        serialized[key] = value
      }
    }

    return serialized
  }
}

function serializeCause(cause: unknown): unknown {
  if (
    cause instanceof Error ||
    typeof cause === 'string' ||
    typeof cause === 'number' ||
    typeof cause === 'boolean'
  ) {
    return createErrorSerializer()(cause)
  }
  if (typeof cause === 'object' && cause !== null) {
    return createErrorSerializer()(Object.fromEntries(Object.entries(cause)))
  }
  return String(cause)
}

/**
 * Serializes Fastify requests with credential query values redacted.
 *
 * The values of `password`, `token` and `username` are replaced with `[REDACTED]`.
 */
export function createRequestSerializer() {
  return (req: FastifyRequest) => {
    const serialized = {
      method: req.method,
      url: req.url,
      host: req.headers.host,
      remoteAddress: req.ip,
      remotePort: req.socket.remotePort,
    }

    if (serialized.url) {
      serialized.url = serialized.url
        .replace(/([?&])password=([^&]+)/gi, '$1password=[REDACTED]')
        .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
        .replace(/([?&])username=([^&]+)/gi, '$1username=[REDACTED]')
    }

    return serialized
  }
}

/**
 * Log file name for a rotation: `catalog-current.log` for the live file,
 * `catalog-YYYY-MM-DD[-index].log` for rotated ones.
 */
export function filename(time: number | Date, index?: number): string {
  if (!time) return 'catalog-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `catalog-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Rotating file stream under `data/logs`, or stdout when the directory
 * cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

function serializers() {
  return {
    req: createRequestSerializer(),
    error: createErrorSerializer(),
  }
}

/**
 * Builds logger options from the `logDestination` environment variable
 * (`terminal`, `file` or `both`, default `terminal`).
 */
export function createLoggerConfig(
  destination: LogDestination = parseDestination(process.env.logDestination),
): CatalogLoggerOptions {
  if (destination === 'terminal') {
    return {
      level: 'info',
      transport: { target: 'pino-pretty', options: PRETTY_OPTIONS },
      serializers: serializers(),
    }
  }

  const fileStream = getFileStream()

  if (destination === 'file') {
    return { level: 'info', stream: fileStream, serializers: serializers() }
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return createLoggerConfig('terminal')
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: PRETTY_OPTIONS,
  })

  return {
    level: 'info',
    stream: pino.multistream([{ stream: prettyStream }, { stream: fileStream }]),
    serializers: serializers(),
  }
}

function parseDestination(value: string | undefined): LogDestination {
  return value === 'file' || value === 'both' ? value : 'terminal'
}

/**
 * Child logger whose messages carry an uppercased `[SERVICE] ` prefix
 */
export function createServiceLogger(
  parent: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return parent.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
