/**
 * Network or HTTP status failure. `status` is 0 when no response arrived.
 */
export class TransportError extends Error {
  constructor(
    readonly status: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'TransportError'
  }

  get isUnauthorized(): boolean {
    return this.status === 401
  }

  /**
   * Wraps an error thrown by fetch, preferring undici cause codes for the message
   */
  static fromCause(error: unknown): TransportError {
    if (!(error instanceof Error)) {
      return new TransportError(0, `Network error: ${String(error)}`)
    }
    const cause = error.cause as { code?: string } | undefined
    const code = cause?.code
    let message: string
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      message = 'Request timed out'
    } else if (code === 'ECONNREFUSED') {
      message = 'Connection refused'
    } else if (code === 'ENOTFOUND') {
      message = 'Host not found'
    } else if (code === 'ECONNRESET') {
      message = 'Connection was reset'
    } else {
      message = `Network error: ${error.message}`
    }
    return new TransportError(0, message, { cause: error })
  }
}

/**
 * A task was submitted to an engine that is shutting down or closed
 */
export class EngineClosedError extends Error {
  constructor() {
    super('Engine closed')
    this.name = 'EngineClosedError'
  }
}

/**
 * A document the XML tokenizer could not read at all
 */
export class DecodeError extends Error {
  constructor(
    message: string,
    readonly line?: number,
  ) {
    super(message)
    this.name = 'DecodeError'
  }
}
