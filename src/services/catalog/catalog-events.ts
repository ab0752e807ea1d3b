import { EventEmitter } from 'node:events'
import type {
  CatalogEventMap,
  CatalogEventName,
} from '@root/types/catalog.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

/**
 * Completion notifications for presentation code: list refreshes, search
 * results and credential prompts.
 */
export class CatalogEvents {
  private readonly eventEmitter = new EventEmitter()
  private readonly log: FastifyBaseLogger

  constructor(baseLog: FastifyBaseLogger) {
    this.log = createServiceLogger(baseLog, 'CATALOG_EVENTS')
    this.eventEmitter.setMaxListeners(100)
  }

  emit<E extends CatalogEventName>(event: E, payload: CatalogEventMap[E]) {
    this.log.trace({ event, payload }, 'Emitting catalog event')
    this.eventEmitter.emit(event, payload)
  }

  /**
   * Subscribes to an event.
   * @returns a function that removes the listener
   */
  on<E extends CatalogEventName>(
    event: E,
    listener: (payload: CatalogEventMap[E]) => void,
  ): () => void {
    this.eventEmitter.on(event, listener)
    return () => {
      this.eventEmitter.off(event, listener)
    }
  }

  listenerCount(event: CatalogEventName): number {
    return this.eventEmitter.listenerCount(event)
  }
}
