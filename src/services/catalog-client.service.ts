/**
 * Catalog Client Service
 *
 * Public surface over the remote list catalog. Every network call is
 * funneled through a single ActiveEngine worker and a shared transport
 * pool; decoded records are merged into ordered per-kind stores and the
 * matching completion event is emitted before the call resolves.
 *
 * Transport failures never escape as exceptions: list and search resolve
 * to `[]`, update and add to `false`, image fetches to `null`. The
 * `...Result` variants also report why a call failed, for callers that
 * must tell a failure from an empty answer.
 */

import type {
  CatalogCallResult,
  CatalogFailure,
  CatalogItem,
  CatalogKind,
  StoreScope,
} from '@root/types/catalog.types.js'
import type {
  TransportRequest,
  TransportResult,
} from '@root/types/transport.types.js'
import { ActiveEngine } from '@services/catalog/active-engine.js'
import { CatalogEvents } from '@services/catalog/catalog-events.js'
import type { CredentialStore } from '@services/catalog/credential-store.js'
import type { TransportError } from '@services/catalog/errors.js'
import { loadFieldTables } from '@services/catalog/field-table.js'
import { OrderedItemStore } from '@services/catalog/ordered-item-store.js'
import { RecordDecoder } from '@services/catalog/record-decoder.js'
import { RecordEncoder } from '@services/catalog/record-encoder.js'
import {
  buildUrl,
  RequestExecutor,
} from '@services/catalog/request-executor.js'
import { SharedTransportPool } from '@services/catalog/transport-pool.js'
import { createServiceLogger } from '@utils/logger.js'
import { TextUtility } from '@utils/text-utility.js'
import type { FastifyBaseLogger } from 'fastify'

export interface CatalogClientOptions {
  /** Service root without a trailing slash, e.g. `https://myanimelist.net` */
  baseUrl: string
  timeoutMs: number
  userAgent: string
}

const LIST_PATH = '/malappinfo.php?u='

const ENDPOINTS: Readonly<
  Record<CatalogKind, { search: string; update: string; add: string }>
> = {
  anime: {
    search: '/api/anime/search.xml?q=',
    update: '/api/animelist/update/',
    add: '/api/animelist/add/',
  },
  manga: {
    search: '/api/manga/search.xml?q=',
    update: '/api/mangalist/update/',
    add: '/api/mangalist/add/',
  },
}

type KindStores = Record<StoreScope, OrderedItemStore>

function failureOf(error: TransportError): CatalogFailure {
  return {
    reason: error.isUnauthorized ? 'credentials' : 'transport',
    status: error.status,
    message: error.message,
  }
}

export class CatalogClient {
  readonly events: CatalogEvents

  private readonly pool: SharedTransportPool
  private readonly engine: ActiveEngine
  private readonly executor: RequestExecutor
  private readonly decoders: Record<CatalogKind, RecordDecoder>
  private readonly encoders: Record<CatalogKind, RecordEncoder>
  private readonly stores: Record<CatalogKind, KindStores>
  /** anime images are keyed by URL, manga images by series id */
  private readonly imageCaches: Record<CatalogKind, Map<string, Buffer>>
  private readonly baseUrl: string

  /** Creates a fresh service logger that inherits current log level */
  private get log(): FastifyBaseLogger {
    return createServiceLogger(this.baseLog, 'CATALOG')
  }

  constructor(
    private readonly baseLog: FastifyBaseLogger,
    private readonly credentials: CredentialStore,
    options: CatalogClientOptions,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.events = new CatalogEvents(baseLog)
    this.pool = new SharedTransportPool(
      credentials,
      { timeoutMs: options.timeoutMs, userAgent: options.userAgent },
      baseLog,
    )
    this.engine = new ActiveEngine(baseLog)
    this.executor = new RequestExecutor(this.pool, baseLog)

    const fieldTables = loadFieldTables()
    const textUtility = new TextUtility()
    this.decoders = {
      anime: new RecordDecoder('anime', fieldTables.anime, textUtility, baseLog),
      manga: new RecordDecoder('manga', fieldTables.manga, textUtility, baseLog),
    }
    this.encoders = {
      anime: new RecordEncoder('anime'),
      manga: new RecordEncoder('manga'),
    }
    this.stores = {
      anime: { list: new OrderedItemStore(), search: new OrderedItemStore() },
      manga: { list: new OrderedItemStore(), search: new OrderedItemStore() },
    }
    this.imageCaches = { anime: new Map(), manga: new Map() }
  }

  /**
   * Refetches the user's full list of one kind and replaces the list store
   * with it. Resolves to a copy of the ordered list.
   */
  async fetchList(kind: CatalogKind): Promise<CatalogItem[]> {
    return (await this.fetchListResult(kind)).value
  }

  async fetchListResult(
    kind: CatalogKind,
  ): Promise<CatalogCallResult<CatalogItem[]>> {
    if (!this.credentials.hasUsername) {
      this.log.warn(`No username configured, cannot fetch ${kind} list`)
      this.events.emit('credentials-needed', {
        reason: 'missing-username',
        status: 0,
      })
      return {
        value: [],
        failure: {
          reason: 'credentials',
          status: 0,
          message: 'No username configured',
        },
      }
    }

    const url = `${buildUrl(
      `${this.baseUrl}${LIST_PATH}`,
      this.credentials.currentUsername,
    )}&status=all&type=${kind}`

    const result = await this.request({ method: 'GET', url })
    if (!result.ok) return { value: [], failure: failureOf(result.error) }

    const items = this.decoders[kind].decode(result.body.toString('utf-8'))
    const store = this.stores[kind].list
    store.replaceAll(items)
    this.log.info(`Fetched ${kind} list: ${store.size} items`)

    this.events.emit('list-updated', { kind, count: store.size })
    return { value: store.snapshot() }
  }

  /**
   * Searches the catalog and replaces the search store with the results
   */
  async search(kind: CatalogKind, terms: string): Promise<CatalogItem[]> {
    return (await this.searchResult(kind, terms)).value
  }

  async searchResult(
    kind: CatalogKind,
    terms: string,
  ): Promise<CatalogCallResult<CatalogItem[]>> {
    const query = terms.trim()
    if (!query) return { value: [] }

    const url = buildUrl(`${this.baseUrl}${ENDPOINTS[kind].search}`, query)
    const result = await this.request({ method: 'GET', url })
    if (!result.ok) return { value: [], failure: failureOf(result.error) }

    const items = this.decoders[kind].decode(result.body.toString('utf-8'))
    const store = this.stores[kind].search
    store.replaceAll(items)
    this.log.debug(`Search for ${kind} returned ${store.size} items`)

    this.events.emit('search-completed', {
      kind,
      terms: query,
      count: store.size,
    })
    return { value: store.snapshot() }
  }

  /**
   * Sends the item's user fields to the service. Success is read from the
   * status alone; the list is not refetched.
   */
  async updateItem(kind: CatalogKind, item: CatalogItem): Promise<boolean> {
    return (await this.updateItemResult(kind, item)).value
  }

  async updateItemResult(
    kind: CatalogKind,
    item: CatalogItem,
  ): Promise<CatalogCallResult<boolean>> {
    return this.mutate(kind, item, 'update', [200])
  }

  /**
   * Adds the item to the user's list
   */
  async addItem(kind: CatalogKind, item: CatalogItem): Promise<boolean> {
    return (await this.addItemResult(kind, item)).value
  }

  async addItemResult(
    kind: CatalogKind,
    item: CatalogItem,
  ): Promise<CatalogCallResult<boolean>> {
    // The service answers an add with 201 Created
    return this.mutate(kind, item, 'add', [200, 201])
  }

  /**
   * Fetches the item's cover image bytes, cached for the life of the client
   */
  async fetchImage(kind: CatalogKind, item: CatalogItem): Promise<Buffer | null> {
    if (!item.imageUrl) return null

    const cache = this.imageCaches[kind]
    const key = kind === 'anime' ? item.imageUrl : String(item.seriesItemDbId)
    const cached = cache.get(key)
    if (cached) return Buffer.from(cached)

    const result = await this.request({ method: 'GET', url: item.imageUrl })
    if (!result.ok) return null

    cache.set(key, result.body)
    return Buffer.from(result.body)
  }

  getItems(kind: CatalogKind, scope: StoreScope): CatalogItem[] {
    return this.stores[kind][scope].snapshot()
  }

  forEachItem(
    kind: CatalogKind,
    scope: StoreScope,
    fn: (item: CatalogItem) => void,
  ): void {
    this.stores[kind][scope].forEach(fn)
  }

  /**
   * Looks an item up by series id in the list store, then the search store
   */
  findItem(kind: CatalogKind, seriesItemDbId: number): CatalogItem | undefined {
    const matches = (item: CatalogItem) => item.seriesItemDbId === seriesItemDbId
    return (
      this.stores[kind].list.find(matches) ??
      this.stores[kind].search.find(matches)
    )
  }

  /**
   * Drains queued requests, then releases the transport pool
   */
  async close(): Promise<void> {
    await this.engine.close()
    await this.pool.close()
    this.log.debug('Catalog client closed')
  }

  private async mutate(
    kind: CatalogKind,
    item: CatalogItem,
    operation: 'update' | 'add',
    acceptedStatuses: readonly number[],
  ): Promise<CatalogCallResult<boolean>> {
    const url = `${buildUrl(
      `${this.baseUrl}${ENDPOINTS[kind][operation]}`,
      String(item.seriesItemDbId),
    )}.xml`

    const result = await this.request({
      method: 'POST',
      url,
      body: this.formBody(kind, item),
    })
    if (!result.ok) return { value: false, failure: failureOf(result.error) }

    if (!acceptedStatuses.includes(result.status)) {
      this.log.warn(
        `Catalog answered ${result.status} to ${operation} of ${kind} ${item.seriesItemDbId}`,
      )
      return {
        value: false,
        failure: {
          reason: 'rejected',
          status: result.status,
          message: `Unexpected status ${result.status}`,
        },
      }
    }

    this.stores[kind].list.insert(item)
    this.events.emit('list-updated', {
      kind,
      count: this.stores[kind].list.size,
    })
    return { value: true }
  }

  private formBody(kind: CatalogKind, item: CatalogItem): string {
    return `data=${encodeURIComponent(this.encoders[kind].encode(item))}`
  }

  private async request(request: TransportRequest): Promise<TransportResult> {
    const result = await this.engine.submit(() =>
      this.executor.execute(request),
    )
    if (!result.ok) {
      this.handleTransportError(result.error, request)
    }
    return result
  }

  private handleTransportError(
    error: TransportError,
    request: TransportRequest,
  ): void {
    const path = new URL(request.url).pathname
    if (error.isUnauthorized) {
      this.log.warn(`Catalog rejected credentials for ${path}`)
      this.credentials.markRejected()
      this.events.emit('credentials-needed', {
        reason: 'unauthorized',
        status: error.status,
      })
      return
    }
    this.log.error(
      { error },
      `Catalog request ${request.method} ${path} failed: ${error.message}`,
    )
  }
}
