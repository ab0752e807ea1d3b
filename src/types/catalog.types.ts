/**
 * Item kinds served by the remote catalog
 */
export const CATALOG_KINDS = ['anime', 'manga'] as const

export type CatalogKind = (typeof CATALOG_KINDS)[number]

/**
 * Which store of a kind an operation reads from
 */
export const STORE_SCOPES = ['list', 'search'] as const

export type StoreScope = (typeof STORE_SCOPES)[number]

/**
 * One decoded catalog entry with its series fields and the user's progress.
 *
 * Anime and manga share this shape. Episode fields hold chapters for manga;
 * the volume fields stay at 0 for anime.
 */
export interface CatalogItem {
  /** The user's list entry id (`my_id`) */
  id: number
  /** Remote series id, used in update/add paths */
  seriesItemDbId: number
  seriesTitle: string
  seriesType: string
  seriesStatus: string
  /** Total episodes (anime) or chapters (manga) */
  seriesEpisodes: number
  seriesVolumes: number
  /** Free-form date text as sent by the service, e.g. `2020-04-01` or `0000-00-00` */
  seriesDateBegin: string
  seriesDateEnd: string
  imageUrl: string
  seriesSynonyms: string[]
  seriesSynopsis: string
  /** Watched episodes or read chapters */
  episodes: number
  volumes: number
  /** User list status code (1 watching, 2 completed, 3 on hold, 4 dropped, 6 planned) */
  status: number
  score: number
  dateStart: string
  dateFinish: string
  tags: string[]
  downloadedItems: number
  enableReconsuming: boolean
  rewatchEpisode: number
  /** Unix timestamp in seconds */
  lastUpdated: number
}

/**
 * Returns an item with every field at its empty value
 */
export function createEmptyItem(): CatalogItem {
  return {
    id: 0,
    seriesItemDbId: 0,
    seriesTitle: '',
    seriesType: '',
    seriesStatus: '',
    seriesEpisodes: 0,
    seriesVolumes: 0,
    seriesDateBegin: '',
    seriesDateEnd: '',
    imageUrl: '',
    seriesSynonyms: [],
    seriesSynopsis: '',
    episodes: 0,
    volumes: 0,
    status: 0,
    score: 0,
    dateStart: '',
    dateFinish: '',
    tags: [],
    downloadedItems: 0,
    enableReconsuming: false,
    rewatchEpisode: 0,
    lastUpdated: 0,
  }
}

/**
 * `credentials`: the catalog asked for (other) credentials, or no username
 * is set. `transport`: no usable answer arrived. `rejected`: the catalog
 * answered but did not accept the change.
 */
export type CatalogFailureReason = 'credentials' | 'transport' | 'rejected'

export interface CatalogFailure {
  reason: CatalogFailureReason
  /** HTTP status, 0 when no response arrived */
  status: number
  message: string
}

/**
 * Outcome of one catalog call. `value` is what the plain call resolves to,
 * whether or not it failed.
 */
export interface CatalogCallResult<T> {
  value: T
  failure?: CatalogFailure
}

export interface ListUpdatedEvent {
  kind: CatalogKind
  count: number
}

export interface SearchCompletedEvent {
  kind: CatalogKind
  terms: string
  count: number
}

export interface CredentialsNeededEvent {
  reason: 'missing-username' | 'unauthorized'
  /** HTTP status that triggered the prompt, 0 when no request was made */
  status: number
}

export interface CatalogEventMap {
  'list-updated': ListUpdatedEvent
  'search-completed': SearchCompletedEvent
  'credentials-needed': CredentialsNeededEvent
}

export type CatalogEventName = keyof CatalogEventMap
