import type { CatalogItem, CatalogKind } from '@root/types/catalog.types.js'
import { format, isValid, parse } from 'date-fns'
import { XMLBuilder } from 'fast-xml-parser'

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>'

/**
 * Input layouts tried, in order, when reading a free-form date. Numeric
 * fields may be zero-padded or not.
 */
const DATE_INPUT_FORMATS = [
  'yyyy-M-d',
  'yyyy/M/d',
  'M-d-yyyy',
  'M/d/yyyy',
  'MMddyyyy',
  'MMMM d, yyyy',
  'MMM d, yyyy',
  'd MMMM yyyy',
  'd MMM yyyy',
]

const WIRE_DATE_FORMAT = 'MMddyyyy'

const TAG_SEPARATOR = '; '

const builder = new XMLBuilder({
  format: false,
  suppressEmptyNode: false,
  processEntities: true,
})

function comparable(text: string): string {
  return text.replace(/\b0+(\d)/g, '$1').toLowerCase()
}

/**
 * Reformats a date as `MMDDYYYY`, or '' when it is not a real calendar date
 * (the service sends `0000-00-00` for unknown dates).
 *
 * Accepted: year-first and month-first numeric dates with `-` or `/`
 * (`2020-4-1`, `04/01/2020`), `MMDDYYYY` itself, and dates with an English
 * month name (`April 1, 2020`, `1 Apr 2020`). Day-first numeric dates are
 * not accepted.
 */
export function toWireDate(input: string): string {
  const text = input.trim()
  if (!text) return ''

  for (const layout of DATE_INPUT_FORMATS) {
    const date = parse(text, layout, new Date(0))
    // Round-trip guards against partial matches
    if (isValid(date) && comparable(format(date, layout)) === comparable(text)) {
      return format(date, WIRE_DATE_FORMAT)
    }
  }
  return ''
}

function flag(value: boolean): string {
  return value ? '1' : '0'
}

/**
 * Anime update/add payload. Fields the client does not track are still
 * sent, empty, so the element list matches what the service expects.
 */
function animeEntry(item: CatalogItem): Record<string, string> {
  return {
    episode: String(item.episodes),
    status: String(item.status),
    score: String(item.score),
    downloaded_episodes: String(item.downloadedItems),
    storage_type: '',
    storage_value: '',
    times_rewatched: '',
    rewatch_value: '',
    date_start: toWireDate(item.dateStart),
    date_finish: toWireDate(item.dateFinish),
    priority: '',
    enable_discussion: '',
    enable_rewatching: flag(item.enableReconsuming),
    comments: '',
    fansub_group: '',
    tags: item.tags.join(TAG_SEPARATOR),
    rewatch_episode: String(item.rewatchEpisode),
  }
}

function mangaEntry(item: CatalogItem): Record<string, string> {
  return {
    chapter: String(item.episodes),
    volume: String(item.volumes),
    status: String(item.status),
    score: String(item.score),
    downloaded_chapters: String(item.downloadedItems),
    times_reread: '',
    reread_value: '',
    date_start: toWireDate(item.dateStart),
    date_finish: toWireDate(item.dateFinish),
    priority: '',
    enable_discussion: '',
    enable_rereading: flag(item.enableReconsuming),
    comments: '',
    scan_group: '',
    tags: item.tags.join(TAG_SEPARATOR),
    retail_volumes: '',
  }
}

export class RecordEncoder {
  constructor(readonly kind: CatalogKind) {}

  encode(item: CatalogItem): string {
    const entry = this.kind === 'anime' ? animeEntry(item) : mangaEntry(item)
    return `${XML_DECLARATION}${builder.build({ entry })}`
  }
}
