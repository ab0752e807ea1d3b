import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { CatalogItem, CatalogKind } from '@root/types/catalog.types.js'
import { z } from 'zod'

/**
 * Closed set of codes a wire element name can map to.
 *
 * `none` marks names that carry nothing we keep, `text` is the tokenizer's
 * text marker, `record` and `entry` are the two structural elements.
 * `unknown` is only ever returned for names missing from the table.
 */
export const FIELD_CODES = [
  'unknown',
  'none',
  'text',
  'record',
  'entry',
  'id',
  'seriesItemDbId',
  'seriesTitle',
  'seriesType',
  'seriesEpisodes',
  'seriesVolumes',
  'seriesStatus',
  'seriesDateBegin',
  'seriesDateEnd',
  'imageUrl',
  'seriesSynonyms',
  'seriesSynopsis',
  'episodes',
  'volumes',
  'dateStart',
  'dateFinish',
  'score',
  'status',
  'enableReconsuming',
  'rewatchEpisode',
  'lastUpdated',
  'tags',
  'userId',
] as const

export type FieldCode = (typeof FIELD_CODES)[number]

export type ItemSetter = (item: CatalogItem, text: string) => CatalogItem

type SettableField = Exclude<
  FieldCode,
  'unknown' | 'none' | 'text' | 'record' | 'entry' | 'userId'
>

const FieldNameTablesSchema = z.object({
  anime: z.record(z.enum(FIELD_CODES)),
  manga: z.record(z.enum(FIELD_CODES)),
})

const projectRoot = resolve(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  '..',
)

export const FIELD_TABLE_PATH = resolve(
  projectRoot,
  'config',
  'catalog-fields.json',
)

function toInt(text: string): number {
  const value = Number.parseInt(text, 10)
  return Number.isNaN(value) ? 0 : value
}

function toFloat(text: string): number {
  const value = Number.parseFloat(text)
  return Number.isNaN(value) ? 0 : value
}

function splitList(text: string, separator: RegExp): string[] {
  return text
    .split(separator)
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
}

const SETTERS: Readonly<Record<SettableField, ItemSetter>> = {
  id: (item, text) => ({ ...item, id: toInt(text) }),
  seriesItemDbId: (item, text) => ({ ...item, seriesItemDbId: toInt(text) }),
  seriesTitle: (item, text) => ({ ...item, seriesTitle: text }),
  seriesType: (item, text) => ({ ...item, seriesType: text }),
  seriesEpisodes: (item, text) => ({ ...item, seriesEpisodes: toInt(text) }),
  seriesVolumes: (item, text) => ({ ...item, seriesVolumes: toInt(text) }),
  seriesStatus: (item, text) => ({ ...item, seriesStatus: text }),
  seriesDateBegin: (item, text) => ({ ...item, seriesDateBegin: text }),
  seriesDateEnd: (item, text) => ({ ...item, seriesDateEnd: text }),
  imageUrl: (item, text) => ({ ...item, imageUrl: text }),
  // `english` and `synonyms` both land here, so values accumulate
  seriesSynonyms: (item, text) => ({
    ...item,
    seriesSynonyms: [
      ...new Set([...item.seriesSynonyms, ...splitList(text, /;/)]),
    ],
  }),
  seriesSynopsis: (item, text) => ({ ...item, seriesSynopsis: text }),
  episodes: (item, text) => ({ ...item, episodes: toInt(text) }),
  volumes: (item, text) => ({ ...item, volumes: toInt(text) }),
  dateStart: (item, text) => ({ ...item, dateStart: text }),
  dateFinish: (item, text) => ({ ...item, dateFinish: text }),
  score: (item, text) => ({ ...item, score: toFloat(text) }),
  status: (item, text) => ({ ...item, status: toInt(text) }),
  enableReconsuming: (item, text) => ({
    ...item,
    enableReconsuming: text.trim() === '1',
  }),
  rewatchEpisode: (item, text) => ({ ...item, rewatchEpisode: toInt(text) }),
  lastUpdated: (item, text) => ({ ...item, lastUpdated: toInt(text) }),
  tags: (item, text) => ({ ...item, tags: splitList(text, /[,;]/) }),
}

function isSettable(code: FieldCode): code is SettableField {
  return Object.hasOwn(SETTERS, code)
}

/**
 * Name-to-code lookup for one item kind plus the shared setter table.
 * Immutable after construction.
 */
export class FieldTable {
  private readonly codes: ReadonlyMap<string, FieldCode>

  constructor(names: Record<string, FieldCode>) {
    this.codes = new Map(Object.entries(names))
  }

  codeFor(name: string): FieldCode {
    return this.codes.get(name) ?? 'unknown'
  }

  setterFor(code: FieldCode): ItemSetter | undefined {
    return isSettable(code) ? SETTERS[code] : undefined
  }

  get size(): number {
    return this.codes.size
  }
}

let cachedTables: Record<CatalogKind, FieldTable> | null = null

/**
 * Loads the per-kind field tables from `config/catalog-fields.json`.
 * The file is read once per process.
 */
export function loadFieldTables(
  path: string = FIELD_TABLE_PATH,
): Record<CatalogKind, FieldTable> {
  if (cachedTables && path === FIELD_TABLE_PATH) {
    return cachedTables
  }

  const raw: unknown = JSON.parse(fs.readFileSync(path, 'utf-8'))
  const parsed = FieldNameTablesSchema.parse(raw)
  const tables = {
    anime: new FieldTable(parsed.anime),
    manga: new FieldTable(parsed.manga),
  }

  if (path === FIELD_TABLE_PATH) {
    cachedTables = tables
  }
  return tables
}
