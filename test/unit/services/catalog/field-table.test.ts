import { createEmptyItem } from '@root/types/catalog.types.js'
import {
  FIELD_CODES,
  FieldTable,
  loadFieldTables,
} from '@services/catalog/field-table.js'
import { describe, expect, it } from 'vitest'

describe('FieldTable', () => {
  const tables = loadFieldTables()

  describe('loadFieldTables', () => {
    it('should load one table per kind', () => {
      expect(tables.anime.size).toBeGreaterThan(0)
      expect(tables.manga.size).toBeGreaterThan(0)
    })

    it('should return the cached tables for the default path', () => {
      expect(loadFieldTables()).toBe(tables)
    })
  })

  describe('codeFor', () => {
    it('should map list and search names to the same field', () => {
      expect(tables.anime.codeFor('series_animedb_id')).toBe('seriesItemDbId')
      expect(tables.anime.codeFor('id')).toBe('seriesItemDbId')
      expect(tables.anime.codeFor('series_title')).toBe('seriesTitle')
      expect(tables.anime.codeFor('title')).toBe('seriesTitle')
    })

    it('should keep the list entry id apart from the series id', () => {
      expect(tables.anime.codeFor('my_id')).toBe('id')
    })

    it('should map structural names', () => {
      expect(tables.anime.codeFor('anime')).toBe('record')
      expect(tables.manga.codeFor('manga')).toBe('record')
      expect(tables.anime.codeFor('entry')).toBe('entry')
      expect(tables.anime.codeFor('#text')).toBe('text')
      expect(tables.anime.codeFor('myinfo')).toBe('none')
    })

    it('should map manga chapter and volume fields', () => {
      expect(tables.manga.codeFor('series_chapters')).toBe('seriesEpisodes')
      expect(tables.manga.codeFor('my_read_chapters')).toBe('episodes')
      expect(tables.manga.codeFor('my_read_volumes')).toBe('volumes')
      expect(tables.manga.codeFor('my_rereadingg')).toBe('enableReconsuming')
    })

    it('should return unknown for names missing from the table', () => {
      expect(tables.anime.codeFor('mystery')).toBe('unknown')
      expect(tables.anime.codeFor('manga')).toBe('unknown')
    })

    it('should only produce codes from the closed set', () => {
      const table = new FieldTable({ a: 'seriesTitle' })
      expect(FIELD_CODES).toContain(table.codeFor('a'))
      expect(FIELD_CODES).toContain(table.codeFor('b'))
    })
  })

  describe('setterFor', () => {
    const table = tables.anime

    it('should have no setter for structural codes', () => {
      expect(table.setterFor('none')).toBeUndefined()
      expect(table.setterFor('record')).toBeUndefined()
      expect(table.setterFor('text')).toBeUndefined()
      expect(table.setterFor('userId')).toBeUndefined()
    })

    it('should parse integers and fall back to 0', () => {
      const setter = table.setterFor('seriesEpisodes')
      expect(setter?.(createEmptyItem(), '24').seriesEpisodes).toBe(24)
      expect(setter?.(createEmptyItem(), 'n/a').seriesEpisodes).toBe(0)
    })

    it('should parse fractional scores', () => {
      const setter = table.setterFor('score')
      expect(setter?.(createEmptyItem(), '7.91').score).toBe(7.91)
    })

    it('should accumulate synonyms without duplicates', () => {
      const setter = table.setterFor('seriesSynonyms')
      const first = setter?.(createEmptyItem(), 'Alpha EN')
      const second = first && setter?.(first, 'Drift A; Alpha EN; AD')

      expect(second?.seriesSynonyms).toEqual(['Alpha EN', 'Drift A', 'AD'])
    })

    it('should split tags on commas and semicolons', () => {
      const setter = table.setterFor('tags')
      expect(setter?.(createEmptyItem(), 'ova, funny;  rewatch').tags).toEqual([
        'ova',
        'funny',
        'rewatch',
      ])
    })

    it('should read the reconsuming flag', () => {
      const setter = table.setterFor('enableReconsuming')
      expect(setter?.(createEmptyItem(), '1').enableReconsuming).toBe(true)
      expect(setter?.(createEmptyItem(), '0').enableReconsuming).toBe(false)
    })

    it('should not mutate the item it is given', () => {
      const item = createEmptyItem()
      table.setterFor('seriesTitle')?.(item, 'Changed')
      expect(item.seriesTitle).toBe('')
    })
  })
})
