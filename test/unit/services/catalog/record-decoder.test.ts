import { loadFieldTables } from '@services/catalog/field-table.js'
import { RecordDecoder } from '@services/catalog/record-decoder.js'
import { TextUtility } from '@utils/text-utility.js'
import type { FastifyBaseLogger } from 'fastify'
import { beforeEach, describe, expect, it } from 'vitest'
import { readFixture } from '../../../mocks/catalog-api-handlers.js'
import { createMockLogger } from '../../../mocks/logger.js'

describe('RecordDecoder', () => {
  const tables = loadFieldTables()
  const textUtility = new TextUtility()
  let log: FastifyBaseLogger

  beforeEach(() => {
    log = createMockLogger({ sharedChild: true })
  })

  const decoder = (kind: 'anime' | 'manga') =>
    new RecordDecoder(kind, tables[kind], textUtility, log)

  const record = (id: number, title: string) =>
    `<anime><series_animedb_id>${id}</series_animedb_id><series_title>${title}</series_title></anime>`

  describe('list documents', () => {
    it('should commit one item per record element', () => {
      const items = decoder('anime').decode(readFixture('anime-list.xml'))

      expect(items.map((item) => item.seriesItemDbId)).toEqual([21, 35, 48])
    })

    it('should decode every list field of a record', () => {
      const [first] = decoder('anime').decode(readFixture('anime-list.xml'))

      expect(first).toEqual({
        id: 0,
        seriesItemDbId: 21,
        seriesTitle: 'Alpha Drift',
        seriesType: '1',
        seriesStatus: '2',
        seriesEpisodes: 12,
        seriesVolumes: 0,
        seriesDateBegin: '2020-04-03',
        seriesDateEnd: '2020-06-19',
        imageUrl: 'https://images.catalog.test/anime/21.jpg',
        seriesSynonyms: ['Drift A', 'AD'],
        seriesSynopsis: '',
        episodes: 12,
        volumes: 0,
        status: 2,
        score: 8,
        dateStart: '2020-04-05',
        dateFinish: '0000-00-00',
        tags: ['ova', 'funny'],
        downloadedItems: 0,
        enableReconsuming: false,
        rewatchEpisode: 0,
        lastUpdated: 1600000000,
      })
    })

    it('should leave fields of empty elements at their defaults', () => {
      const items = decoder('anime').decode(readFixture('anime-list.xml'))

      expect(items[1].tags).toEqual([])
      expect(items[1].seriesSynonyms).toEqual([])
      expect(items[2].enableReconsuming).toBe(true)
    })

    it('should not emit an item for the user info block', () => {
      const items = decoder('manga').decode(readFixture('manga-list.xml'))

      expect(items).toHaveLength(1)
    })

    it('should decode manga chapter and volume fields', () => {
      const [item] = decoder('manga').decode(readFixture('manga-list.xml'))

      expect(item).toMatchObject({
        seriesItemDbId: 2,
        seriesTitle: 'Ember Tale',
        seriesEpisodes: 120,
        seriesVolumes: 12,
        episodes: 40,
        volumes: 4,
        enableReconsuming: true,
        rewatchEpisode: 5,
        tags: ['fantasy', 'slow burn'],
      })
    })
  })

  describe('search documents', () => {
    it('should commit one item per entry element', () => {
      const items = decoder('anime').decode(readFixture('anime-search.xml'))

      expect(items.map((item) => item.seriesTitle)).toEqual([
        'Alpha Drift',
        'Delta Wing',
      ])
    })

    it('should decode search fields and escaped HTML', () => {
      const [first, second] = decoder('anime').decode(
        readFixture('anime-search.xml'),
      )

      expect(first).toMatchObject({
        seriesItemDbId: 21,
        seriesSynonyms: ['Alpha Drift EN', 'Drift A', 'AD'],
        seriesEpisodes: 12,
        score: 7.91,
        seriesType: 'TV',
        seriesStatus: 'Finished Airing',
        seriesSynopsis: 'A pilot "drifts" through space.<br />',
      })
      expect(second.seriesSynopsis).toBe('Coming soon — maybe.')
    })

    it('should return no items for an empty result', () => {
      const items = decoder('manga').decode(
        '<?xml version="1.0" encoding="utf-8"?>\n<manga></manga>',
      )

      expect(items).toEqual([])
    })
  })

  describe('unexpected input', () => {
    it('should warn about unknown elements and keep decoding', () => {
      const items = decoder('anime').decode(
        '<anime><entry><id>5</id><mystery>x</mystery><title>Echo</title></entry></anime>',
      )

      expect(log.warn).toHaveBeenCalledWith('Unexpected field mystery')
      expect(items).toHaveLength(1)
      expect(items[0]).toMatchObject({ seriesItemDbId: 5, seriesTitle: 'Echo' })
    })

    it('should keep every record when one title has a stray ampersand', () => {
      const items = decoder('anime').decode(
        `<myanimelist>${record(1, 'One')}${record(2, 'Tom & Jerry')}${record(3, 'Three')}</myanimelist>`,
      )

      expect(items.map((item) => item.seriesTitle)).toEqual([
        'One',
        'Tom & Jerry',
        'Three',
      ])
    })

    it('should keep the records closed before the document stops', () => {
      const items = decoder('anime').decode(
        `<myanimelist>${record(1, 'One')}`,
      )

      expect(items).toHaveLength(1)
      expect(items[0]).toMatchObject({ seriesItemDbId: 1, seriesTitle: 'One' })
      expect(log.warn).toHaveBeenCalledWith(
        { unclosed: ['myanimelist'] },
        'anime document ended early; kept 1 complete records',
      )
    })

    it('should drop a record the document stops inside of', () => {
      const items = decoder('anime').decode(
        `<myanimelist>${record(1, 'One')}<anime><series_animedb_id>2</series_animedb_id><series_ti`,
      )

      expect(items.map((item) => item.seriesItemDbId)).toEqual([1])
    })

    it('should log and return nothing for input that is not XML', () => {
      const items = decoder('anime').decode('Service temporarily unavailable')

      expect(items).toEqual([])
      expect(log.error).toHaveBeenCalledTimes(1)
    })
  })
})
