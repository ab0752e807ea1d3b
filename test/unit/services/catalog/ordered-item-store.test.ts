import { type CatalogItem, createEmptyItem } from '@root/types/catalog.types.js'
import {
  compareOrderingKeys,
  OrderedItemStore,
} from '@services/catalog/ordered-item-store.js'
import { describe, expect, it } from 'vitest'

const makeItem = (
  seriesItemDbId: number,
  seriesTitle: string,
  seriesDateBegin: string,
): CatalogItem => ({
  ...createEmptyItem(),
  seriesItemDbId,
  seriesTitle,
  seriesDateBegin,
})

const titles = (store: OrderedItemStore) =>
  store.snapshot().map((item) => item.seriesTitle)

describe('compareOrderingKeys', () => {
  it('should put later months first', () => {
    expect(
      compareOrderingKeys(
        { month: '2020-10', title: 'Z' },
        { month: '2020-04', title: 'A' },
      ),
    ).toBe(-1)
  })

  it('should order titles ascending within a month', () => {
    expect(
      compareOrderingKeys(
        { month: '2020-04', title: 'B' },
        { month: '2020-04', title: 'A' },
      ),
    ).toBe(1)
  })

  it('should treat equal month and title as the same slot', () => {
    expect(
      compareOrderingKeys(
        { month: '2020-04', title: 'A' },
        { month: '2020-04', title: 'A' },
      ),
    ).toBe(0)
  })
})

describe('OrderedItemStore', () => {
  it('should order by begin month descending, then title', () => {
    const store = new OrderedItemStore()
    store.insert(makeItem(2, 'B', '2020-04-10'))
    store.insert(makeItem(3, 'C', '2020-10-01'))
    store.insert(makeItem(1, 'A', '2020-04-20'))

    expect(titles(store)).toEqual(['C', 'A', 'B'])
  })

  it('should ignore the day of month when ordering', () => {
    const store = new OrderedItemStore()
    store.insert(makeItem(1, 'Later day', '2020-04-30'))
    store.insert(makeItem(2, 'Earlier day', '2020-04-01'))

    expect(titles(store)).toEqual(['Earlier day', 'Later day'])
  })

  it('should sort unknown dates after real ones', () => {
    const store = new OrderedItemStore()
    store.insert(makeItem(1, 'Unknown', '0000-00-00'))
    store.insert(makeItem(2, 'Known', '1999-01-01'))

    expect(titles(store)).toEqual(['Known', 'Unknown'])
  })

  it('should replace an item with an equal key instead of growing', () => {
    const store = new OrderedItemStore()

    expect(store.insert(makeItem(1, 'A', '2020-04-01'))).toBe(true)
    expect(store.insert({ ...makeItem(1, 'A', '2020-04-01'), episodes: 5 })).toBe(
      false,
    )

    expect(store.size).toBe(1)
    expect(store.snapshot()[0].episodes).toBe(5)
  })

  it('should let two series with the same month and title collide', () => {
    const store = new OrderedItemStore()
    store.insert(makeItem(1, 'Same', '2020-04-01'))
    store.insert(makeItem(2, 'Same', '2020-04-15'))

    expect(store.size).toBe(1)
    expect(store.snapshot()[0].seriesItemDbId).toBe(2)
  })

  it('should replace the whole content with replaceAll', () => {
    const store = new OrderedItemStore()
    store.insert(makeItem(1, 'Old', '2020-01-01'))

    store.replaceAll([
      makeItem(2, 'New B', '2021-01-01'),
      makeItem(3, 'New A', '2021-01-01'),
    ])

    expect(titles(store)).toEqual(['New A', 'New B'])
  })

  it('should hand out copies', () => {
    const store = new OrderedItemStore()
    const item = makeItem(1, 'A', '2020-04-01')
    store.insert(item)
    item.seriesTitle = 'Mutated'

    const [copy] = store.snapshot()
    copy.tags.push('changed')

    expect(store.snapshot()[0]).toMatchObject({ seriesTitle: 'A', tags: [] })
  })

  it('should visit items in order with forEach', () => {
    const store = new OrderedItemStore()
    store.insert(makeItem(1, 'B', '2020-04-01'))
    store.insert(makeItem(2, 'A', '2020-04-01'))

    const seen: string[] = []
    store.forEach((item, index) => seen.push(`${index}:${item.seriesTitle}`))

    expect(seen).toEqual(['0:A', '1:B'])
  })

  it('should find items and clear', () => {
    const store = new OrderedItemStore()
    store.insert(makeItem(7, 'A', '2020-04-01'))

    expect(store.find((item) => item.seriesItemDbId === 7)?.seriesTitle).toBe(
      'A',
    )
    expect(store.find((item) => item.seriesItemDbId === 8)).toBeUndefined()

    store.clear()
    expect(store.size).toBe(0)
  })
})
