import type { CatalogItem } from '@root/types/catalog.types.js'

/**
 * Display key a store orders and deduplicates by.
 *
 * Identity plays no part: two different series that share a begin month
 * and a title occupy the same slot. Swap `orderingKeyOf` for an
 * identity-based key to change that.
 */
export interface OrderingKey {
  /** `YYYY-MM` prefix of the series begin date */
  month: string
  title: string
}

export function orderingKeyOf(item: CatalogItem): OrderingKey {
  return {
    month: item.seriesDateBegin.slice(0, 7),
    title: item.seriesTitle,
  }
}

/**
 * Later months first, then titles in ascending code-unit order.
 * Returns 0 when both keys name the same slot.
 */
export function compareOrderingKeys(a: OrderingKey, b: OrderingKey): number {
  if (a.month !== b.month) {
    return a.month > b.month ? -1 : 1
  }
  if (a.title === b.title) return 0
  return a.title < b.title ? -1 : 1
}

/**
 * Ordered, deduplicating item collection.
 *
 * Every method runs to completion synchronously, so a reader can never see
 * a half-applied insert. Items go in and come out as copies; callers never
 * hold a live reference into the store.
 */
export class OrderedItemStore<T extends CatalogItem = CatalogItem> {
  private items: T[] = []

  get size(): number {
    return this.items.length
  }

  /**
   * Inserts a copy of the item, replacing any item with an equal key.
   * @returns true when the store grew
   */
  insert(item: T): boolean {
    const key = orderingKeyOf(item)
    const index = this.lowerBound(key)
    const copy = structuredClone(item)

    const existing = this.items[index]
    if (
      existing !== undefined &&
      compareOrderingKeys(orderingKeyOf(existing), key) === 0
    ) {
      this.items[index] = copy
      return false
    }

    this.items.splice(index, 0, copy)
    return true
  }

  /**
   * Clears the store and inserts the batch in one step
   */
  replaceAll(items: readonly T[]): void {
    this.items = []
    for (const item of items) {
      this.insert(item)
    }
  }

  clear(): void {
    this.items = []
  }

  snapshot(): T[] {
    return this.items.map((item) => structuredClone(item))
  }

  forEach(fn: (item: T, index: number) => void): void {
    this.snapshot().forEach(fn)
  }

  find(predicate: (item: T) => boolean): T | undefined {
    const found = this.items.find(predicate)
    return found === undefined ? undefined : structuredClone(found)
  }

  /** Index of the first item whose key does not sort before `key` */
  private lowerBound(key: OrderingKey): number {
    let low = 0
    let high = this.items.length
    while (low < high) {
      const mid = (low + high) >>> 1
      if (compareOrderingKeys(orderingKeyOf(this.items[mid]), key) < 0) {
        low = mid + 1
      } else {
        high = mid
      }
    }
    return low
  }
}
