import { describe, it, expect, beforeEach } from 'vitest'
import { binarySearch, clearSearchCache, createFuzzySearch, fuzzySearch, hybridSearch } from '../lib/search'

interface Item {
  id: number
  label: string
}

const items: Item[] = [
  { id: 1, label: 'apple' },
  { id: 4, label: 'banana' },
  { id: 9, label: 'cherry' },
  { id: 12, label: 'applesauce' },
]

describe('binarySearch', () => {
  const sorted = [...items].sort((a, b) => a.id - b.id)

  it('finds every present key', () => {
    for (const item of sorted) {
      expect(binarySearch(sorted, item.id, i => i.id)).toBe(item)
    }
  })

  it('returns undefined for absent keys and empty input', () => {
    expect(binarySearch(sorted, 5, i => i.id)).toBeUndefined()
    expect(binarySearch(sorted, 0, i => i.id)).toBeUndefined()
    expect(binarySearch(sorted, 100, i => i.id)).toBeUndefined()
    expect(binarySearch([], 1, (i: Item) => i.id)).toBeUndefined()
  })
})

describe('fuzzy search', () => {
  beforeEach(() => clearSearchCache())

  it('reuses the index for the same data and options', () => {
    const options = { keys: ['label'] }
    expect(createFuzzySearch(items, options)).toBe(createFuzzySearch(items, options))
    expect(createFuzzySearch(items, { keys: ['label'], threshold: 0.1 })).not.toBe(createFuzzySearch(items, options))
    expect(createFuzzySearch([...items], options)).not.toBe(createFuzzySearch(items, options))
  })

  it('drops cached indexes when cleared', () => {
    const options = { keys: ['label'] }
    const first = createFuzzySearch(items, options)
    clearSearchCache()
    expect(createFuzzySearch(items, options)).not.toBe(first)
  })

  it('returns all data for an empty query', () => {
    expect(fuzzySearch(items, '', { keys: ['label'] })).toEqual(items)
  })

  it('returns nothing for queries under the minimum length', () => {
    expect(fuzzySearch(items, 'a', { keys: ['label'], minMatchCharLength: 2 })).toEqual([])
  })

  it('matches close spellings', () => {
    expect(fuzzySearch(items, 'chery', { keys: ['label'], threshold: 0.4 }).map(i => i.id)).toEqual([9])
  })

  it('orders exact, then prefix, then fuzzy matches', () => {
    const data: Item[] = [
      { id: 1, label: 'applesauce' },
      { id: 2, label: 'pineapple' },
      { id: 3, label: 'apple' },
      { id: 4, label: 'banana' },
    ]
    const ids = hybridSearch(data, 'Apple', { keys: ['label'], threshold: 0.4 }, i => i.label).map(i => i.id)
    expect(ids).toEqual([3, 1, 2])
  })

  it('keeps separate indexes for differently typed data', () => {
    const numbers = [{ value: 3, tag: 'three' }, { value: 30, tag: 'thirty' }]
    const words = createFuzzySearch(items, { keys: ['label'] })
    const tags = createFuzzySearch(numbers, { keys: ['tag'] })

    expect(tags).not.toBe(words)
    expect(tags.search('thirty').map(r => r.item.value)).toEqual([30])
    expect(createFuzzySearch(numbers, { keys: ['tag'] })).toBe(tags)
  })
})
