import { describe, it, expect } from 'vitest'
import { createRandom, createSeededRandom, shuffle, systemRandom } from '../../../src/assignment/random.js'

describe('Random', () => {
  it('debe ser reproducible con la misma semilla', () => {
    const a = createSeededRandom(42)
    const b = createSeededRandom(42)

    const first = Array.from({ length: 20 }, () => a.int(1000))
    const second = Array.from({ length: 20 }, () => b.int(1000))

    expect(first).toEqual(second)
  })

  it('debe quedarse dentro del rango', () => {
    const random = createSeededRandom(7)
    for (let i = 0; i < 500; i++) {
      const value = random.int(3)
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(3)
      expect(Number.isInteger(value)).toBe(true)
    }
  })

  it('debe usar Math.random sin semilla', () => {
    expect(createRandom()).toBe(systemRandom)
  })

  it('shuffle debe conservar los elementos y no mutar la entrada', () => {
    const items = [1, 2, 3, 4, 5, 6]
    const result = shuffle(items, createSeededRandom(3))

    expect(items).toEqual([1, 2, 3, 4, 5, 6])
    expect([...result].sort((x, y) => x - y)).toEqual(items)
  })

  it('shuffle debe ser reproducible con la misma semilla', () => {
    const items = ['a', 'b', 'c', 'd', 'e', 'f', 'g']
    expect(shuffle(items, createSeededRandom(99))).toEqual(shuffle(items, createSeededRandom(99)))
  })
})
