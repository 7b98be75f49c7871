import { describe, it, expect } from 'vitest'
import { memberAt, memberCount, members } from './collections.js'
import { feature, featureCollection } from './features.js'
import { geometryCollection, lineString, point, polygonFromBounds } from './geometries.js'

describe('FeatureCollection access', () => {
  const first = feature({ id: 1 })
  const second = feature({ id: 2 })
  const third = feature({ id: 3 })
  const fc = featureCollection([first, second, third])

  it('counts features', () => {
    expect(memberCount(fc)).toBe(3)
    expect(memberCount(featureCollection([]))).toBe(0)
  })

  it('indexes from either end', () => {
    expect(memberAt(fc, 0)).toBe(first)
    expect(memberAt(fc, -1)).toBe(third)
    expect(memberAt(fc, 3)).toBeUndefined()
  })

  it('iterates in document order', () => {
    expect([...members(fc)].map((f) => f.id)).toEqual([1, 2, 3])
  })
})

describe('GeometryCollection access', () => {
  const gc = geometryCollection([point([0, 0]), lineString([[0, 0], [1, 1]]), polygonFromBounds(0, 0, 1, 1)])

  it('counts, indexes and iterates geometries', () => {
    expect(memberCount(gc)).toBe(3)
    expect(memberAt(gc, 1)?.type).toBe('LineString')
    expect(memberAt(gc, -1)?.type).toBe('Polygon')
    expect(Array.from(members(gc), (g) => g.type)).toEqual(['Point', 'LineString', 'Polygon'])
  })
})
