import { bench, describe } from 'vitest'
import { wkt } from './wkt.js'
import { parseGeometry, polygon, multiPolygon } from './geometries.js'
import { parseFeatureCollection } from './features.js'
import type { Position } from './types.js'

// Closed ring with `n` vertices on a unit circle around (lon, lat)
function ring(n: number, lon = 0, lat = 0, alt?: number): Position[] {
  const out: Position[] = []
  for (let i = 0; i < n; i++) {
    const a = (2 * Math.PI * i) / n
    const x = lon + Math.cos(a)
    const y = lat + Math.sin(a)
    out.push(alt === undefined ? [x, y] : [x, y, alt])
  }
  out.push(out[0])
  return out
}

const SMALL = polygon([ring(8)])
const LARGE = polygon([ring(1_000), ring(100, 0, 0)])
const LARGE_Z = polygon([ring(1_000, 0, 0, 12.5)])
const MULTI = multiPolygon(Array.from({ length: 50 }, (_, i) => [ring(64, i * 3, 0)]))

describe('wkt', () => {
  bench('polygon, 8 vertices', () => { wkt(SMALL) })
  bench('polygon, 1000 + 100 vertices', () => { wkt(LARGE) })
  bench('polygon Z, 1000 vertices', () => { wkt(LARGE_Z) })
  bench('multipolygon, 50 x 64 vertices', () => { wkt(MULTI) })
})

describe('parseGeometry', () => {
  const input = { type: 'Polygon', coordinates: [ring(1_000)] }
  bench('polygon, 1000 vertices', () => { parseGeometry(input) })
})

describe('parseFeatureCollection', () => {
  const input = {
    type: 'FeatureCollection',
    features: Array.from({ length: 200 }, (_, i) => ({
      type: 'Feature',
      id: i,
      geometry: { type: 'Point', coordinates: [i / 10, i / 20] },
      properties: { name: `site-${i}` },
    })),
  }
  bench('200 point features', () => { parseFeatureCollection(input) })
})
