// geojson-typed/wkt: Well-Known Text rendering

import type { Geometry, SingleGeometry } from './geojson.js'
import { hasZ } from './geometries.js'
import { formatNumber } from './types.js'
import type { PolygonCoords, Position } from './types.js'

// A geometry with Z renders every position in 3D; 2D positions get altitude 0.0.

function positionText(position: Position, forceZ: boolean): string {
  const text = position.map(formatNumber).join(' ')
  return forceZ && position.length < 3 ? `${text} 0.0` : text
}

function positionListText(positions: Position[], forceZ: boolean): string {
  return positions.map((p) => positionText(p, forceZ)).join(', ')
}

function linesText(lines: Position[][], forceZ: boolean): string {
  return lines.map((line) => `(${positionListText(line, forceZ)})`).join(', ')
}

function polygonsText(polygons: PolygonCoords[], forceZ: boolean): string {
  return polygons.map((rings) => `(${linesText(rings, forceZ)})`).join(', ')
}

/** Coordinate text inside the geometry's own parentheses. */
function coordinatesText(geometry: SingleGeometry, forceZ: boolean): string {
  switch (geometry.type) {
    case 'Point':
      return positionText(geometry.coordinates, forceZ)
    case 'MultiPoint':
      return geometry.coordinates.map((p) => `(${positionText(p, forceZ)})`).join(', ')
    case 'LineString':
      return positionListText(geometry.coordinates, forceZ)
    case 'MultiLineString':
    case 'Polygon':
      return linesText(geometry.coordinates, forceZ)
    case 'MultiPolygon':
      return polygonsText(geometry.coordinates, forceZ)
  }
}

/**
 * Render a geometry as WKT, e.g. `POINT (102.0 0.5)`, `POINT Z (0.0 0.0 0.0)`,
 * `POLYGON EMPTY`. A collection is tagged Z when any member has Z.
 */
export function wkt(geometry: Geometry): string {
  const name = geometry.type.toUpperCase()
  const z = hasZ(geometry)

  if (geometry.type === 'GeometryCollection') {
    if (geometry.geometries.length === 0) return `${name} EMPTY`
    return `${name}${z ? ' Z ' : ' '}(${geometry.geometries.map((g) => wkt(g)).join(', ')})`
  }

  if (geometry.coordinates.length === 0) return `${name} EMPTY`
  return `${name}${z ? ' Z ' : ' '}(${coordinatesText(geometry, z)})`
}
