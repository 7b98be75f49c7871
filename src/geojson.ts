// geojson-typed/geojson: in-memory shapes of GeoJSON objects (RFC 7946)

import type {
  BBox, LineStringCoords, MultiLineStringCoords, MultiPointCoords,
  MultiPolygonCoords, PolygonCoords, Position,
} from './types.js'

// Absent optional members (bbox, id) are held as `null` in memory and
// dropped only when serialising, see serialize.ts.

export interface Point {
  readonly type: 'Point'
  readonly coordinates: Position
  readonly bbox: BBox | null
}

export interface MultiPoint {
  readonly type: 'MultiPoint'
  readonly coordinates: MultiPointCoords
  readonly bbox: BBox | null
}

export interface LineString {
  readonly type: 'LineString'
  readonly coordinates: LineStringCoords
  readonly bbox: BBox | null
}

export interface MultiLineString {
  readonly type: 'MultiLineString'
  readonly coordinates: MultiLineStringCoords
  readonly bbox: BBox | null
}

/** Coordinates are rings; the first is the exterior, the rest are holes. */
export interface Polygon {
  readonly type: 'Polygon'
  readonly coordinates: PolygonCoords
  readonly bbox: BBox | null
}

export interface MultiPolygon {
  readonly type: 'MultiPolygon'
  readonly coordinates: MultiPolygonCoords
  readonly bbox: BBox | null
}

export interface GeometryCollection {
  readonly type: 'GeometryCollection'
  readonly geometries: Geometry[]
  readonly bbox: BBox | null
}

export type Geometry =
  | Point
  | MultiPoint
  | LineString
  | MultiLineString
  | Polygon
  | MultiPolygon
  | GeometryCollection

export type GeometryType = Geometry['type']

/** Geometries that carry a `coordinates` member. */
export type SingleGeometry = Exclude<Geometry, GeometryCollection>

/** Default feature properties: an open string-keyed map. */
export type Properties = Record<string, unknown>

export type FeatureId = string | number

export interface Feature<G extends Geometry = Geometry, P = Properties> {
  readonly type: 'Feature'
  readonly geometry: G | null
  readonly properties: P | null
  readonly id: FeatureId | null
  readonly bbox: BBox | null
}

export interface FeatureCollection<F extends Feature<Geometry, unknown> = Feature> {
  readonly type: 'FeatureCollection'
  readonly features: F[]
  readonly bbox: BBox | null
}

export type GeoJSONObject = Geometry | Feature<Geometry, unknown> | FeatureCollection<Feature<Geometry, unknown>>

/**
 * Capability of foreign geometry objects (Leaflet layers, other GIS
 * libraries) to present themselves as a GeoJSON geometry mapping.
 */
export interface GeoInterface {
  toGeoJSON(): unknown
}
