// geojson-typed/geometries: geometry schemas, parsing, constructors, Z detection

import { z } from 'zod'
import { GeoJSONValidationError, validate } from './errors.js'
import type {
  Geometry, GeometryCollection, GeometryType, GeoInterface, LineString,
  MultiLineString, MultiPoint, MultiPolygon, Point, Polygon,
} from './geojson.js'
import {
  LineStringCoordsSchema, MultiLineStringCoordsSchema, MultiPointCoordsSchema,
  MultiPolygonCoordsSchema, OptionalBBoxSchema, PolygonCoordsSchema, PositionSchema,
  positionHasZ,
} from './types.js'
import type {
  BBox, LinearRing, LineStringCoords, MultiLineStringCoords, MultiPointCoords,
  MultiPolygonCoords, PolygonCoords, Position,
} from './types.js'
import { warn } from './warnings.js'

export const GEOMETRY_TYPES: readonly GeometryType[] = [
  'Point', 'MultiPoint', 'LineString', 'MultiLineString',
  'Polygon', 'MultiPolygon', 'GeometryCollection',
]

export function isGeometryType(value: unknown): value is GeometryType {
  return GEOMETRY_TYPES.some((t) => t === value)
}

// --- Geo interface adapter ---

export function isGeoInterface(value: unknown): value is GeoInterface {
  return typeof value === 'object' && value !== null &&
    'toGeoJSON' in value && typeof value.toGeoJSON === 'function'
}

/** Replace a foreign geometry object by its GeoJSON mapping; pass anything else through. */
export function fromGeoInterface(value: unknown): unknown {
  return isGeoInterface(value) ? value.toGeoJSON() : value
}

// --- Schemas ---

export const PointSchema = z.object({
  type: z.literal('Point'),
  coordinates: PositionSchema,
  bbox: OptionalBBoxSchema,
})

export const MultiPointSchema = z.object({
  type: z.literal('MultiPoint'),
  coordinates: MultiPointCoordsSchema,
  bbox: OptionalBBoxSchema,
})

export const LineStringSchema = z.object({
  type: z.literal('LineString'),
  coordinates: LineStringCoordsSchema,
  bbox: OptionalBBoxSchema,
})

export const MultiLineStringSchema = z.object({
  type: z.literal('MultiLineString'),
  coordinates: MultiLineStringCoordsSchema,
  bbox: OptionalBBoxSchema,
})

export const PolygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: PolygonCoordsSchema,
  bbox: OptionalBBoxSchema,
})

export const MultiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: MultiPolygonCoordsSchema,
  bbox: OptionalBBoxSchema,
})

/** Warn about collections RFC 7946 discourages. */
function checkCollectionMembers(geometries: Geometry[]): void {
  if (geometries.length === 1) {
    warn('single_geometry_collection', 'GeometryCollection should not be used for single geometries.')
  }
  if (geometries.some((g) => g.type === 'GeometryCollection')) {
    warn('nested_geometry_collection', 'GeometryCollection should not be used for nested GeometryCollections.')
  }
  if (new Set(geometries.map((g) => g.type)).size === 1) {
    warn('homogeneous_geometry_collection', 'GeometryCollection should not be used for homogeneous collections.')
  }
}

export const GeometryCollectionSchema = z.object({
  type: z.literal('GeometryCollection'),
  geometries: z.array(z.lazy(() => GeometrySchema)).superRefine(checkCollectionMembers),
  bbox: OptionalBBoxSchema,
})

function geometryTagMessage(data: unknown): string {
  const tag = typeof data === 'object' && data !== null && 'type' in data ? data.type : undefined
  return tag === undefined
    ? "Missing 'type' field in geometry"
    : `Unknown type: ${String(tag)}`
}

/** Any geometry, dispatched on `type`. Only the matched variant's issues are reported. */
export const GeometrySchema: z.ZodType<Geometry, z.ZodTypeDef, unknown> = z.preprocess(
  fromGeoInterface,
  z.discriminatedUnion(
    'type',
    [
      PointSchema, MultiPointSchema, LineStringSchema, MultiLineStringSchema,
      PolygonSchema, MultiPolygonSchema, GeometryCollectionSchema,
    ],
    {
      errorMap: (issue, ctx) => issue.code === z.ZodIssueCode.invalid_union_discriminator
        ? { message: geometryTagMessage(ctx.data) }
        : { message: ctx.defaultError },
    },
  ),
)

const GEOMETRY_SCHEMAS: Record<GeometryType, z.ZodType<Geometry, z.ZodTypeDef, unknown>> = {
  Point: PointSchema,
  MultiPoint: MultiPointSchema,
  LineString: LineStringSchema,
  MultiLineString: MultiLineStringSchema,
  Polygon: PolygonSchema,
  MultiPolygon: MultiPolygonSchema,
  GeometryCollection: GeometryCollectionSchema,
}

// --- Parsing ---

/**
 * Read the `type` member of an untyped object and validate it as that geometry.
 * Objects exposing `toGeoJSON()` are converted first.
 */
export function parseGeometry(obj: unknown): Geometry {
  const input = fromGeoInterface(obj)
  if (typeof input !== 'object' || input === null || !('type' in input)) {
    throw new GeoJSONValidationError([
      { kind: 'unknown_type', path: ['type'], message: "Missing 'type' field in geometry" },
    ])
  }
  if (!isGeometryType(input.type)) {
    throw new GeoJSONValidationError([
      { kind: 'unknown_type', path: ['type'], message: `Unknown type: ${String(input.type)}` },
    ])
  }
  return validate(GEOMETRY_SCHEMAS[input.type], input)
}

// --- Constructors ---

export function point(coordinates: Position, bbox: BBox | null = null): Point {
  return validate(PointSchema, { type: 'Point', coordinates, bbox })
}

export function multiPoint(coordinates: MultiPointCoords, bbox: BBox | null = null): MultiPoint {
  return validate(MultiPointSchema, { type: 'MultiPoint', coordinates, bbox })
}

export function lineString(coordinates: LineStringCoords, bbox: BBox | null = null): LineString {
  return validate(LineStringSchema, { type: 'LineString', coordinates, bbox })
}

export function multiLineString(coordinates: MultiLineStringCoords, bbox: BBox | null = null): MultiLineString {
  return validate(MultiLineStringSchema, { type: 'MultiLineString', coordinates, bbox })
}

export function polygon(coordinates: PolygonCoords, bbox: BBox | null = null): Polygon {
  return validate(PolygonSchema, { type: 'Polygon', coordinates, bbox })
}

export function multiPolygon(coordinates: MultiPolygonCoords, bbox: BBox | null = null): MultiPolygon {
  return validate(MultiPolygonSchema, { type: 'MultiPolygon', coordinates, bbox })
}

export function geometryCollection(geometries: Geometry[], bbox: BBox | null = null): GeometryCollection {
  return validate(GeometryCollectionSchema, { type: 'GeometryCollection', geometries, bbox })
}

/** Rectangle polygon from a bounding box, counter-clockwise from (xmin, ymin). */
export function polygonFromBounds(xmin: number, ymin: number, xmax: number, ymax: number): Polygon {
  return polygon([
    [[xmin, ymin], [xmax, ymin], [xmax, ymax], [xmin, ymax], [xmin, ymin]],
  ])
}

// --- Polygon rings ---

/** The exterior ring, or null for an empty polygon. */
export function exterior(geometry: Polygon): LinearRing | null {
  return geometry.coordinates.length > 0 ? geometry.coordinates[0] : null
}

/** The interior rings (holes). */
export function* interiors(geometry: Polygon): IterableIterator<LinearRing> {
  yield* geometry.coordinates.slice(1)
}

// --- Dimensionality ---

/** True if any position of the geometry carries an altitude. */
export function hasZ(geometry: Geometry): boolean {
  switch (geometry.type) {
    case 'Point':
      return positionHasZ(geometry.coordinates)
    case 'MultiPoint':
    case 'LineString':
      return geometry.coordinates.some((p) => positionHasZ(p))
    case 'MultiLineString':
    case 'Polygon':
      return geometry.coordinates.some((line) => line.some((p) => positionHasZ(p)))
    case 'MultiPolygon':
      return geometry.coordinates.some((poly) => poly.some((ring) => ring.some((p) => positionHasZ(p))))
    case 'GeometryCollection':
      return geometry.geometries.some((g) => hasZ(g))
  }
}
