// geojson-typed/types: positions, bounding boxes and coordinate containers

import { z } from 'zod'
import { GeoJSONValidationError } from './errors.js'
import { warn } from './warnings.js'

// --- Types ---

export type Position2D = [longitude: number, latitude: number]
export type Position3D = [longitude: number, latitude: number, altitude: number]
export type Position = Position2D | Position3D

/** [minX, minY, maxX, maxY] or [minX, minY, minZ, maxX, maxY, maxZ]. */
export type BBox2D = [number, number, number, number]
export type BBox3D = [number, number, number, number, number, number]
export type BBox = BBox2D | BBox3D

/** At least 2 positions. */
export type LineStringCoords = Position[]
/** At least 4 positions, first equal to last. */
export type LinearRing = Position[]
export type MultiPointCoords = Position[]
export type MultiLineStringCoords = LineStringCoords[]
/** Exterior ring first, then holes. May be empty. */
export type PolygonCoords = LinearRing[]
export type MultiPolygonCoords = PolygonCoords[]

// --- Helpers ---

/** Structural equality: same arity and same components. */
export function positionEquals(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((n, i) => n === b[i])
}

export function positionHasZ(position: readonly number[]): boolean {
  return position.length === 3
}

/**
 * Render a coordinate as float text: integral values keep a trailing `.0`
 * (`102` becomes `102.0`), everything else uses the canonical JS form.
 */
export function formatNumber(n: number): string {
  if (Object.is(n, -0)) return '-0.0'
  if (Number.isInteger(n) && Math.abs(n) < 1e16) return n.toFixed(1)
  return String(n)
}

// --- Bounding box ordering ---

/**
 * Collect ordering violations of a bbox. Y and Z must satisfy min <= max.
 * X may not (the box crosses the antimeridian): that only warns.
 */
export function bboxOrderErrors(bbox: readonly number[]): string[] {
  const errors: string[] = []
  const offset = Math.floor(bbox.length / 2)

  if (bbox[0] > bbox[offset]) {
    warn(
      'antimeridian_bbox',
      `BBOX crossing the Antimeridian line, Min X (${formatNumber(bbox[0])}) > Max X (${formatNumber(bbox[offset])}).`,
    )
  }

  if (bbox[1] > bbox[1 + offset]) {
    errors.push(`Min Y (${formatNumber(bbox[1])}) must be <= Max Y (${formatNumber(bbox[1 + offset])}).`)
  }

  if (offset > 2 && bbox[2] > bbox[2 + offset]) {
    errors.push(`Min Z (${formatNumber(bbox[2])}) must be <= Max Z (${formatNumber(bbox[2 + offset])}).`)
  }

  return errors
}

/** Validate bbox ordering, reporting every violated axis at once. Absent bboxes pass. */
export function validateBBox(bbox: BBox | null | undefined): BBox | null {
  if (bbox == null) return null
  const errors = bboxOrderErrors(bbox)
  if (errors.length > 0) {
    throw new GeoJSONValidationError([
      { kind: 'range_order', path: ['bbox'], message: 'Invalid BBox. Error(s): ' + errors.join(' ') },
    ])
  }
  return bbox
}

// --- Schemas ---

const coordinate = z.number({ invalid_type_error: 'Coordinate must be a number' })

// Arity issues are fatal, so closure and ordering checks never see a tuple
// of the wrong length.

export const PositionSchema = z
  .array(coordinate)
  .superRefine((p, ctx): p is Position => {
    if (p.length === 2 || p.length === 3) return true
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Position must have 2 or 3 coordinates',
      params: { kind: 'structural' },
      fatal: true,
    })
    return false
  })

export const BBoxSchema = z
  .array(coordinate)
  .superRefine((b, ctx): b is BBox => {
    if (b.length === 4 || b.length === 6) return true
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'BBox must have 4 or 6 values',
      params: { kind: 'structural' },
      fatal: true,
    })
    return false
  })
  .superRefine((bbox, ctx) => {
    const errors = bboxOrderErrors(bbox)
    if (errors.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Invalid BBox. Error(s): ' + errors.join(' '),
        params: { kind: 'range_order' },
      })
    }
  })

/** Optional bbox field: absent or null both become `null` in memory. */
export const OptionalBBoxSchema = BBoxSchema.nullable().default(null)

export const MultiPointCoordsSchema = z.array(PositionSchema)

export const LineStringCoordsSchema = z
  .array(PositionSchema)
  .min(2, { message: 'LineString must have at least 2 positions' })

export const LinearRingSchema = z
  .array(PositionSchema)
  .min(4, { message: 'Linear ring must have at least 4 positions' })
  .superRefine((ring, ctx) => {
    // arity failures are reported by min() alone
    if (ring.length < 4) return
    if (!positionEquals(ring[0], ring[ring.length - 1])) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Linear ring must have the same start and end coordinates',
        params: { kind: 'structural' },
      })
    }
  })

export const MultiLineStringCoordsSchema = z.array(LineStringCoordsSchema)

export const PolygonCoordsSchema = z.array(LinearRingSchema)

export const MultiPolygonCoordsSchema = z.array(PolygonCoordsSchema)
