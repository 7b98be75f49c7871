// geojson-typed/features: Feature and FeatureCollection schemas and constructors

import { z } from 'zod'
import { validate } from './errors.js'
import type { Feature, FeatureCollection, FeatureId, Geometry, Properties } from './geojson.js'
import { fromGeoInterface, GeometrySchema } from './geometries.js'
import { OptionalBBoxSchema } from './types.js'
import type { BBox } from './types.js'

/** Open string-keyed properties map. */
export const PropertiesSchema = z.record(z.string(), z.unknown())

/** Integer or string. Booleans and fractional numbers are rejected. */
export const FeatureIdSchema = z.custom<FeatureId>(
  (value: unknown) => typeof value === 'string' || Number.isInteger(value),
  { message: 'Feature id must be an integer or a string', params: { kind: 'range_order' } },
)

/**
 * Build a Feature schema for a given geometry schema and properties schema.
 * `type`, `geometry` and `properties` must be present; the last two may be null.
 *
 * ```ts
 * const Building = featureSchema(PolygonSchema, z.object({ name: z.string(), floors: z.number() }))
 * const building = validate(Building, input)
 * building.properties?.floors
 * ```
 */
export function featureSchema<G extends z.ZodTypeAny, P extends z.ZodTypeAny>(geometry: G, properties: P) {
  return z.object({
    type: z.literal('Feature'),
    geometry: z.preprocess(fromGeoInterface, geometry.nullable()),
    properties: properties.nullable(),
    id: FeatureIdSchema.nullable().default(null),
    bbox: OptionalBBoxSchema,
  })
}

/** Build a FeatureCollection schema around a feature schema. */
export function featureCollectionSchema<F extends z.ZodTypeAny>(feature: F) {
  return z.object({
    type: z.literal('FeatureCollection'),
    features: z.array(feature),
    bbox: OptionalBBoxSchema,
  })
}

export const FeatureSchema = featureSchema(GeometrySchema, PropertiesSchema)

// Constructors take geometries and features that were validated when they
// were built; only the members they add are checked here.
const FeatureMembersSchema = z.object({
  id: FeatureIdSchema.nullable().default(null),
  bbox: OptionalBBoxSchema,
})

const CollectionMembersSchema = z.object({ bbox: OptionalBBoxSchema })

export const FeatureCollectionSchema = featureCollectionSchema(FeatureSchema)

// --- Parsing ---

export function parseFeature(input: unknown): Feature {
  return validate(FeatureSchema, input)
}

export function parseFeatureCollection(input: unknown): FeatureCollection {
  return validate(FeatureCollectionSchema, input)
}

// --- Constructors ---

export interface FeatureInit<G extends Geometry, P> {
  geometry?: G | null
  properties?: P | null
  id?: FeatureId | null
  bbox?: BBox | null
}

/**
 * Create a Feature without spelling out `type` or the null members.
 * The geometry and properties values are kept as given; `id` and `bbox` are validated.
 */
export function feature<G extends Geometry = Geometry, P extends object = Properties>(
  init: FeatureInit<G, P> = {},
): Feature<G, P> {
  const geometry = init.geometry ?? null
  const properties = init.properties ?? null
  const checked = validate(FeatureMembersSchema, { id: init.id ?? null, bbox: init.bbox ?? null })
  return { type: 'Feature', geometry, properties, id: checked.id, bbox: checked.bbox }
}

/** Create a FeatureCollection, keeping the given features in order. The bbox is validated. */
export function featureCollection<F extends Feature<Geometry, object>>(
  features: F[],
  bbox: BBox | null = null,
): FeatureCollection<F> {
  const checked = validate(CollectionMembersSchema, { bbox })
  return { type: 'FeatureCollection', features, bbox: checked.bbox }
}
