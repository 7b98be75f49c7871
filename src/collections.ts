// geojson-typed/collections: ordered access to collection members

import type { Feature, FeatureCollection, Geometry, GeometryCollection } from './geojson.js'

type AnyFeature = Feature<Geometry, unknown>

/** Number of features or geometries. */
export function memberCount(collection: FeatureCollection<AnyFeature> | GeometryCollection): number {
  return collection.type === 'FeatureCollection' ? collection.features.length : collection.geometries.length
}

/** Member at `index`; negative indices count from the end. Undefined when out of range. */
export function memberAt<F extends AnyFeature>(collection: FeatureCollection<F>, index: number): F | undefined
export function memberAt(collection: GeometryCollection, index: number): Geometry | undefined
export function memberAt(
  collection: FeatureCollection<AnyFeature> | GeometryCollection,
  index: number,
): AnyFeature | Geometry | undefined {
  return collection.type === 'FeatureCollection' ? collection.features.at(index) : collection.geometries.at(index)
}

/** Iterate members in document order. */
export function members<F extends AnyFeature>(collection: FeatureCollection<F>): IterableIterator<F>
export function members(collection: GeometryCollection): IterableIterator<Geometry>
export function members(
  collection: FeatureCollection<AnyFeature> | GeometryCollection,
): IterableIterator<AnyFeature | Geometry> {
  return collection.type === 'FeatureCollection' ? collection.features.values() : collection.geometries.values()
}
