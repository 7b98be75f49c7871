// geojson-typed/serialize: GeoJSON output with optional members omitted when null

import type { GeoJSONObject } from './geojson.js'

export type JSONObject = { [key: string]: unknown }

/** Members dropped from output when null, on every GeoJSON object. */
export const BASE_OMIT_IF_NULL: readonly string[] = ['bbox']

/** Additional omit-if-null members per object type. */
export const OMIT_IF_NULL_BY_TYPE: Readonly<Record<string, readonly string[]>> = {
  Feature: ['id'],
}

export interface SerializeOptions {
  /** Extra member names to drop when null, on top of the built-in set. */
  omitIfNull?: readonly string[]
}

export function omitIfNullFields(type: string, extra: readonly string[] = []): Set<string> {
  return new Set([...BASE_OMIT_IF_NULL, ...(OMIT_IF_NULL_BY_TYPE[type] ?? []), ...extra])
}

/**
 * Convert an in-memory GeoJSON object to its wire mapping. Null `bbox`
 * (and null Feature `id`) members are dropped, recursively through
 * features and geometries. Properties are emitted untouched.
 */
export function toJSON(value: GeoJSONObject, options: SerializeOptions = {}): JSONObject {
  const data: JSONObject = { ...value }

  switch (value.type) {
    case 'Feature':
      if (value.geometry !== null) data.geometry = toJSON(value.geometry, options)
      break
    case 'FeatureCollection':
      data.features = value.features.map((f) => toJSON(f, options))
      break
    case 'GeometryCollection':
      data.geometries = value.geometries.map((g) => toJSON(g, options))
      break
  }

  for (const field of omitIfNullFields(value.type, options.omitIfNull)) {
    if (field in data && data[field] == null) delete data[field]
  }
  return data
}

/** The `__geo_interface__` mapping: the JSON-mode form of the object. */
export function geoInterface(value: GeoJSONObject): JSONObject {
  return toJSON(value)
}

/** Serialise to GeoJSON text. */
export function stringify(value: GeoJSONObject, options: SerializeOptions & { space?: number } = {}): string {
  return JSON.stringify(toJSON(value, options), null, options.space)
}
