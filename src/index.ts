export {
  positionEquals, positionHasZ, formatNumber, bboxOrderErrors, validateBBox,
  PositionSchema, BBoxSchema, OptionalBBoxSchema,
  LineStringCoordsSchema, LinearRingSchema, MultiPointCoordsSchema,
  MultiLineStringCoordsSchema, PolygonCoordsSchema, MultiPolygonCoordsSchema,
  type Position, type Position2D, type Position3D,
  type BBox, type BBox2D, type BBox3D,
  type LineStringCoords, type LinearRing, type MultiPointCoords,
  type MultiLineStringCoords, type PolygonCoords, type MultiPolygonCoords,
} from './types.js'

export type {
  Point, MultiPoint, LineString, MultiLineString, Polygon, MultiPolygon,
  GeometryCollection, Geometry, GeometryType, SingleGeometry,
  Properties, FeatureId, Feature, FeatureCollection, GeoJSONObject, GeoInterface,
} from './geojson.js'

export {
  GEOMETRY_TYPES, isGeometryType, isGeoInterface, fromGeoInterface,
  PointSchema, MultiPointSchema, LineStringSchema, MultiLineStringSchema,
  PolygonSchema, MultiPolygonSchema, GeometryCollectionSchema, GeometrySchema,
  parseGeometry,
  point, multiPoint, lineString, multiLineString, polygon, multiPolygon,
  geometryCollection, polygonFromBounds,
  exterior, interiors, hasZ,
} from './geometries.js'

export { wkt } from './wkt.js'

export {
  PropertiesSchema, FeatureIdSchema, featureSchema, featureCollectionSchema,
  FeatureSchema, FeatureCollectionSchema,
  parseFeature, parseFeatureCollection, feature, featureCollection,
  type FeatureInit,
} from './features.js'

export { memberCount, memberAt, members } from './collections.js'

export {
  BASE_OMIT_IF_NULL, OMIT_IF_NULL_BY_TYPE, omitIfNullFields,
  toJSON, geoInterface, stringify,
  type JSONObject, type SerializeOptions,
} from './serialize.js'

export {
  GeoJSONValidationError, validate,
  type IssueKind, type ValidationIssue,
} from './errors.js'

export {
  GeoJSONWarning, setWarningHandler, emitProcessWarning, warn,
  type WarningCode, type WarningHandler,
} from './warnings.js'
