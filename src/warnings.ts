// geojson-typed/warnings: non-fatal validation findings

export type WarningCode =
  | 'antimeridian_bbox'
  | 'single_geometry_collection'
  | 'nested_geometry_collection'
  | 'homogeneous_geometry_collection'

/** A condition GeoJSON discourages but does not forbid. Never thrown by this library. */
export class GeoJSONWarning extends Error {
  readonly code: WarningCode

  constructor(code: WarningCode, message: string) {
    super(message)
    this.name = 'GeoJSONWarning'
    this.code = code
  }
}

export type WarningHandler = (warning: GeoJSONWarning) => void

/** Routes warnings to Node's process warning channel. */
export const emitProcessWarning: WarningHandler = (warning) => {
  process.emitWarning(warning)
}

let handler: WarningHandler = emitProcessWarning

/**
 * Replace the warning sink. Returns the previous handler so it can be restored.
 * Pass `() => {}` to silence warnings entirely.
 */
export function setWarningHandler(next: WarningHandler): WarningHandler {
  const previous = handler
  handler = next
  return previous
}

/** Report a warning through the current handler. */
export function warn(code: WarningCode, message: string): void {
  handler(new GeoJSONWarning(code, message))
}
