import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import {
  positionEquals, positionHasZ, formatNumber, validateBBox,
  PositionSchema, BBoxSchema, LineStringCoordsSchema, LinearRingSchema, PolygonCoordsSchema,
} from './types.js'
import { GeoJSONValidationError } from './errors.js'
import { setWarningHandler, type GeoJSONWarning, type WarningHandler } from './warnings.js'

let previous: WarningHandler
const onWarning = vi.fn<(warning: GeoJSONWarning) => void>()

beforeEach(() => {
  onWarning.mockClear()
  previous = setWarningHandler(onWarning)
})

afterEach(() => {
  setWarningHandler(previous)
})

describe('positionEquals', () => {
  it('compares components structurally', () => {
    expect(positionEquals([1, 2], [1, 2])).toBe(true)
    expect(positionEquals([1, 2], [2, 1])).toBe(false)
  })

  it('treats 2D and 3D positions as different', () => {
    expect(positionEquals([1, 2], [1, 2, 0])).toBe(false)
  })
})

describe('positionHasZ', () => {
  it('is true only for three components', () => {
    expect(positionHasZ([1, 2])).toBe(false)
    expect(positionHasZ([1, 2, 3])).toBe(true)
  })
})

describe('formatNumber', () => {
  it('keeps a trailing .0 on integral values', () => {
    expect(formatNumber(102)).toBe('102.0')
    expect(formatNumber(-3)).toBe('-3.0')
    expect(formatNumber(0)).toBe('0.0')
    expect(formatNumber(-0)).toBe('-0.0')
  })

  it('uses the shortest decimal form otherwise', () => {
    expect(formatNumber(0.5)).toBe('0.5')
    expect(formatNumber(1.01)).toBe('1.01')
    expect(formatNumber(-0.1278)).toBe('-0.1278')
  })
})

describe('validateBBox', () => {
  it('passes absent bboxes through as null', () => {
    expect(validateBBox(null)).toBeNull()
    expect(validateBBox(undefined)).toBeNull()
  })

  it('returns an ordered bbox unchanged', () => {
    expect(validateBBox([0, 0, 1, 1])).toEqual([0, 0, 1, 1])
    expect(validateBBox([0, 0, 0, 1, 1, 1])).toEqual([0, 0, 0, 1, 1, 1])
  })

  it('rejects min Y > max Y', () => {
    expect(() => validateBBox([0, 100, 0, 0])).toThrow(
      'Invalid GeoJSON. Error(s): bbox: Invalid BBox. Error(s): Min Y (100.0) must be <= Max Y (0.0).',
    )
  })

  it('rejects min Z > max Z on a 3D bbox', () => {
    expect(() => validateBBox([0, 0, 100, 0, 0, 0])).toThrow('Min Z (100.0) must be <= Max Z (0.0).')
  })

  it('reports every violated axis in one error', () => {
    let caught: unknown
    try {
      validateBBox([0, 5, 5, 1, 1, 1])
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(GeoJSONValidationError)
    if (!(caught instanceof GeoJSONValidationError)) return
    expect(caught.issues).toEqual([{
      kind: 'range_order',
      path: ['bbox'],
      message: 'Invalid BBox. Error(s): Min Y (5.0) must be <= Max Y (1.0). Min Z (5.0) must be <= Max Z (1.0).',
    }])
  })

  it('only warns when min X > max X (antimeridian)', () => {
    expect(validateBBox([100, 0, 0, 0])).toEqual([100, 0, 0, 0])
    expect(onWarning).toHaveBeenCalledTimes(1)
    const warning = onWarning.mock.calls[0][0]
    expect(warning.code).toBe('antimeridian_bbox')
    expect(warning.message).toBe('BBOX crossing the Antimeridian line, Min X (100.0) > Max X (0.0).')
  })
})

describe('PositionSchema', () => {
  it('accepts 2 or 3 numbers', () => {
    expect(PositionSchema.safeParse([1, 2]).success).toBe(true)
    expect(PositionSchema.safeParse([1, 2, 3]).success).toBe(true)
  })

  it('rejects other arities and non-numbers', () => {
    expect(PositionSchema.safeParse([1]).success).toBe(false)
    expect(PositionSchema.safeParse([1, 2, 3, 4]).success).toBe(false)
    expect(PositionSchema.safeParse([1, 'a']).success).toBe(false)
  })
})

describe('BBoxSchema', () => {
  it('rejects wrong lengths', () => {
    const result = BBoxSchema.safeParse([0, 0, 0])
    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.issues.map((i) => i.message)).toEqual(['BBox must have 4 or 6 values'])
  })

  it('stops at the length check', () => {
    const result = BBoxSchema.safeParse([10, 5, 0, 0, 0])
    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.issues.map((i) => i.message)).toEqual(['BBox must have 4 or 6 values'])
    expect(onWarning).not.toHaveBeenCalled()
  })

  it('rejects non-numeric values', () => {
    expect(BBoxSchema.safeParse([0, 'a', 0, 0]).success).toBe(false)
  })

  it('tags ordering failures as range_order', () => {
    const result = BBoxSchema.safeParse([0, 100, 0, 0])
    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.issues).toHaveLength(1)
    expect(result.error.issues[0]).toMatchObject({ code: 'custom', params: { kind: 'range_order' } })
  })
})

describe('LineStringCoordsSchema', () => {
  it('requires two positions', () => {
    expect(LineStringCoordsSchema.safeParse([[0, 0]]).success).toBe(false)
    expect(LineStringCoordsSchema.safeParse([[0, 0], [1, 1]]).success).toBe(true)
  })
})

describe('LinearRingSchema', () => {
  it('accepts a closed ring of four positions', () => {
    expect(LinearRingSchema.safeParse([[0, 0], [1, 1], [2, 2], [0, 0]]).success).toBe(true)
  })

  it('rejects an unclosed ring', () => {
    const result = LinearRingSchema.safeParse([[0, 0], [1, 1], [2, 2], [3, 3]])
    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.issues.map((i) => i.message)).toEqual([
      'Linear ring must have the same start and end coordinates',
    ])
  })

  it('checks arity before closure', () => {
    const result = LinearRingSchema.safeParse([[0, 0], [1, 1], [2, 2]])
    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.issues.map((i) => i.message)).toEqual([
      'Linear ring must have at least 4 positions',
    ])
  })

  it('skips the closure check when a position has the wrong arity', () => {
    const result = LinearRingSchema.safeParse([[0, 0], [1, 1], [2, 2], [0]])
    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.error.issues.map((i) => [i.path, i.message])).toEqual([
      [[3], 'Position must have 2 or 3 coordinates'],
    ])
  })

  it('compares the closing position including altitude', () => {
    expect(LinearRingSchema.safeParse([[0, 0, 1], [1, 1], [2, 2], [0, 0]]).success).toBe(false)
  })
})

describe('PolygonCoordsSchema', () => {
  it('accepts an empty ring list', () => {
    expect(PolygonCoordsSchema.safeParse([]).success).toBe(true)
  })

  it('rejects an empty ring inside a non-empty list', () => {
    expect(PolygonCoordsSchema.safeParse([[]]).success).toBe(false)
  })
})
