import { Box2, Vector2 } from 'three'

// Clamp number between two values:
export const clamp = (val: number, min: number, max: number) => Math.min(Math.max(val, min), max)

export const lerp = (from: number, to: number, t: number) => from + (to - from) * t

/**
 * rounds a fractional value toward a reference, leaving integers untouched
 */
export const roundToward = (val: number, reference: number) => (reference >= val ? Math.ceil(val) : Math.floor(val))

/**
 * Euclidean distance from a column to the nearest column of a half-open rect
 */
export const distanceToRect = (pos: Vector2, rect: Box2) => {
    const nearest = new Vector2(clamp(pos.x, rect.min.x, rect.max.x - 1), clamp(pos.y, rect.min.y, rect.max.y - 1))
    return nearest.distanceTo(pos)
}

export const isNonNegativeInteger = (val: number) => Number.isInteger(val) && val >= 0
