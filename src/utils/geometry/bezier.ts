// Cubic Bézier flattening - adaptive subdivision into polylines

import type { CurveSegment, Point } from './types'
import { distanceToSegment, isFinitePoint, midpoint, pointsEqual } from './math'

/** Tolerances at or below this are clamped so subdivision always terminates */
export const MIN_FLATTEN_TOLERANCE = 1e-6

/**
 * Build a straight edge as a cubic whose control points sit on the endpoints
 */
export function lineSegment(start: Point, end: Point): CurveSegment {
  return {
    start,
    control1: { x: start.x, y: start.y },
    control2: { x: end.x, y: end.y },
    end,
  }
}

/**
 * Largest distance of either control point from the chord start-end
 */
export function maxDeviation(segment: CurveSegment): number {
  return Math.max(
    distanceToSegment(segment.control1, segment.start, segment.end),
    distanceToSegment(segment.control2, segment.start, segment.end)
  )
}

/**
 * De Casteljau split at parameter t
 */
export function splitCubic(segment: CurveSegment, t: number = 0.5): [CurveSegment, CurveSegment] {
  const lerp = (a: Point, b: Point): Point => ({
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
  })

  const { start, control1, control2, end } = segment
  const p01 = lerp(start, control1)
  const p12 = lerp(control1, control2)
  const p23 = lerp(control2, end)
  const p012 = lerp(p01, p12)
  const p123 = lerp(p12, p23)
  const mid = lerp(p012, p123)

  return [
    { start, control1: p01, control2: p012, end: mid },
    { start: mid, control1: p123, control2: p23, end },
  ]
}

export function isDegenerateSegment(segment: CurveSegment): boolean {
  return pointsEqual(segment.start, segment.end) &&
    pointsEqual(segment.start, segment.control1) &&
    pointsEqual(segment.start, segment.control2)
}

// All four points within `epsilon` of the chord midpoint: splitting further
// cannot make progress in floating point.
function isTooSmallToSplit(segment: CurveSegment, epsilon: number): boolean {
  const center = midpoint(segment.start, segment.end)
  return [segment.start, segment.control1, segment.control2, segment.end]
    .every(p => Math.abs(p.x - center.x) <= epsilon && Math.abs(p.y - center.y) <= epsilon)
}

function isConnected(segments: CurveSegment[]): boolean {
  for (let i = 0; i < segments.length; i++) {
    const s = segments[i]
    if (![s.start, s.control1, s.control2, s.end].every(isFinitePoint)) return false
    if (i > 0 && !pointsEqual(segments[i - 1].end, s.start)) return false
  }
  return true
}

/**
 * Subdivide a connected run of cubic segments until every piece is flat to
 * within `tolerance`, then return the polyline through all segment endpoints.
 *
 * Empty or disconnected input yields an empty list; callers treat that as
 * "no geometry". Zero-length segments contribute no vertex.
 */
export function flattenCurve(segments: CurveSegment[], tolerance: number): Point[] {
  if (segments.length === 0 || !isConnected(segments)) return []

  const flatness = Number.isFinite(tolerance) && tolerance > MIN_FLATTEN_TOLERANCE
    ? tolerance
    : MIN_FLATTEN_TOLERANCE
  const needsSplit = (segment: CurveSegment) =>
    maxDeviation(segment) > flatness && !isTooSmallToSplit(segment, MIN_FLATTEN_TOLERANCE)

  const work = segments.slice()
  let changed = true
  while (changed) {
    changed = false
    let i = 0
    while (i < work.length) {
      if (needsSplit(work[i])) {
        work.splice(i, 1, ...splitCubic(work[i]))
        changed = true
      } else {
        i++
      }
    }
  }

  const vertices: Point[] = [work[0].start]
  for (const segment of work) {
    if (isDegenerateSegment(segment)) continue
    vertices.push(segment.end)
  }
  return vertices
}
