// Polyline simplification using the Ramer-Douglas-Peucker algorithm

import simplify from 'simplify-js'
import type { Point } from './geometry'

/**
 * Drop vertices that deviate less than `tolerance` from the simplified line.
 * A tolerance of 0 (or less) leaves the polyline untouched.
 */
export function simplifyPolyline(points: Point[], tolerance: number): Point[] {
  if (tolerance <= 0 || points.length < 3) return points

  // Convert to simplify-js format and back
  const simplified = simplify(
    points.map(p => ({ x: p.x, y: p.y })),
    tolerance,
    true
  )

  return simplified.map(p => ({ x: p.x, y: p.y }))
}
