// Math utilities for geometry operations

import type { BoundingBox, Point } from './types'
import { isPointInBoundingBox } from './bounds'

/**
 * Calculate distance between two points
 */
export function distance(p1: Point, p2: Point): number {
  const dx = p2.x - p1.x
  const dy = p2.y - p1.y
  return Math.sqrt(dx * dx + dy * dy)
}

export function pointsEqual(p1: Point, p2: Point): boolean {
  return p1.x === p2.x && p1.y === p2.y
}

export function midpoint(p1: Point, p2: Point): Point {
  return { x: (p1.x + p2.x) / 2, y: (p1.y + p2.y) / 2 }
}

export function isFinitePoint(p: Point): boolean {
  return Number.isFinite(p.x) && Number.isFinite(p.y)
}

/**
 * Distance from a point to the line segment a-b.
 * A zero-length segment degrades to the distance between points.
 */
export function distanceToSegment(p: Point, a: Point, b: Point): number {
  const dx = b.x - a.x
  const dy = b.y - a.y
  const lengthSquared = dx * dx + dy * dy
  if (lengthSquared === 0) return distance(p, a)

  let t = ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSquared
  t = Math.max(0, Math.min(1, t))
  return distance(p, { x: a.x + t * dx, y: a.y + t * dy })
}

/**
 * Even-odd point-in-polygon test (ray casting).
 * The half-open `(yi > y) !== (yj > y)` comparison keeps a vertex lying exactly
 * at the test y from being counted twice. A point equal to one of the polygon's
 * vertices is inside. When `bbox` is given, points outside it are rejected
 * before walking the edges.
 */
export function isPointInPolygon(point: Point, polygon: Point[], bbox?: BoundingBox): boolean {
  if (bbox && !isPointInBoundingBox(point, bbox)) return false
  if (polygon.some(vertex => pointsEqual(vertex, point))) return true

  let inside = false
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const xi = polygon[i].x, yi = polygon[i].y
    const xj = polygon[j].x, yj = polygon[j].y
    if (((yi > point.y) !== (yj > point.y)) &&
        (point.x < (xj - xi) * (point.y - yi) / (yj - yi) + xi)) {
      inside = !inside
    }
  }
  return inside
}
