// Bounding box utilities - per-polygon bounds and fast rejection tests

import type { BoundingBox, Point } from './types'

/**
 * Box that contains nothing; the identity for unionBoundingBox
 */
export function emptyBoundingBox(): BoundingBox {
  return { xmin: Infinity, xmax: -Infinity, ymin: Infinity, ymax: -Infinity }
}

export function isEmptyBoundingBox(bbox: BoundingBox): boolean {
  return bbox.xmin > bbox.xmax || bbox.ymin > bbox.ymax
}

/**
 * Calculate the bounding box of a set of points in a single sweep
 */
export function computeBoundingBox(points: Point[]): BoundingBox {
  let xmin = Infinity, xmax = -Infinity
  let ymin = Infinity, ymax = -Infinity

  for (const p of points) {
    if (p.x < xmin) xmin = p.x
    if (p.x > xmax) xmax = p.x
    if (p.y < ymin) ymin = p.y
    if (p.y > ymax) ymax = p.y
  }

  return { xmin, xmax, ymin, ymax }
}

export function unionBoundingBox(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    xmin: Math.min(a.xmin, b.xmin),
    xmax: Math.max(a.xmax, b.xmax),
    ymin: Math.min(a.ymin, b.ymin),
    ymax: Math.max(a.ymax, b.ymax),
  }
}

export function boundingBoxCenter(bbox: BoundingBox): Point {
  return {
    x: bbox.xmin + (bbox.xmax - bbox.xmin) / 2,
    y: bbox.ymin + (bbox.ymax - bbox.ymin) / 2,
  }
}

/**
 * Point lies within the box; points on an edge count as inside
 */
export function isPointInBoundingBox(point: Point, bbox: BoundingBox): boolean {
  return !(point.x < bbox.xmin || point.x > bbox.xmax ||
           point.y < bbox.ymin || point.y > bbox.ymax)
}

/**
 * Inner box lies within outer box; shared edges count as inside
 */
export function isBoundingBoxInBoundingBox(inner: BoundingBox, outer: BoundingBox): boolean {
  return !(inner.xmin < outer.xmin || inner.xmax > outer.xmax ||
           inner.ymin < outer.ymin || inner.ymax > outer.ymax)
}
