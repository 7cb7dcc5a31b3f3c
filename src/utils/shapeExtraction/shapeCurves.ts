// Shape normalization - every drawable kind becomes subpaths of cubic segments

import type { ShapeDescriptor } from '../../types/svg'
import type { CurveSegment, Point } from '../geometry/types'
import { lineSegment } from '../geometry/bezier'
import { pointsEqual } from '../geometry/math'
import { arcToCubics, parsePathData } from '../geometry/pathParsing'

/**
 * Straight edges through `points`; a closed run gets an edge back to the start
 */
export function polylineToSegments(points: Point[], closed: boolean): CurveSegment[] {
  const segments: CurveSegment[] = []
  for (let i = 1; i < points.length; i++) {
    segments.push(lineSegment(points[i - 1], points[i]))
  }
  const first = points[0]
  const last = points[points.length - 1]
  if (closed && points.length > 1 && !pointsEqual(first, last)) {
    segments.push(lineSegment(last, first))
  }
  return segments
}

/**
 * Closed ellipse as two half arcs: left to right, then back
 */
export function ellipseToSegments(cx: number, cy: number, rx: number, ry: number): CurveSegment[] {
  const left = { x: cx - rx, y: cy }
  const right = { x: cx + rx, y: cy }
  return [
    ...arcToCubics(left, rx, ry, 0, true, false, right),
    ...arcToCubics(right, rx, ry, 0, true, false, left),
  ]
}

/**
 * Rectangle outline clockwise from the top-left corner. Corner radii are
 * clamped to half the side lengths; both must be positive to round corners.
 */
export function rectToSegments(
  x: number,
  y: number,
  width: number,
  height: number,
  rx: number = 0,
  ry: number = 0
): CurveSegment[] {
  const cornerX = Math.min(rx, width / 2)
  const cornerY = Math.min(ry, height / 2)

  if (cornerX <= 0 || cornerY <= 0) {
    return polylineToSegments([
      { x, y },
      { x: x + width, y },
      { x: x + width, y: y + height },
      { x, y: y + height },
    ], true)
  }

  const right = x + width
  const bottom = y + height
  const corners: Array<[Point, Point]> = [
    [{ x: right - cornerX, y }, { x: right, y: y + cornerY }],
    [{ x: right, y: bottom - cornerY }, { x: right - cornerX, y: bottom }],
    [{ x: x + cornerX, y: bottom }, { x, y: bottom - cornerY }],
    [{ x, y: y + cornerY }, { x: x + cornerX, y }],
  ]

  const segments: CurveSegment[] = []
  let current: Point = corners[3][1]
  for (const [edgeEnd, arcEnd] of corners) {
    segments.push(lineSegment(current, edgeEnd))
    segments.push(...arcToCubics(edgeEnd, cornerX, cornerY, 0, false, true, arcEnd))
    current = arcEnd
  }
  return segments
}

/**
 * Normalize a shape into subpaths of cubic segments.
 * Returns null for degenerate shapes (non-positive size or radius).
 * Throws PathDataError for malformed path data.
 */
export function shapeToSegments(shape: ShapeDescriptor): CurveSegment[][] | null {
  switch (shape.kind) {
    case 'rect':
      if (shape.width <= 0 || shape.height <= 0) return null
      return [rectToSegments(shape.x, shape.y, shape.width, shape.height, shape.rx, shape.ry)]
    case 'line':
      return [[lineSegment({ x: shape.x1, y: shape.y1 }, { x: shape.x2, y: shape.y2 })]]
    case 'polyline':
    case 'polygon':
      if (shape.points.length < 2) return null
      return [polylineToSegments(shape.points, shape.kind === 'polygon')]
    case 'ellipse':
      if (shape.rx <= 0 || shape.ry <= 0) return null
      return [ellipseToSegments(shape.cx, shape.cy, shape.rx, shape.ry)]
    case 'circle':
      if (shape.r <= 0) return null
      return [ellipseToSegments(shape.cx, shape.cy, shape.r, shape.r)]
    case 'path':
      return parsePathData(shape.d)
  }
}
