// Geometry type definitions

export interface Point {
  x: number
  y: number
}

/**
 * Cubic Bézier segment. Straight edges are stored with both control points
 * collapsed onto the endpoints.
 */
export interface CurveSegment {
  start: Point
  control1: Point
  control2: Point
  end: Point
}

/**
 * Axis-aligned bounding box. Never mutated once computed.
 */
export interface BoundingBox {
  readonly xmin: number
  readonly xmax: number
  readonly ymin: number
  readonly ymax: number
}

/**
 * One closed polygon of a shape (closing edge is implicit) with its bounds
 */
export interface Subpath {
  vertices: Point[]
  bbox: BoundingBox
}

export interface PolygonWithHoles {
  outer: Subpath
  holes: Subpath[]
}

/**
 * Pairwise containment between the subpaths of one shape.
 * `contains[i]` holds the indices of subpaths inside subpath i,
 * `containedBy[i]` the indices of subpaths that enclose subpath i.
 */
export interface ContainmentGraph {
  contains: Set<number>[]
  containedBy: Set<number>[]
}

/**
 * 2D affine matrix in SVG order: x' = a*x + c*y + e, y' = b*x + d*y + f
 */
export type Matrix = readonly [a: number, b: number, c: number, d: number, e: number, f: number]
