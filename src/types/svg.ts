import type { Matrix, Point } from '../utils/geometry/types'

/**
 * Geometry of one drawable SVG element, with lengths already in pixels
 */
export type ShapeDescriptor =
  | { kind: 'rect'; x: number; y: number; width: number; height: number; rx: number; ry: number }
  | { kind: 'line'; x1: number; y1: number; x2: number; y2: number }
  | { kind: 'polyline'; points: Point[] }
  | { kind: 'polygon'; points: Point[] }
  | { kind: 'ellipse'; cx: number; cy: number; rx: number; ry: number }
  | { kind: 'circle'; cx: number; cy: number; r: number }
  | { kind: 'path'; d: string }

export type ShapeKind = ShapeDescriptor['kind']

/**
 * A drawable element found while walking the document
 */
export interface ShapeElement {
  /** The element's id attribute, if it has a non-empty one */
  id: string | null
  shape: ShapeDescriptor
  /** Viewport scale and every ancestor transform, composed with the element's own */
  transform: Matrix
}
