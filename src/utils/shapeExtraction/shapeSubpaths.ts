// Shape extraction - transformed, flattened subpaths for one element

import type { ShapeElement } from '../../types/svg'
import type { CurveSegment, Subpath } from '../geometry/types'
import { flattenCurve } from '../geometry/bezier'
import { computeBoundingBox } from '../geometry/bounds'
import { pointsEqual } from '../geometry/math'
import { PathDataError } from '../geometry/pathParsing'
import { transformSegment } from '../geometry/transform'
import { simplifyPolyline } from '../pathSimplify'
import type { WarningCallback } from '../svgParser/types'
import { shapeToSegments } from './shapeCurves'

export interface ExtractOptions {
  /** Flattening tolerance in document units */
  smoothness: number
  /** Simplification tolerance; 0 keeps every flattened vertex */
  simplify?: number
  onWarning?: WarningCallback
}

/** Fewer vertices than this cannot enclose an area */
export const MIN_POLYGON_VERTICES = 3

/**
 * Convert one element into closed polygons in document coordinates.
 * Degenerate or malformed shapes, and subpaths left with fewer than three
 * vertices, produce nothing.
 */
export function extractSubpaths(element: ShapeElement, options: ExtractOptions): Subpath[] {
  const skip = (reason: string): Subpath[] => {
    const label = element.id ? `${element.shape.kind} "${element.id}"` : element.shape.kind
    options.onWarning?.(`[shape-extract] Skipping ${label}: ${reason}`)
    return []
  }

  let curves: CurveSegment[][] | null
  try {
    curves = shapeToSegments(element.shape)
  } catch (err) {
    if (!(err instanceof PathDataError)) throw err
    return skip(err.message)
  }
  if (!curves) return skip('degenerate size or radius')

  const subpaths: Subpath[] = []
  for (const segments of curves) {
    const transformed = segments.map(segment => transformSegment(element.transform, segment))
    let vertices = flattenCurve(transformed, options.smoothness)

    // The closing vertex duplicates the first one
    if (vertices.length > 1 && pointsEqual(vertices[0], vertices[vertices.length - 1])) {
      vertices = vertices.slice(0, -1)
    }

    vertices = simplifyPolyline(vertices, options.simplify ?? 0)
    if (vertices.length < MIN_POLYGON_VERTICES) continue

    subpaths.push({ vertices, bbox: computeBoundingBox(vertices) })
  }

  if (subpaths.length === 0) return skip(`no subpath with at least ${MIN_POLYGON_VERTICES} vertices`)
  return subpaths
}
