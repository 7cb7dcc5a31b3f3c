// Polygon analysis utilities - hole detection, containment, nesting

import type { BoundingBox, ContainmentGraph, Point, PolygonWithHoles, Subpath } from './types'
import { isBoundingBoxInBoundingBox } from './bounds'
import { isPointInPolygon } from './math'

export type PointInPolygonTest = (point: Point, polygon: Point[], bbox?: BoundingBox) => boolean

export interface ClassifyOptions {
  /** Per-vertex test; replaceable so callers can observe how often it runs */
  pointInPolygon?: PointInPolygonTest
}

/**
 * Check if `inner` lies inside `outer`. The bounding boxes reject most pairs;
 * otherwise every vertex of `inner` must test inside `outer`, so polygons that
 * only partially overlap are not treated as nested.
 */
export function isPolygonContainedIn(
  inner: Subpath,
  outer: Subpath,
  pointInPolygon: PointInPolygonTest = isPointInPolygon
): boolean {
  if (!isBoundingBoxInBoundingBox(inner.bbox, outer.bbox)) return false
  return inner.vertices.every(p => pointInPolygon(p, outer.vertices, outer.bbox))
}

/**
 * Build the pairwise containment graph for the subpaths of one shape.
 * For each pair only one direction is recorded; j inside i is tried first.
 */
export function classifyContainment(subpaths: Subpath[], options: ClassifyOptions = {}): ContainmentGraph {
  const test = options.pointInPolygon ?? isPointInPolygon
  const contains = subpaths.map(() => new Set<number>())
  const containedBy = subpaths.map(() => new Set<number>())

  for (let i = 0; i < subpaths.length; i++) {
    for (let j = i + 1; j < subpaths.length; j++) {
      if (isPolygonContainedIn(subpaths[j], subpaths[i], test)) {
        contains[i].add(j)
        containedBy[j].add(i)
      } else if (isPolygonContainedIn(subpaths[i], subpaths[j], test)) {
        contains[j].add(i)
        containedBy[i].add(j)
      }
    }
  }

  return { contains, containedBy }
}

/**
 * Turn a containment graph into polygons with holes.
 * Only one level of nesting is resolved: anything enclosed by another subpath
 * is a hole of every subpath that encloses it and is never emitted on its own,
 * even if it encloses an island itself.
 */
export function groupPolygonsWithHoles(subpaths: Subpath[], graph: ContainmentGraph): PolygonWithHoles[] {
  const results: PolygonWithHoles[] = []

  subpaths.forEach((subpath, index) => {
    if (graph.containedBy[index].size > 0) return
    const holes = [...graph.contains[index]].map(holeIndex => subpaths[holeIndex])
    results.push({ outer: subpath, holes })
  })

  return results
}
