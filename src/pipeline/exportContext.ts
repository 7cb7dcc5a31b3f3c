// Per-conversion state shared by the extraction and emission phases

import type { BoundingBox, Point, Subpath } from '../utils/geometry/types'
import {
  boundingBoxCenter,
  emptyBoundingBox,
  isEmptyBoundingBox,
  unionBoundingBox,
} from '../utils/geometry/bounds'
import type { DocumentSize } from '../utils/svgDimensions/types'
import { createModuleName } from '../utils/scadExport/moduleNames'

export interface ShapeGroup {
  id: string | null
  subpaths: Subpath[]
}

export interface ExportContext {
  /** Union of every extracted subpath's bounds */
  bounds: BoundingBox
  /** Groups with at least one subpath, in document order */
  groups: ShapeGroup[]
  /** Next number for elements without a usable id */
  fallbackCounter: number
  usedNames: Set<string>
}

export function createExportContext(): ExportContext {
  return {
    bounds: emptyBoundingBox(),
    groups: [],
    fallbackCounter: 0,
    usedNames: new Set(),
  }
}

export function addShapeGroup(context: ExportContext, group: ShapeGroup): void {
  context.groups.push(group)
  for (const subpath of group.subpaths) {
    context.bounds = unionBoundingBox(context.bounds, subpath.bbox)
  }
}

/**
 * Center of all extracted geometry, or of the document when nothing was extracted
 */
export function finalizeCenter(context: ExportContext, size: DocumentSize): Point {
  if (isEmptyBoundingBox(context.bounds)) {
    return { x: size.width / 2, y: size.height / 2 }
  }
  return boundingBoxCenter(context.bounds)
}

export function assignModuleName(context: ExportContext, id: string | null): string {
  return createModuleName(id, context.usedNames, () => context.fallbackCounter++)
}
