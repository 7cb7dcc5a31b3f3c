// ViewBox parsing and viewport scaling

import type { DocumentSize, ViewBox } from './types'
import type { Matrix } from '../geometry/types'
import { parseNumberList } from '../geometry/numberParsing'
import { IDENTITY_MATRIX, scaleMatrix } from '../geometry/transform'
import { resolveDocumentLength } from './unitConversion'

/**
 * Parse a viewBox attribute ("minX minY width height", comma or space
 * separated). Anything other than four numbers is ignored.
 */
export function parseViewBox(attr: string | null): ViewBox | null {
  const values = attr ? parseNumberList(attr) : null
  if (!values || values.length !== 4) return null
  const [minX, minY, width, height] = values
  return { minX, minY, width, height }
}

/**
 * Read the document's intrinsic size from the root element
 */
export function getDocumentSize(root: Element): DocumentSize {
  return {
    width: resolveDocumentLength(root.getAttribute('width')),
    height: resolveDocumentLength(root.getAttribute('height')),
    viewBox: parseViewBox(root.getAttribute('viewBox')),
  }
}

/**
 * Scale from viewBox user units to document pixels.
 * The viewBox origin is not applied: output geometry is re-centered anyway.
 */
export function getViewportTransform(size: DocumentSize): Matrix {
  const { viewBox } = size
  if (!viewBox || viewBox.width === 0 || viewBox.height === 0) return IDENTITY_MATRIX
  return scaleMatrix(size.width / viewBox.width, size.height / viewBox.height)
}
