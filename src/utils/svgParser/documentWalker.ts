// Document walking - collects drawable elements with their composed transforms

import type { ShapeElement } from '../../types/svg'
import type { Matrix } from '../geometry/types'
import {
  IDENTITY_MATRIX,
  multiplyMatrices,
  parseTransform,
  translationMatrix,
} from '../geometry/transform'
import { getDocumentSize, getViewportTransform, parseLengthAttribute } from '../svgDimensions'
import {
  getAttribute,
  getChildElements,
  getElementId,
  getTagName,
  isElementNode,
  isNonRenderedElement,
  isShapeElement,
  parseShapeDescriptor,
} from './elementParsing'
import type { WalkOptions } from './types'

/**
 * Short label for messages, e.g. `<rect id="r1">`
 */
export function describeElement(element: Element): string {
  const id = getElementId(element)
  return `<${getTagName(element)}${id ? ` id="${id}"` : ''}>`
}

/**
 * Index every element carrying an id; the first occurrence of an id wins
 */
export function indexElementsById(root: Element): Map<string, Element> {
  const index = new Map<string, Element>()
  const stack = [root]
  while (stack.length > 0) {
    const element = stack.pop()
    if (!element) break
    const id = getElementId(element)
    if (id && !index.has(id)) index.set(id, element)
    stack.push(...getChildElements(element).reverse())
  }
  return index
}

/**
 * Elements from the root down to (excluding) `element`
 */
function getAncestors(element: Element): Element[] {
  const ancestors: Element[] = []
  let parent = element.parentNode
  while (parent && isElementNode(parent)) {
    ancestors.unshift(parent)
    parent = parent.parentNode
  }
  return ancestors
}

/**
 * Walk the document in order and return every drawable element with the
 * transform that maps its coordinates into document space (viewport scale,
 * ancestor transforms and its own transform).
 *
 * With `options.ids` only the listed elements are walked, in the listed
 * order, each with the transforms of its ancestors applied.
 */
export function collectShapeElements(doc: Document, options: WalkOptions = {}): ShapeElement[] {
  const root: Element = doc.documentElement
  const viewport = getViewportTransform(getDocumentSize(root))
  const warn = options.onWarning
  const result: ShapeElement[] = []
  // Elements reached directly; content instantiated by <use> is not recorded
  const visited = new Set<Element>()
  let idIndex: Map<string, Element> | null = null

  const findById = (id: string): Element | undefined => {
    idIndex ??= indexElementsById(root)
    return idIndex.get(id)
  }

  function ownTransform(element: Element): Matrix {
    const attr = getAttribute(element, 'transform')
    const matrix = parseTransform(attr)
    if (!matrix) {
      warn?.(`[svg-walker] Ignoring malformed transform "${attr}" on ${describeElement(element)}`)
      return IDENTITY_MATRIX
    }
    return matrix
  }

  // `inheritedId` is set for content instantiated by <use>: those shapes are
  // named after the <use> element rather than the referenced one.
  function visit(element: Element, parentTransform: Matrix, references: Set<Element>, inheritedId?: string | null) {
    if (isNonRenderedElement(element)) return
    if (inheritedId === undefined) {
      if (visited.has(element)) return
      visited.add(element)
    }

    const transform = multiplyMatrices(parentTransform, ownTransform(element))

    if (isShapeElement(element)) {
      const shape = parseShapeDescriptor(element)
      if (!shape) {
        warn?.(`[svg-walker] Skipping ${describeElement(element)}: unparsable geometry attributes`)
        return
      }
      result.push({
        id: inheritedId !== undefined ? inheritedId : getElementId(element),
        shape,
        transform,
      })
      return
    }

    if (getTagName(element) === 'use') {
      visitUse(element, transform, references)
      return
    }

    for (const child of getChildElements(element)) {
      visit(child, transform, references, inheritedId)
    }
  }

  function visitUse(use: Element, transform: Matrix, references: Set<Element>) {
    const href = getAttribute(use, 'href') ?? getAttribute(use, 'xlink:href')
    const target = href?.startsWith('#') ? findById(href.slice(1)) : undefined
    if (!target) {
      warn?.(`[svg-walker] Skipping ${describeElement(use)}: unresolved reference "${href ?? ''}"`)
      return
    }
    if (target === use || references.has(target)) {
      warn?.(`[svg-walker] Skipping ${describeElement(use)}: circular reference to "${href}"`)
      return
    }

    const x = parseLengthAttribute(getAttribute(use, 'x'), 0)
    const y = parseLengthAttribute(getAttribute(use, 'y'), 0)
    if (x === null || y === null) {
      warn?.(`[svg-walker] Skipping ${describeElement(use)}: unparsable x/y`)
      return
    }

    const placed = multiplyMatrices(transform, translationMatrix(x, y))
    const nested = new Set(references).add(target)
    const id = getElementId(use)

    if (getTagName(target) === 'symbol') {
      for (const child of getChildElements(target)) {
        visit(child, placed, nested, id)
      }
    } else {
      visit(target, placed, nested, id)
    }
  }

  if (!options.ids) {
    visit(root, viewport, new Set())
    return result
  }

  for (const id of options.ids) {
    const element = findById(id)
    if (!element) {
      warn?.(`[svg-walker] No element with id "${id}"`)
      continue
    }
    const inherited = getAncestors(element).reduce(
      (matrix, ancestor) => multiplyMatrices(matrix, ownTransform(ancestor)),
      viewport
    )
    visit(element, inherited, new Set())
  }

  return result
}
