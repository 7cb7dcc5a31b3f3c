// Element parsing utilities

import type { ShapeDescriptor } from '../../types/svg'
import type { Point } from '../geometry/types'
import { parseNumberList } from '../geometry/numberParsing'
import { parseLengthAttribute } from '../svgDimensions'
import { SHAPE_TAGS, NON_RENDERED_TAGS } from './types'

const ELEMENT_NODE = 1

export function isElementNode(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE
}

/**
 * Tag name without namespace prefix ("svg:path" -> "path")
 */
export function getTagName(element: Element): string {
  return element.localName || element.tagName.replace(/^.*:/, '')
}

/**
 * Child elements in document order (text and comment nodes are skipped)
 */
export function getChildElements(element: Element): Element[] {
  const children: Element[] = []
  const nodes = element.childNodes
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes.item(i)
    if (node && isElementNode(node)) children.push(node)
  }
  return children
}

/**
 * Attribute value, or null when absent or empty
 */
export function getAttribute(element: Element, name: string): string | null {
  const value = element.getAttribute(name)
  return value ? value : null
}

export function getElementId(element: Element): string | null {
  const id = getAttribute(element, 'id')?.trim()
  return id ? id : null
}

export function isShapeElement(element: Element): boolean {
  return (SHAPE_TAGS as readonly string[]).includes(getTagName(element))
}

export function isNonRenderedElement(element: Element): boolean {
  return (NON_RENDERED_TAGS as readonly string[]).includes(getTagName(element))
}

/**
 * Parse a points attribute ("0,0 10,0 10,10"). An odd trailing coordinate
 * is ignored; anything unparsable yields null.
 */
export function parsePoints(attr: string | null): Point[] | null {
  if (attr === null) return []
  const values = parseNumberList(attr)
  if (!values) return null

  const points: Point[] = []
  for (let i = 0; i + 1 < values.length; i += 2) {
    points.push({ x: values[i], y: values[i + 1] })
  }
  return points
}

/**
 * Read several length attributes at once. Missing ones default to 0; returns
 * null if any of them cannot be resolved.
 */
function readLengths<K extends string>(element: Element, names: readonly K[]): Record<K, number> | null {
  const result: Partial<Record<K, number>> = {}
  for (const name of names) {
    const value = parseLengthAttribute(getAttribute(element, name), 0)
    if (value === null) return null
    result[name] = value
  }
  return isComplete(result, names) ? result : null
}

function isComplete<K extends string>(
  record: Partial<Record<K, number>>,
  names: readonly K[]
): record is Record<K, number> {
  return names.every(name => record[name] !== undefined)
}

// SVG: a missing or negative corner radius takes the other one's value
function readCornerRadius(element: Element, name: 'rx' | 'ry'): number | null {
  const attr = getAttribute(element, name)
  if (attr === null) return null
  const value = parseLengthAttribute(attr, 0)
  return value !== null && value >= 0 ? value : null
}

/**
 * Read the geometry attributes of a drawable element.
 * Returns null when a required attribute cannot be parsed.
 */
export function parseShapeDescriptor(element: Element): ShapeDescriptor | null {
  const tag = getTagName(element)

  switch (tag) {
    case 'rect': {
      const lengths = readLengths(element, ['x', 'y', 'width', 'height'] as const)
      if (!lengths) return null
      const rx = readCornerRadius(element, 'rx')
      const ry = readCornerRadius(element, 'ry')
      return {
        kind: 'rect',
        ...lengths,
        rx: rx ?? ry ?? 0,
        ry: ry ?? rx ?? 0,
      }
    }
    case 'line': {
      const lengths = readLengths(element, ['x1', 'y1', 'x2', 'y2'] as const)
      return lengths ? { kind: 'line', ...lengths } : null
    }
    case 'polyline':
    case 'polygon': {
      const points = parsePoints(getAttribute(element, 'points'))
      return points ? { kind: tag, points } : null
    }
    case 'ellipse': {
      const lengths = readLengths(element, ['cx', 'cy', 'rx', 'ry'] as const)
      return lengths ? { kind: 'ellipse', ...lengths } : null
    }
    case 'circle': {
      const lengths = readLengths(element, ['cx', 'cy', 'r'] as const)
      return lengths ? { kind: 'circle', ...lengths } : null
    }
    case 'path': {
      const d = getAttribute(element, 'd')
      return d ? { kind: 'path', d } : null
    }
    default:
      return null
  }
}
