// Unit conversion utilities

import { DPI, DEFAULT_DOCUMENT_SIZE } from '../../constants'
import type { Length } from './types'

// Unit conversion factors to pixels (at 96 DPI)
export const UNIT_TO_PX: Record<string, number> = {
  'px': 1,
  'pt': DPI / 72,       // 1pt = 1.333px
  'pc': DPI / 6,        // 1pc = 16px
  'in': DPI,            // 1in = 96px
  'cm': DPI / 2.54,     // 1cm = 37.8px
  'mm': DPI / 25.4,     // 1mm = 3.78px
  '': 1,                // No unit = pixels
}

const LENGTH = /^([+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)\s*([a-z%]*)$/i

/**
 * Split a length such as "10mm" or "2.5e1PX" into its number and
 * lower-cased unit. Returns null if the text is not a single length.
 */
export function parseLengthWithUnit(text: string | null): Length | null {
  const match = text?.trim().match(LENGTH)
  if (!match) return null
  return { value: parseFloat(match[1]), unit: match[2].toLowerCase() }
}

/**
 * Convert a length value with unit to pixels.
 * Returns null for units that have no absolute size (%, em, ...).
 */
export function lengthToPixels(value: number, unit: string): number | null {
  const factor = UNIT_TO_PX[unit.toLowerCase()]
  if (factor === undefined) return null
  return value * factor
}

/**
 * Resolve a length attribute (coordinate, radius, size) to pixels.
 * A missing attribute resolves to `fallback`; an unparsable value or a
 * relative unit resolves to null.
 */
export function parseLengthAttribute(attr: string | null, fallback: number): number | null {
  if (attr === null || attr.trim() === '') return fallback
  const parsed = parseLengthWithUnit(attr)
  if (!parsed) return null
  return lengthToPixels(parsed.value, parsed.unit)
}

/**
 * Resolve the root width/height attribute. Anything absent, unparsable,
 * relative or non-positive falls back to the default document size.
 */
export function resolveDocumentLength(attr: string | null, fallback: number = DEFAULT_DOCUMENT_SIZE): number {
  const px = parseLengthAttribute(attr, fallback)
  if (px === null || !Number.isFinite(px) || px <= 0) return fallback
  return px
}
