// SVG document loading

import { DOMParser } from '@xmldom/xmldom'
import { getTagName } from './elementParsing'
import type { WarningCallback } from './types'

export class SvgParseError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SvgParseError'
  }
}

/**
 * Parse SVG markup into a DOM document. Fatal XML errors and a root element
 * other than <svg> throw SvgParseError; recoverable parser warnings are
 * passed to `onWarning`.
 */
export function parseSvgDocument(text: string, onWarning?: WarningCallback): Document {
  const errors: string[] = []
  const parser = new DOMParser({
    errorHandler: {
      warning: (msg: string) => onWarning?.(`[svg-parser] ${msg.trim()}`),
      error: (msg: string) => errors.push(msg.trim()),
      fatalError: (msg: string) => errors.push(msg.trim()),
    },
  })

  let doc: Document
  try {
    doc = parser.parseFromString(text, 'image/svg+xml')
  } catch (err) {
    throw new SvgParseError(`Invalid SVG markup: ${err instanceof Error ? err.message : String(err)}`)
  }
  if (errors.length > 0) {
    throw new SvgParseError(`Invalid SVG markup: ${errors[0]}`)
  }

  const root = doc.documentElement
  if (!root || getTagName(root) !== 'svg') {
    throw new SvgParseError('Document root is not an <svg> element')
  }
  return doc
}
