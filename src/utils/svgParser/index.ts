// SVG Parser module exports

export type { WarningCallback, WalkOptions, ShapeTag } from './types'
export { SHAPE_TAGS, NON_RENDERED_TAGS } from './types'

export {
  getTagName,
  getChildElements,
  getElementId,
  parsePoints,
  parseShapeDescriptor,
} from './elementParsing'

export { parseSvgDocument, SvgParseError } from './documentParser'

export {
  collectShapeElements,
  describeElement,
  indexElementsById,
} from './documentWalker'
