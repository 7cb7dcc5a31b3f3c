// SVG Dimensions module exports

export type { Length, ViewBox, DocumentSize } from './types'

export {
  UNIT_TO_PX,
  parseLengthWithUnit,
  lengthToPixels,
  parseLengthAttribute,
  resolveDocumentLength,
} from './unitConversion'

export {
  parseViewBox,
  getDocumentSize,
  getViewportTransform,
} from './viewBoxUtils'
