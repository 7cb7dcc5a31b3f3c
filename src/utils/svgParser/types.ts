// SVG Parser types

/**
 * Receives a description of each element or shape that was skipped
 */
export type WarningCallback = (message: string) => void

/**
 * Drawable elements converted into shapes
 */
export const SHAPE_TAGS = [
  'path', 'rect', 'circle', 'ellipse', 'line', 'polyline', 'polygon'
] as const

export type ShapeTag = typeof SHAPE_TAGS[number]

/**
 * Elements whose content is never rendered directly (or only through <use>)
 */
export const NON_RENDERED_TAGS = [
  'defs', 'symbol', 'clipPath', 'mask', 'pattern', 'marker',
  'metadata', 'title', 'desc', 'style', 'script'
] as const

export interface WalkOptions {
  /** Only convert these elements (and their descendants), in this order */
  ids?: readonly string[]
  onWarning?: WarningCallback
}
