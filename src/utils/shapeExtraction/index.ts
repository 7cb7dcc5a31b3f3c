// Shape extraction module exports

export type { ExtractOptions } from './shapeSubpaths'
export { extractSubpaths, MIN_POLYGON_VERTICES } from './shapeSubpaths'

export {
  polylineToSegments,
  ellipseToSegments,
  rectToSegments,
  shapeToSegments,
} from './shapeCurves'
