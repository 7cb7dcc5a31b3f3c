// Geometry module - re-exports all geometry utilities

// Types
export type {
  Point,
  CurveSegment,
  BoundingBox,
  Subpath,
  PolygonWithHoles,
  ContainmentGraph,
  Matrix,
} from './types'

// Math utilities
export {
  distance,
  distanceToSegment,
  pointsEqual,
  isPointInPolygon,
} from './math'

// Bounding boxes
export {
  emptyBoundingBox,
  isEmptyBoundingBox,
  computeBoundingBox,
  unionBoundingBox,
  boundingBoxCenter,
  isPointInBoundingBox,
  isBoundingBoxInBoundingBox,
} from './bounds'

// Curve flattening
export {
  MIN_FLATTEN_TOLERANCE,
  lineSegment,
  maxDeviation,
  splitCubic,
  flattenCurve,
} from './bezier'

// Path parsing
export {
  PathDataError,
  parsePathData,
  arcToCubics,
  quadraticToCubic,
} from './pathParsing'

// Transforms
export {
  IDENTITY_MATRIX,
  translationMatrix,
  scaleMatrix,
  rotationMatrix,
  multiplyMatrices,
  applyMatrix,
  transformSegment,
  parseTransform,
} from './transform'

// Polygon analysis
export type { PointInPolygonTest, ClassifyOptions } from './polygonAnalysis'
export {
  isPolygonContainedIn,
  classifyContainment,
  groupPolygonsWithHoles,
} from './polygonAnalysis'
