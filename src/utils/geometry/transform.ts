// Affine transform utilities - parsing SVG transform attributes and composing matrices

import type { CurveSegment, Matrix, Point } from './types'
import { parseNumberList } from './numberParsing'

export const IDENTITY_MATRIX: Matrix = [1, 0, 0, 1, 0, 0]

export function translationMatrix(tx: number, ty: number): Matrix {
  return [1, 0, 0, 1, tx, ty]
}

export function scaleMatrix(sx: number, sy: number = sx): Matrix {
  return [sx, 0, 0, sy, 0, 0]
}

export function rotationMatrix(degrees: number): Matrix {
  const rad = (degrees * Math.PI) / 180
  const cos = Math.cos(rad)
  const sin = Math.sin(rad)
  return [cos, sin, -sin, cos, 0, 0]
}

/**
 * m1 x m2: the result applies m2 first, then m1
 */
export function multiplyMatrices(m1: Matrix, m2: Matrix): Matrix {
  const [a1, b1, c1, d1, e1, f1] = m1
  const [a2, b2, c2, d2, e2, f2] = m2
  return [
    a1 * a2 + c1 * b2,
    b1 * a2 + d1 * b2,
    a1 * c2 + c1 * d2,
    b1 * c2 + d1 * d2,
    a1 * e2 + c1 * f2 + e1,
    b1 * e2 + d1 * f2 + f1,
  ]
}

export function applyMatrix(m: Matrix, p: Point): Point {
  const [a, b, c, d, e, f] = m
  return {
    x: a * p.x + c * p.y + e,
    y: b * p.x + d * p.y + f,
  }
}

export function transformSegment(m: Matrix, segment: CurveSegment): CurveSegment {
  return {
    start: applyMatrix(m, segment.start),
    control1: applyMatrix(m, segment.control1),
    control2: applyMatrix(m, segment.control2),
    end: applyMatrix(m, segment.end),
  }
}

function transformFunctionToMatrix(name: string, args: number[]): Matrix | null {
  switch (name) {
    case 'matrix':
      if (args.length !== 6) return null
      return [args[0], args[1], args[2], args[3], args[4], args[5]]
    case 'translate':
      if (args.length === 1) return translationMatrix(args[0], 0)
      if (args.length === 2) return translationMatrix(args[0], args[1])
      return null
    case 'scale':
      if (args.length === 1) return scaleMatrix(args[0])
      if (args.length === 2) return scaleMatrix(args[0], args[1])
      return null
    case 'rotate':
      if (args.length === 1) return rotationMatrix(args[0])
      if (args.length === 3) {
        const [angle, cx, cy] = args
        return multiplyMatrices(
          translationMatrix(cx, cy),
          multiplyMatrices(rotationMatrix(angle), translationMatrix(-cx, -cy))
        )
      }
      return null
    case 'skewX':
      if (args.length !== 1) return null
      return [1, 0, Math.tan((args[0] * Math.PI) / 180), 1, 0, 0]
    case 'skewY':
      if (args.length !== 1) return null
      return [1, Math.tan((args[0] * Math.PI) / 180), 0, 1, 0, 0]
    default:
      return null
  }
}

const TRANSFORM_FUNCTION = /\s*,?\s*([a-zA-Z]+)\s*\(([^)]*)\)/y

/**
 * Parse an SVG transform attribute ("translate(10 20) rotate(45)") into one
 * matrix. Functions compose left to right as in SVG: the rightmost one is
 * applied to the coordinates first. An empty attribute is the identity;
 * anything malformed returns null.
 */
export function parseTransform(attr: string | null): Matrix | null {
  if (attr === null) return IDENTITY_MATRIX
  const trimmed = attr.trim()
  if (!trimmed) return IDENTITY_MATRIX

  let result = IDENTITY_MATRIX
  TRANSFORM_FUNCTION.lastIndex = 0
  while (TRANSFORM_FUNCTION.lastIndex < trimmed.length) {
    const match = TRANSFORM_FUNCTION.exec(trimmed)
    if (!match) return null

    const args = parseNumberList(match[2])
    if (!args) return null
    const matrix = transformFunctionToMatrix(match[1], args)
    if (!matrix) return null

    result = multiplyMatrices(result, matrix)
  }

  return result
}
