// SVG path parsing utilities - path data to cubic Bézier subpaths

import type { CurveSegment, Point } from './types'
import { lineSegment } from './bezier'
import { pointsEqual } from './math'
import { NUMBER_SOURCE } from './numberParsing'

export class PathDataError extends Error {
  constructor(message: string, readonly position: number) {
    super(`${message} at position ${position}`)
    this.name = 'PathDataError'
  }
}

const COMMAND_LETTERS = 'MmLlHhVvCcSsQqTtAaZz'
const NUMBER = new RegExp(NUMBER_SOURCE, 'y')
const SEPARATOR = /[\s,]*/y

class PathDataScanner {
  private pos = 0

  constructor(private readonly d: string) {}

  get position(): number {
    return this.pos
  }

  skipSeparators(): void {
    SEPARATOR.lastIndex = this.pos
    SEPARATOR.exec(this.d)
    this.pos = SEPARATOR.lastIndex
  }

  done(): boolean {
    this.skipSeparators()
    return this.pos >= this.d.length
  }

  /** Consume a command letter if one comes next */
  readCommand(): string | null {
    this.skipSeparators()
    const ch = this.d[this.pos]
    if (ch !== undefined && COMMAND_LETTERS.includes(ch)) {
      this.pos++
      return ch
    }
    return null
  }

  readNumber(): number {
    this.skipSeparators()
    NUMBER.lastIndex = this.pos
    const match = NUMBER.exec(this.d)
    if (!match) throw new PathDataError('Expected number', this.pos)
    this.pos = NUMBER.lastIndex
    return parseFloat(match[0])
  }

  // Arc flags may be packed without separators ("a10 10 0 0110 10")
  readFlag(): boolean {
    this.skipSeparators()
    const ch = this.d[this.pos]
    if (ch !== '0' && ch !== '1') throw new PathDataError('Expected arc flag', this.pos)
    this.pos++
    return ch === '1'
  }

  readPoint(origin: Point | null): Point {
    const x = this.readNumber()
    const y = this.readNumber()
    return origin ? { x: origin.x + x, y: origin.y + y } : { x, y }
  }
}

function reflect(control: Point, about: Point): Point {
  return { x: 2 * about.x - control.x, y: 2 * about.y - control.y }
}

/**
 * Elevate a quadratic Bézier to the equivalent cubic
 */
export function quadraticToCubic(start: Point, control: Point, end: Point): CurveSegment {
  return {
    start,
    control1: { x: start.x + (2 / 3) * (control.x - start.x), y: start.y + (2 / 3) * (control.y - start.y) },
    control2: { x: end.x + (2 / 3) * (control.x - end.x), y: end.y + (2 / 3) * (control.y - end.y) },
    end,
  }
}

function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
  return Math.atan2(ux * vy - uy * vx, ux * vx + uy * vy)
}

/**
 * Convert an SVG elliptical arc (endpoint parameterization) into cubic
 * segments spanning at most 90 degrees each. Radii too small to reach the
 * endpoint are scaled up; a zero radius degrades to a straight line and an
 * arc whose endpoints coincide is omitted.
 */
export function arcToCubics(
  start: Point,
  radiusX: number,
  radiusY: number,
  rotationDegrees: number,
  largeArc: boolean,
  sweep: boolean,
  end: Point
): CurveSegment[] {
  if (pointsEqual(start, end)) return []

  let rx = Math.abs(radiusX)
  let ry = Math.abs(radiusY)
  if (rx === 0 || ry === 0) return [lineSegment(start, end)]

  const phi = (rotationDegrees * Math.PI) / 180
  const cosPhi = Math.cos(phi)
  const sinPhi = Math.sin(phi)

  // Step 1: endpoint to the ellipse's rotated frame
  const dx2 = (start.x - end.x) / 2
  const dy2 = (start.y - end.y) / 2
  const x1p = cosPhi * dx2 + sinPhi * dy2
  const y1p = -sinPhi * dx2 + cosPhi * dy2

  const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry)
  if (lambda > 1) {
    const scale = Math.sqrt(lambda)
    rx *= scale
    ry *= scale
  }

  // Step 2: center in the rotated frame
  const rx2 = rx * rx
  const ry2 = ry * ry
  const numerator = rx2 * ry2 - rx2 * y1p * y1p - ry2 * x1p * x1p
  const denominator = rx2 * y1p * y1p + ry2 * x1p * x1p
  const coef = (largeArc === sweep ? -1 : 1) * Math.sqrt(Math.max(0, numerator / denominator))
  const cxp = (coef * rx * y1p) / ry
  const cyp = (-coef * ry * x1p) / rx

  // Step 3: center in user space
  const cx = cosPhi * cxp - sinPhi * cyp + (start.x + end.x) / 2
  const cy = sinPhi * cxp + cosPhi * cyp + (start.y + end.y) / 2

  // Step 4: start angle and sweep
  const ux = (x1p - cxp) / rx
  const uy = (y1p - cyp) / ry
  const vx = (-x1p - cxp) / rx
  const vy = (-y1p - cyp) / ry
  const theta1 = vectorAngle(1, 0, ux, uy)
  let deltaTheta = vectorAngle(ux, uy, vx, vy)
  if (!sweep && deltaTheta > 0) deltaTheta -= 2 * Math.PI
  if (sweep && deltaTheta < 0) deltaTheta += 2 * Math.PI

  const pieces = Math.max(1, Math.ceil(Math.abs(deltaTheta) / (Math.PI / 2) - 1e-9))
  const delta = deltaTheta / pieces
  const k = (4 / 3) * Math.tan(delta / 4)

  const toUser = (x: number, y: number): Point => ({
    x: cx + rx * cosPhi * x - ry * sinPhi * y,
    y: cy + rx * sinPhi * x + ry * cosPhi * y,
  })

  const segments: CurveSegment[] = []
  let segmentStart = start
  for (let i = 0; i < pieces; i++) {
    const t1 = theta1 + i * delta
    const t2 = t1 + delta
    const cos1 = Math.cos(t1), sin1 = Math.sin(t1)
    const cos2 = Math.cos(t2), sin2 = Math.sin(t2)
    const segmentEnd = i === pieces - 1 ? end : toUser(cos2, sin2)
    segments.push({
      start: segmentStart,
      control1: toUser(cos1 - k * sin1, sin1 + k * cos1),
      control2: toUser(cos2 + k * sin2, sin2 - k * cos2),
      end: segmentEnd,
    })
    segmentStart = segmentEnd
  }
  return segments
}

/**
 * Parse SVG path data into subpaths of cubic segments.
 *
 * Lines become cubics with control points on their endpoints, quadratics are
 * elevated and arcs are approximated. `Z` adds a closing line when the current
 * point is not already back at the subpath start. Subpaths made of a lone
 * moveto are dropped. Throws PathDataError on malformed data.
 */
export function parsePathData(d: string): CurveSegment[][] {
  const scanner = new PathDataScanner(d)
  const subpaths: CurveSegment[][] = []

  let segments: CurveSegment[] = []
  let current: Point = { x: 0, y: 0 }
  let subpathStart: Point = current
  let command: string | null = null
  let started = false
  // Control point to reflect for S/s (cubic) and T/t (quadratic)
  let lastCubicControl: Point | null = null
  let lastQuadControl: Point | null = null

  const finishSubpath = () => {
    if (segments.length > 0) subpaths.push(segments)
    segments = []
  }

  const add = (segment: CurveSegment) => {
    segments.push(segment)
    current = segment.end
  }

  while (!scanner.done()) {
    const position = scanner.position
    const explicit = scanner.readCommand()
    if (explicit) {
      command = explicit
    } else if (command === null || command === 'Z' || command === 'z') {
      throw new PathDataError('Expected command', position)
    } else if (command === 'M') {
      command = 'L'
    } else if (command === 'm') {
      command = 'l'
    }

    if (!started && command !== 'M' && command !== 'm') {
      throw new PathDataError('Path data must start with a moveto', position)
    }
    started = true

    const relative = command === command.toLowerCase()
    const origin = relative ? current : null
    let cubicControl: Point | null = null
    let quadControl: Point | null = null

    switch (command.toUpperCase()) {
      case 'M': {
        finishSubpath()
        current = scanner.readPoint(origin)
        subpathStart = current
        break
      }
      case 'L': {
        add(lineSegment(current, scanner.readPoint(origin)))
        break
      }
      case 'H': {
        const x = scanner.readNumber()
        add(lineSegment(current, { x: relative ? current.x + x : x, y: current.y }))
        break
      }
      case 'V': {
        const y = scanner.readNumber()
        add(lineSegment(current, { x: current.x, y: relative ? current.y + y : y }))
        break
      }
      case 'C': {
        const control1 = scanner.readPoint(origin)
        const control2 = scanner.readPoint(origin)
        const end = scanner.readPoint(origin)
        add({ start: current, control1, control2, end })
        cubicControl = control2
        break
      }
      case 'S': {
        const control1: Point = lastCubicControl ? reflect(lastCubicControl, current) : current
        const control2 = scanner.readPoint(origin)
        const end = scanner.readPoint(origin)
        add({ start: current, control1, control2, end })
        cubicControl = control2
        break
      }
      case 'Q': {
        const control: Point = scanner.readPoint(origin)
        const end = scanner.readPoint(origin)
        add(quadraticToCubic(current, control, end))
        quadControl = control
        break
      }
      case 'T': {
        const control: Point = lastQuadControl ? reflect(lastQuadControl, current) : current
        const end = scanner.readPoint(origin)
        add(quadraticToCubic(current, control, end))
        quadControl = control
        break
      }
      case 'A': {
        const rx = scanner.readNumber()
        const ry = scanner.readNumber()
        const rotation = scanner.readNumber()
        const largeArc = scanner.readFlag()
        const sweep = scanner.readFlag()
        const end = scanner.readPoint(origin)
        const arcSegments = arcToCubics(current, rx, ry, rotation, largeArc, sweep, end)
        arcSegments.forEach(add)
        current = end
        break
      }
      case 'Z': {
        if (!pointsEqual(current, subpathStart)) {
          add(lineSegment(current, subpathStart))
        }
        finishSubpath()
        current = subpathStart
        break
      }
    }

    lastCubicControl = cubicControl
    lastQuadControl = quadControl
  }

  finishSubpath()
  return subpaths
}
