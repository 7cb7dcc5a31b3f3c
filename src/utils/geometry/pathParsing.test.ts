import { describe, expect, it } from 'vitest'
import { PathDataError, arcToCubics, parsePathData, quadraticToCubic } from './pathParsing'

const ends = (d: string) => parsePathData(d).map(subpath => subpath.map(segment => segment.end))

describe('parsePathData', () => {
  it('closes a subpath with an explicit edge back to the start', () => {
    expect(ends('M0 0 L10 0 L10 10 Z')).toEqual([[
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 0 },
    ]])
  })

  it('adds no closing edge when already at the start', () => {
    expect(ends('M0 0 L10 0 L0 0 Z')[0]).toHaveLength(2)
  })

  it('resolves relative commands against the current point', () => {
    expect(ends('m10 10 l5 0 v5 h-5 z')).toEqual([[
      { x: 15, y: 10 },
      { x: 15, y: 15 },
      { x: 10, y: 15 },
      { x: 10, y: 10 },
    ]])
  })

  it('treats extra moveto pairs as linetos', () => {
    expect(ends('M0 0 10 0 10 10')).toEqual([[{ x: 10, y: 0 }, { x: 10, y: 10 }]])
  })

  it('splits subpaths and drops a lone moveto', () => {
    expect(parsePathData('M0 0 L1 0 L1 1 Z M5 5 L6 5 L6 6 Z')).toHaveLength(2)
    const subpaths = parsePathData('M0 0 M5 5 L6 5')
    expect(subpaths).toHaveLength(1)
    expect(subpaths[0][0].start).toEqual({ x: 5, y: 5 })
  })

  it('returns nothing for empty data', () => {
    expect(parsePathData('')).toEqual([])
  })

  it('reflects the previous control point for S', () => {
    const [segments] = parsePathData('M0 0 C0 10 10 10 10 0 S20 -10 20 0')
    expect(segments[1].control1).toEqual({ x: 10, y: -10 })
  })

  it('reflects the previous quadratic control point for T', () => {
    const [segments] = parsePathData('M0 0 Q5 10 10 0 T20 0')
    expect(segments).toHaveLength(2)
    const { control1, control2, end } = segments[1]
    expect(control1.x).toBeCloseTo(13.333)
    expect(control1.y).toBeCloseTo(-6.667)
    expect(control2.x).toBeCloseTo(16.667)
    expect(control2.y).toBeCloseTo(-6.667)
    expect(end).toEqual({ x: 20, y: 0 })
  })

  it('reads packed arc flags', () => {
    const [segments] = parsePathData('M0 0 a5 5 0 0110 0')
    expect(segments).toHaveLength(2)
    expect(segments[1].end).toEqual({ x: 10, y: 0 })
  })

  it('reports the position of malformed data', () => {
    expect(() => parsePathData('L10 10')).toThrow('Path data must start with a moveto at position 0')
    expect(() => parsePathData('M0 0 L10')).toThrow('Expected number at position 8')
    expect(() => parsePathData('M0 0 L1 0 L1 1 Z 5 5')).toThrow(PathDataError)
  })
})

describe('quadraticToCubic', () => {
  it('places the cubic controls two thirds toward the quadratic control', () => {
    const cubic = quadraticToCubic({ x: 0, y: 0 }, { x: 3, y: 6 }, { x: 6, y: 0 })
    expect(cubic.control1.x).toBeCloseTo(2)
    expect(cubic.control1.y).toBeCloseTo(4)
    expect(cubic.control2.x).toBeCloseTo(4)
    expect(cubic.control2.y).toBeCloseTo(4)
  })
})

describe('arcToCubics', () => {
  it('splits a half circle into two quarter arcs', () => {
    const segments = arcToCubics({ x: 0, y: 0 }, 5, 5, 0, false, true, { x: 10, y: 0 })
    expect(segments).toHaveLength(2)
    expect(segments[0].end.x).toBeCloseTo(5)
    expect(segments[0].end.y).toBeCloseTo(-5)
    expect(segments[1].end).toEqual({ x: 10, y: 0 })
  })

  it('scales radii that cannot reach the endpoint', () => {
    const segments = arcToCubics({ x: 0, y: 0 }, 1, 1, 0, false, true, { x: 10, y: 0 })
    expect(segments[0].end.x).toBeCloseTo(5)
    expect(segments[0].end.y).toBeCloseTo(-5)
  })

  it('degrades to a line for a zero radius and to nothing for equal endpoints', () => {
    expect(arcToCubics({ x: 0, y: 0 }, 0, 5, 0, false, true, { x: 10, y: 0 })).toHaveLength(1)
    expect(arcToCubics({ x: 1, y: 1 }, 5, 5, 0, false, true, { x: 1, y: 1 })).toEqual([])
  })
})
