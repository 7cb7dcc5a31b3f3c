import { describe, expect, it } from 'vitest'
import { distanceToSegment, isPointInPolygon } from './math'

describe('distanceToSegment', () => {
  it('measures perpendicular distance inside the segment', () => {
    expect(distanceToSegment({ x: 5, y: 5 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(5)
  })

  it('clamps to the nearest endpoint', () => {
    expect(distanceToSegment({ x: 15, y: 0 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(5)
  })

  it('handles a zero-length segment', () => {
    expect(distanceToSegment({ x: 3, y: 4 }, { x: 0, y: 0 }, { x: 0, y: 0 })).toBe(5)
  })
})

describe('isPointInPolygon', () => {
  const square = [
    { x: 0, y: 0 },
    { x: 10, y: 0 },
    { x: 10, y: 10 },
    { x: 0, y: 10 },
  ]

  it('detects inside and outside points', () => {
    expect(isPointInPolygon({ x: 5, y: 5 }, square)).toBe(true)
    expect(isPointInPolygon({ x: 15, y: 5 }, square)).toBe(false)
  })

  it('treats a polygon vertex as inside', () => {
    expect(isPointInPolygon({ x: 10, y: 10 }, square)).toBe(true)
  })

  it('rejects points outside the given bounding box', () => {
    const bbox = { xmin: 0, xmax: 4, ymin: 0, ymax: 4 }
    expect(isPointInPolygon({ x: 5, y: 5 }, square, bbox)).toBe(false)
  })

  it('handles concave polygons', () => {
    const u = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 7, y: 10 },
      { x: 7, y: 3 },
      { x: 3, y: 3 },
      { x: 3, y: 10 },
      { x: 0, y: 10 },
    ]
    expect(isPointInPolygon({ x: 5, y: 8 }, u)).toBe(false)
    expect(isPointInPolygon({ x: 1, y: 5 }, u)).toBe(true)
  })
})
