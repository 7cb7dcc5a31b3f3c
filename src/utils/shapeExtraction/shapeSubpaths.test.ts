import { describe, expect, it, vi } from 'vitest'
import type { ShapeDescriptor } from '../../types/svg'
import { IDENTITY_MATRIX, translationMatrix } from '../geometry/transform'
import type { Matrix } from '../geometry/types'
import { extractSubpaths } from './shapeSubpaths'

function element(shape: ShapeDescriptor, id: string | null = 'shape', transform: Matrix = IDENTITY_MATRIX) {
  return { id, shape, transform }
}

const square: ShapeDescriptor = { kind: 'rect', x: 0, y: 0, width: 10, height: 10, rx: 0, ry: 0 }

describe('extractSubpaths', () => {
  it('drops the closing duplicate vertex', () => {
    const [subpath] = extractSubpaths(element(square), { smoothness: 0.2 })
    expect(subpath.vertices).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 },
    ])
    expect(subpath.bbox).toEqual({ xmin: 0, xmax: 10, ymin: 0, ymax: 10 })
  })

  it('applies the element transform before flattening', () => {
    const [subpath] = extractSubpaths(element(square, 'r', translationMatrix(5, 5)), { smoothness: 0.2 })
    expect(subpath.bbox).toEqual({ xmin: 5, xmax: 15, ymin: 5, ymax: 15 })
  })

  it('keeps every subpath of a compound path', () => {
    const shape: ShapeDescriptor = { kind: 'path', d: 'M0 0 H20 V20 H0 Z M5 5 H15 V15 H5 Z' }
    expect(extractSubpaths(element(shape), { smoothness: 0.2 })).toHaveLength(2)
  })

  it('flattens circles within tolerance', () => {
    const [subpath] = extractSubpaths(element({ kind: 'circle', cx: 0, cy: 0, r: 10 }), { smoothness: 0.05 })
    expect(subpath.vertices.length).toBeGreaterThan(8)
    for (const p of subpath.vertices) {
      expect(Math.hypot(p.x, p.y)).toBeCloseTo(10, 1)
    }
  })

  it('simplifies collinear vertices when asked', () => {
    const shape: ShapeDescriptor = {
      kind: 'polygon',
      points: [{ x: 0, y: 0 }, { x: 5, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 }, { x: 0, y: 10 }],
    }
    expect(extractSubpaths(element(shape), { smoothness: 0.2 })[0].vertices).toHaveLength(5)
    expect(extractSubpaths(element(shape), { smoothness: 0.2, simplify: 0.5 })[0].vertices).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 },
    ])
  })

  it('reports shapes that produce no polygon', () => {
    const onWarning = vi.fn()
    const line: ShapeDescriptor = { kind: 'line', x1: 0, y1: 0, x2: 10, y2: 10 }

    expect(extractSubpaths(element(line, 'l1'), { smoothness: 0.2, onWarning })).toEqual([])
    expect(extractSubpaths(element({ kind: 'circle', cx: 0, cy: 0, r: 0 }, null), { smoothness: 0.2, onWarning })).toEqual([])
    expect(extractSubpaths(element({ kind: 'path', d: 'L1 1' }, null), { smoothness: 0.2, onWarning })).toEqual([])

    expect(onWarning.mock.calls).toEqual([
      ['[shape-extract] Skipping line "l1": no subpath with at least 3 vertices'],
      ['[shape-extract] Skipping circle: degenerate size or radius'],
      ['[shape-extract] Skipping path: Path data must start with a moveto at position 0'],
    ])
  })
})
