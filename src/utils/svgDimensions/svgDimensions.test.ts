import { describe, expect, it } from 'vitest'
import {
  getViewportTransform,
  lengthToPixels,
  parseLengthAttribute,
  parseLengthWithUnit,
  parseViewBox,
  resolveDocumentLength,
} from '.'

describe('length parsing', () => {
  it('splits value and unit', () => {
    expect(parseLengthWithUnit('10mm')).toEqual({ value: 10, unit: 'mm' })
    expect(parseLengthWithUnit('-2.5e1PX')).toEqual({ value: -25, unit: 'px' })
    expect(parseLengthWithUnit('ten')).toBeNull()
  })

  it('converts absolute units at 96 DPI', () => {
    expect(lengthToPixels(1, 'in')).toBe(96)
    expect(lengthToPixels(3, 'pc')).toBe(48)
    expect(lengthToPixels(2, '')).toBe(2)
    expect(lengthToPixels(50, '%')).toBeNull()
  })

  it('falls back only for missing attributes', () => {
    expect(parseLengthAttribute(null, 7)).toBe(7)
    expect(parseLengthAttribute('', 7)).toBe(7)
    expect(parseLengthAttribute('abc', 7)).toBeNull()
    expect(parseLengthAttribute('1in', 7)).toBe(96)
  })
})

describe('resolveDocumentLength', () => {
  it('uses the declared length when it is usable', () => {
    expect(resolveDocumentLength('200')).toBe(200)
    expect(resolveDocumentLength('2in')).toBe(192)
  })

  it('falls back to 100 otherwise', () => {
    expect(resolveDocumentLength(null)).toBe(100)
    expect(resolveDocumentLength('50%')).toBe(100)
    expect(resolveDocumentLength('-5')).toBe(100)
    expect(resolveDocumentLength('0')).toBe(100)
  })
})

describe('viewBox', () => {
  it('parses comma or space separated values', () => {
    expect(parseViewBox('0 0 50 25')).toEqual({ minX: 0, minY: 0, width: 50, height: 25 })
    expect(parseViewBox('0,0,50,25')).toEqual({ minX: 0, minY: 0, width: 50, height: 25 })
    expect(parseViewBox('0 0 50')).toBeNull()
    expect(parseViewBox(null)).toBeNull()
  })

  it('scales user units to the document size', () => {
    const viewBox = { minX: 10, minY: 10, width: 50, height: 25 }
    expect(getViewportTransform({ width: 100, height: 100, viewBox })).toEqual([2, 0, 0, 4, 0, 0])
    expect(getViewportTransform({ width: 100, height: 100, viewBox: null })).toEqual([1, 0, 0, 1, 0, 0])
  })
})
