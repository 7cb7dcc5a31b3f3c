import { describe, expect, it } from 'vitest'
import { createModuleName, sanitizeIdentifier } from './moduleNames'

describe('sanitizeIdentifier', () => {
  it('keeps letters, digits and underscores only', () => {
    expect(sanitizeIdentifier('my-shape 1!')).toBe('myshape1')
    expect(sanitizeIdentifier('layer_2')).toBe('layer_2')
  })
})

describe('createModuleName', () => {
  it('prefixes sanitized ids', () => {
    expect(createModuleName('path-12', new Set(), () => 0)).toBe('poly_path12')
  })

  it('numbers elements without a usable id in call order', () => {
    const used = new Set<string>()
    let counter = 0
    const next = () => counter++
    expect(createModuleName(null, used, next)).toBe('poly_0x')
    expect(createModuleName('---', used, next)).toBe('poly_1x')
    expect(createModuleName('keep', used, next)).toBe('poly_keep')
    expect(counter).toBe(2)
  })

  it('suffixes names that are already taken', () => {
    const used = new Set<string>()
    expect(createModuleName('a-b', used, () => 0)).toBe('poly_ab')
    expect(createModuleName('ab', used, () => 0)).toBe('poly_ab_2')
    expect(createModuleName('a b', used, () => 0)).toBe('poly_ab_3')
  })
})
