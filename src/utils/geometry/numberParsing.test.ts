import { describe, expect, it } from 'vitest'
import { parseNumberList } from './numberParsing'

describe('parseNumberList', () => {
  it('accepts commas, whitespace and sign-separated numbers', () => {
    expect(parseNumberList('10,20 30-5')).toEqual([10, 20, 30, -5])
  })

  it('reads exponents and bare fractions', () => {
    expect(parseNumberList('1e2 .5')).toEqual([100, 0.5])
    expect(parseNumberList('1.5.5')).toEqual([1.5, 0.5])
  })

  it('returns an empty list for blank input', () => {
    expect(parseNumberList('  ')).toEqual([])
  })

  it('rejects stray characters and separators', () => {
    expect(parseNumberList('a')).toBeNull()
    expect(parseNumberList(',1')).toBeNull()
    expect(parseNumberList('1,,2')).toBeNull()
  })
})
