import { describe, expect, it } from 'vitest'
import { SvgParseError, parseSvgDocument } from './documentParser'
import { getTagName } from './elementParsing'

describe('parseSvgDocument', () => {
  it('returns a document rooted at <svg>', () => {
    const doc = parseSvgDocument('<svg xmlns="http://www.w3.org/2000/svg"><rect width="1" height="1"/></svg>')
    expect(getTagName(doc.documentElement)).toBe('svg')
  })

  it('rejects other root elements', () => {
    expect(() => parseSvgDocument('<html><body/></html>')).toThrow('Document root is not an <svg> element')
  })

  it('rejects empty input', () => {
    expect(() => parseSvgDocument('')).toThrow(SvgParseError)
  })
})
