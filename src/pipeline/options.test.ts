import { describe, expect, it } from 'vitest'
import { ConfigError, resolveExportOptions } from './options'

describe('resolveExportOptions', () => {
  it('fills in defaults', () => {
    expect(resolveExportOptions()).toEqual({ smoothness: 0.2, height: '5', simplify: 0 })
  })

  it('trims the height and ids', () => {
    const options = resolveExportOptions({ height: ' 7.5 ', ids: [' a', 'b '] })
    expect(options.height).toBe('7.5')
    expect(options.ids).toEqual(['a', 'b'])
  })

  it('rejects invalid values', () => {
    expect(() => resolveExportOptions({ smoothness: 0 })).toThrow(ConfigError)
    expect(() => resolveExportOptions({ smoothness: NaN })).toThrow(ConfigError)
    expect(() => resolveExportOptions({ height: 'tall' })).toThrow('height must be a positive number, got "tall"')
    expect(() => resolveExportOptions({ height: '-1' })).toThrow(ConfigError)
    expect(() => resolveExportOptions({ simplify: -1 })).toThrow(ConfigError)
    expect(() => resolveExportOptions({ ids: [''] })).toThrow('ids must be non-empty element ids')
  })
})
