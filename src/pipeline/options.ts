// Export options - defaults and validation

import { EXPORT_DEFAULTS } from '../constants'
import type { WarningCallback } from '../utils/svgParser/types'

export interface ExportOptions {
  /** Flattening tolerance in document units */
  smoothness: number
  /** Extrusion height, written verbatim into every module call */
  height: string
  /** Simplification tolerance; 0 disables simplification */
  simplify: number
  /** Convert only these element ids; all drawable elements when absent */
  ids?: readonly string[]
  onWarning?: WarningCallback
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export const DEFAULT_EXPORT_OPTIONS: ExportOptions = {
  smoothness: EXPORT_DEFAULTS.SMOOTHNESS,
  height: EXPORT_DEFAULTS.HEIGHT,
  simplify: EXPORT_DEFAULTS.SIMPLIFY,
}

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

/**
 * Merge `partial` over the defaults. Throws ConfigError on an invalid value.
 */
export function resolveExportOptions(partial: Partial<ExportOptions> = {}): ExportOptions {
  const options: ExportOptions = { ...DEFAULT_EXPORT_OPTIONS, ...partial }

  if (!Number.isFinite(options.smoothness) || options.smoothness <= 0) {
    throw new ConfigError(`smoothness must be a positive number, got ${options.smoothness}`)
  }

  const height = options.height.trim()
  if (!NUMERIC.test(height) || !(Number(height) > 0)) {
    throw new ConfigError(`height must be a positive number, got "${options.height}"`)
  }
  options.height = height

  if (!Number.isFinite(options.simplify) || options.simplify < 0) {
    throw new ConfigError(`simplify must be zero or a positive number, got ${options.simplify}`)
  }

  if (options.ids) {
    const ids = options.ids.map(id => id.trim())
    if (ids.length === 0 || ids.some(id => id === '')) {
      throw new ConfigError('ids must be non-empty element ids')
    }
    options.ids = ids
  }

  return options
}
