// Command line argument parsing

import { EXPORT_DEFAULTS } from '../constants'
import type { ExportOptions } from '../pipeline/options'

export interface CliOptions {
  input: string | null
  output: string
  toStdout: boolean
  verbose: boolean
  help: boolean
  export: Partial<ExportOptions>
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export const USAGE = `Usage: svg-extrude [options] <input.svg | ->

Convert the shapes of an SVG file into extruded OpenSCAD polygons.

Options:
  -s, --smoothness <n>  curve flattening tolerance (default ${EXPORT_DEFAULTS.SMOOTHNESS})
  -H, --height <n>      extrusion height (default ${EXPORT_DEFAULTS.HEIGHT})
  -o, --output <file>   output file (default ${EXPORT_DEFAULTS.OUTPUT})
  -i, --id <ids>        only convert these element ids; repeatable, comma separated
      --simplify <n>    simplification tolerance, 0 disables (default ${EXPORT_DEFAULTS.SIMPLIFY})
      --stdout          print the script instead of writing a file
  -v, --verbose         report skipped shapes
  -h, --help            show this help`

function parseNumberOption(flag: string, value: string): number {
  const number = Number(value)
  if (value.trim() === '' || Number.isNaN(number)) {
    throw new UsageError(`${flag} expects a number, got "${value}"`)
  }
  return number
}

/**
 * Parse `process.argv.slice(2)`. Value options accept both `--flag value`
 * and `--flag=value`.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    input: null,
    output: EXPORT_DEFAULTS.OUTPUT,
    toStdout: false,
    verbose: false,
    help: false,
    export: {},
  }
  const ids: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1
    const flag = eq >= 0 ? arg.slice(0, eq) : arg

    const takeValue = (): string => {
      if (eq >= 0) return arg.slice(eq + 1)
      const value = argv[i + 1]
      if (value === undefined) throw new UsageError(`${flag} requires a value`)
      i++
      return value
    }

    switch (flag) {
      case '-s':
      case '--smoothness':
        options.export.smoothness = parseNumberOption(flag, takeValue())
        break
      case '-H':
      case '--height':
        options.export.height = takeValue()
        break
      case '-o':
      case '--output':
        options.output = takeValue()
        break
      case '-i':
      case '--id':
        ids.push(...takeValue().split(',').map(id => id.trim()).filter(id => id !== ''))
        break
      case '--simplify':
        options.export.simplify = parseNumberOption(flag, takeValue())
        break
      case '--stdout':
        options.toStdout = true
        break
      case '-v':
      case '--verbose':
        options.verbose = true
        break
      case '-h':
      case '--help':
        options.help = true
        break
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new UsageError(`Unknown option: ${arg}`)
        }
        if (options.input !== null) {
          throw new UsageError(`Unexpected argument: ${arg}`)
        }
        options.input = arg
    }
  }

  if (ids.length > 0) options.export.ids = ids
  if (!options.help && options.input === null) {
    throw new UsageError('Missing input file')
  }
  return options
}
