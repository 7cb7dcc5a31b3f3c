// Command line runner

import * as fs from 'fs'
import { ConfigError, convertSvgToScad } from '../pipeline'
import { SvgParseError } from '../utils/svgParser'
import { parseCliArgs, UsageError, USAGE } from './args'
import type { CliOptions } from './args'
import { OutputWriteError, resolveOutputPath, writeScadFile } from './output'

function readInput(input: string): string {
  return fs.readFileSync(input === '-' ? 0 : input, 'utf-8')
}

/**
 * Run the command line tool and return the process exit status
 */
export function runCli(argv: readonly string[]): number {
  let cli: CliOptions
  try {
    cli = parseCliArgs(argv)
  } catch (err) {
    if (!(err instanceof UsageError)) throw err
    console.error(`[svg-extrude] ${err.message}`)
    console.error(USAGE)
    return 2
  }

  if (cli.help || cli.input === null) {
    console.log(USAGE)
    return 0
  }

  let svgText: string
  try {
    svgText = readInput(cli.input)
  } catch (err) {
    console.error(`[svg-extrude] Unable to read ${cli.input}: ${err instanceof Error ? err.message : String(err)}`)
    return 1
  }

  try {
    const result = convertSvgToScad(svgText, {
      ...cli.export,
      onWarning: cli.verbose ? message => console.warn(message) : undefined,
    })

    if (cli.toStdout) {
      process.stdout.write(result.scad)
      return 0
    }

    const outputPath = resolveOutputPath(cli.output)
    writeScadFile(outputPath, result.scad)
    console.log(`Wrote ${result.shapeCount} module(s) to ${outputPath}`)
    if (cli.verbose && result.skippedCount > 0) {
      console.warn(`[svg-extrude] Skipped ${result.skippedCount} shape(s)`)
    }
    return 0
  } catch (err) {
    if (err instanceof OutputWriteError || err instanceof ConfigError || err instanceof SvgParseError) {
      console.error(err.message)
      return 1
    }
    throw err
  }
}
