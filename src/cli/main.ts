#!/usr/bin/env node
// svg-extrude command line entry point

import { runCli } from './run'

process.exitCode = runCli(process.argv.slice(2))
