import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { OutputWriteError, resolveOutputPath, writeScadFile } from './output'

describe('resolveOutputPath', () => {
  it('strips quotes and expands the home directory', () => {
    expect(resolveOutputPath('"~/models/out.scad"', '/home/test')).toBe(path.join('/home/test', 'models/out.scad'))
    expect(resolveOutputPath('~', '/home/test')).toBe(path.resolve('/home/test'))
  })

  it('resolves relative paths against the working directory', () => {
    expect(resolveOutputPath("'out/paths.scad'")).toBe(path.resolve('out/paths.scad'))
  })
})

describe('writeScadFile', () => {
  let dir: string

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'svg-extrude-'))
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('creates missing directories', () => {
    const file = path.join(dir, 'nested', 'deeper', 'out.scad')
    writeScadFile(file, 'fudge = 0.1;\n')
    expect(fs.readFileSync(file, 'utf-8')).toBe('fudge = 0.1;\n')
  })

  it('wraps failures with the attempted path', () => {
    const blocker = path.join(dir, 'blocker')
    fs.writeFileSync(blocker, '')
    const file = path.join(blocker, 'out.scad')

    let error: unknown
    try {
      writeScadFile(file, '')
    } catch (err) {
      error = err
    }
    expect(error).toBeInstanceOf(OutputWriteError)
    if (!(error instanceof OutputWriteError)) return
    expect(error.filePath).toBe(file)
    expect(error.message.startsWith(`Unable to open or write to the file ${file}: `)).toBe(true)
    expect(error.cause).toBeInstanceOf(Error)
  })
})
