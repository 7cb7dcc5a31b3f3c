// Output file handling

import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'

export class OutputWriteError extends Error {
  constructor(readonly filePath: string, cause: unknown) {
    super(
      `Unable to open or write to the file ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    )
    this.name = 'OutputWriteError'
  }
}

/**
 * Strip surrounding quotes, expand a leading `~` and make the path absolute
 */
export function resolveOutputPath(filePath: string, homeDir: string = os.homedir()): string {
  let resolved = filePath.trim().replace(/^(['"])(.*)\1$/, '$2')
  if (resolved === '~') {
    resolved = homeDir
  } else if (resolved.startsWith('~/') || resolved.startsWith('~\\')) {
    resolved = path.join(homeDir, resolved.slice(2))
  }
  return path.resolve(resolved)
}

/**
 * Write the script, creating missing parent directories.
 * Throws OutputWriteError when the file cannot be written.
 */
export function writeScadFile(filePath: string, content: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    fs.writeFileSync(filePath, content, 'utf-8')
  } catch (err) {
    throw new OutputWriteError(filePath, err)
  }
}
