// OpenSCAD module naming

import { SCAD } from '../../constants'

/**
 * Strip everything OpenSCAD does not accept in an identifier
 */
export function sanitizeIdentifier(id: string): string {
  return id.replace(/[^A-Za-z0-9_]+/g, '')
}

/**
 * Name for a shape group's module. Elements without a usable id are numbered
 * by `nextFallback` in document order; names already taken get a `_2`,
 * `_3`, ... suffix.
 */
export function createModuleName(
  id: string | null,
  usedNames: Set<string>,
  nextFallback: () => number
): string {
  const base = (id && sanitizeIdentifier(id)) || `${nextFallback()}${SCAD.FALLBACK_SUFFIX}`
  let name = `${SCAD.MODULE_PREFIX}${base}`

  if (usedNames.has(name)) {
    let suffix = 2
    while (usedNames.has(`${name}_${suffix}`)) suffix++
    name = `${name}_${suffix}`
  }

  usedNames.add(name)
  return name
}
