// OpenSCAD script generation

import type { Point, PolygonWithHoles } from '../geometry/types'
import { SCAD } from '../../constants'

export interface ScadModule {
  name: string
  polygons: PolygonWithHoles[]
}

export const SCAD_HEADER = [
  '// Module names are of the form poly_<svg-element-id>().',
  '// You can associate a polygon in this OpenSCAD program with the corresponding',
  '// SVG element by looking for the XML element with the attribute',
  '// id="svg-element-id".',
  '',
  '// fudge value ensures that subtracted solids are slightly taller',
  '// in the z dimension than the polygon being subtracted from.',
  `fudge = ${SCAD.FUDGE};`,
]

export const NO_PATHS_COMMENT = '// No valid paths found in the SVG file'

/**
 * Polygon point list with every vertex translated by -center
 */
export function formatPolygon(vertices: Point[], center: Point): string {
  const points = vertices.map(p => `[${p.x - center.x},${p.y - center.y}]`)
  return `polygon([${points.join(',')}]);`
}

function polygonLines(polygon: PolygonWithHoles, center: Point): string[] {
  if (polygon.holes.length === 0) {
    return [
      '    linear_extrude(height=h)',
      `      ${formatPolygon(polygon.outer.vertices, center)}`,
    ]
  }

  const lines = [
    '    difference()',
    '    {',
    '      linear_extrude(height=h)',
    `        ${formatPolygon(polygon.outer.vertices, center)}`,
  ]
  for (const hole of polygon.holes) {
    lines.push(
      '      translate([0, 0, -fudge])',
      '        linear_extrude(height=h+2*fudge)',
      `          ${formatPolygon(hole.vertices, center)}`
    )
  }
  lines.push('    }')
  return lines
}

/**
 * One module taking the extrusion height `h`, scaled to millimetres with the
 * Y axis flipped, holding the union of its polygons
 */
export function renderModule(module: ScadModule, center: Point): string {
  return [
    `module ${module.name}(h)`,
    '{',
    `  scale([${SCAD.SCALE}, -${SCAD.SCALE}, 1]) union()`,
    '  {',
    ...module.polygons.flatMap(polygon => polygonLines(polygon, center)),
    '  }',
    '}',
  ].join('\n') + '\n'
}

export function renderModuleCall(name: string, height: string): string {
  return `${name}(${height});`
}

/**
 * Complete script: header, every module, then one call per module
 */
export function renderScadDocument(modules: ScadModule[], height: string, center: Point): string {
  const parts = [SCAD_HEADER.join('\n') + '\n']

  if (modules.length === 0) {
    parts.push(`\n${NO_PATHS_COMMENT}\n`)
    return parts.join('')
  }

  for (const module of modules) {
    parts.push('\n', renderModule(module, center))
  }
  parts.push('\n')
  for (const module of modules) {
    parts.push(renderModuleCall(module.name, height) + '\n')
  }
  return parts.join('')
}
