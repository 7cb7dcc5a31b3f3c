// SVG to OpenSCAD conversion pipeline

import type { ShapeElement } from '../types/svg'
import type { Point } from '../utils/geometry/types'
import { classifyContainment, groupPolygonsWithHoles } from '../utils/geometry/polygonAnalysis'
import { extractSubpaths } from '../utils/shapeExtraction'
import { renderScadDocument } from '../utils/scadExport'
import type { ScadModule } from '../utils/scadExport'
import { collectShapeElements, parseSvgDocument } from '../utils/svgParser'
import { getDocumentSize } from '../utils/svgDimensions'
import type { DocumentSize } from '../utils/svgDimensions/types'
import {
  addShapeGroup,
  assignModuleName,
  createExportContext,
  finalizeCenter,
} from './exportContext'
import type { ExportContext } from './exportContext'
import { resolveExportOptions } from './options'
import type { ExportOptions } from './options'

export interface ConversionResult {
  scad: string
  /** Modules written */
  shapeCount: number
  /** Elements that produced no polygon */
  skippedCount: number
  /** Document point mapped to the origin */
  center: Point
}

function extractShapeGroups(context: ExportContext, elements: ShapeElement[], options: ExportOptions): number {
  let skipped = 0
  for (const element of elements) {
    const subpaths = extractSubpaths(element, options)
    if (subpaths.length === 0) {
      skipped++
      continue
    }
    addShapeGroup(context, { id: element.id, subpaths })
  }
  return skipped
}

function emitModules(context: ExportContext): ScadModule[] {
  return context.groups.map(group => {
    const graph = classifyContainment(group.subpaths)
    return {
      name: assignModuleName(context, group.id),
      polygons: groupPolygonsWithHoles(group.subpaths, graph),
    }
  })
}

/**
 * Convert already collected elements. Every element is extracted before the
 * center is fixed and the first module is written.
 */
export function convertShapeElements(
  elements: ShapeElement[],
  size: DocumentSize,
  partial: Partial<ExportOptions> = {}
): ConversionResult {
  const options = resolveExportOptions(partial)
  const context = createExportContext()

  const skippedCount = extractShapeGroups(context, elements, options)
  const center = finalizeCenter(context, size)
  const modules = emitModules(context)

  return {
    scad: renderScadDocument(modules, options.height, center),
    shapeCount: modules.length,
    skippedCount,
    center,
  }
}

/**
 * Convert SVG markup into an OpenSCAD script
 */
export function convertSvgToScad(svgText: string, partial: Partial<ExportOptions> = {}): ConversionResult {
  const options = resolveExportOptions(partial)
  const doc = parseSvgDocument(svgText, options.onWarning)
  const elements = collectShapeElements(doc, options)
  return convertShapeElements(elements, getDocumentSize(doc.documentElement), options)
}
