// svg-extrude library entry

export type { ConversionResult, ExportOptions } from './pipeline'
export {
  ConfigError,
  DEFAULT_EXPORT_OPTIONS,
  resolveExportOptions,
  convertSvgToScad,
  convertShapeElements,
} from './pipeline'

export type { ShapeDescriptor, ShapeElement, ShapeKind } from './types/svg'
export type { WarningCallback, WalkOptions } from './utils/svgParser'
export { parseSvgDocument, collectShapeElements, SvgParseError } from './utils/svgParser'

export type { ScadModule } from './utils/scadExport'
export { renderScadDocument, sanitizeIdentifier } from './utils/scadExport'

export * from './utils/geometry'
