// Conversion pipeline exports

export type { ExportOptions } from './options'
export { ConfigError, DEFAULT_EXPORT_OPTIONS, resolveExportOptions } from './options'

export type { ShapeGroup, ExportContext } from './exportContext'
export { createExportContext, addShapeGroup, finalizeCenter, assignModuleName } from './exportContext'

export type { ConversionResult } from './convert'
export { convertShapeElements, convertSvgToScad } from './convert'
