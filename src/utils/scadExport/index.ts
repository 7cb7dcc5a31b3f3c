// OpenSCAD export module exports

export type { ScadModule } from './scadWriter'
export {
  SCAD_HEADER,
  NO_PATHS_COMMENT,
  formatPolygon,
  renderModule,
  renderModuleCall,
  renderScadDocument,
} from './scadWriter'

export { sanitizeIdentifier, createModuleName } from './moduleNames'
