/**
 * Application-wide constants
 * Centralizes magic numbers and configuration values for easier maintenance
 */

// ============================================================================
// Unit Conversion
// ============================================================================

/** Standard DPI for SVG user units */
export const DPI = 96

/** Width/height used when the document does not declare a usable size */
export const DEFAULT_DOCUMENT_SIZE = 100

// ============================================================================
// OpenSCAD Output
// ============================================================================

export const SCAD = {
  /** Extra height given to subtracted holes at each end */
  FUDGE: 0.1,
  /** Document units to millimetres, applied to X and -Y in every module */
  SCALE: '25.4/90',
  /** Prefix of every generated module name */
  MODULE_PREFIX: 'poly_',
  /** Suffix of names generated for elements without an id */
  FALLBACK_SUFFIX: 'x',
} as const

// ============================================================================
// Export Defaults
// ============================================================================

export const EXPORT_DEFAULTS = {
  /** Curve flattening tolerance in document units (smaller = more vertices) */
  SMOOTHNESS: 0.2,
  /** Extrusion height, emitted verbatim in the module calls */
  HEIGHT: '5',
  /** Output file; `~` is expanded to the home directory */
  OUTPUT: '~/paths.scad',
  /** Vertex simplification tolerance; 0 disables it */
  SIMPLIFY: 0,
} as const
