// SVG dimension types and interfaces

/** A length split into its number and unit ("" for user units) */
export interface Length {
  value: number
  unit: string
}

export interface ViewBox {
  minX: number
  minY: number
  width: number
  height: number
}

/**
 * Intrinsic document size in pixels (96 DPI) plus the parsed viewBox
 */
export interface DocumentSize {
  width: number
  height: number
  viewBox: ViewBox | null
}
