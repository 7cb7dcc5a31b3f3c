// Number list parsing for SVG attribute values (points, transform arguments)

/** SVG number grammar: sign, digits, optional fraction, optional exponent */
export const NUMBER_SOURCE = '[+-]?(?:\\d+\\.?\\d*|\\.\\d+)(?:[eE][+-]?\\d+)?'

const NUMBER_LIST = new RegExp(`\\s*,?\\s*(${NUMBER_SOURCE})`, 'y')

/**
 * Parse a comma/whitespace separated list of numbers such as "10,20 30-5".
 * Returns null if anything other than numbers and separators is present.
 */
export function parseNumberList(text: string): number[] | null {
  const values: number[] = []
  const trimmed = text.trim()
  NUMBER_LIST.lastIndex = 0

  while (NUMBER_LIST.lastIndex < trimmed.length) {
    const start = NUMBER_LIST.lastIndex
    const match = NUMBER_LIST.exec(trimmed)
    if (!match) return null
    // A separating comma is only allowed between numbers
    if (values.length === 0 && trimmed[start] === ',') return null
    values.push(parseFloat(match[1]))
  }

  return values
}
