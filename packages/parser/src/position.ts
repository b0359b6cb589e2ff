/**
 * Source locations for diagnostics.
 *
 * arcsecond runs over the UTF-8 encoding of its input, so the offsets it
 * reports count bytes. Locations shown to people count characters.
 */

/** A point in source text. `line` and `column` are 1-based; `offset` counts characters. */
export type SourceLocation = {
  readonly offset: number
  readonly line: number
  readonly column: number
}

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/** Convert a byte offset reported by the parser into a location in `source`. */
export function locate(source: string, byteOffset: number): SourceLocation {
  const offset = decoder.decode(encoder.encode(source).subarray(0, byteOffset)).length
  const before = source.slice(0, offset)
  const lineStart = before.lastIndexOf('\n') + 1
  let line = 1
  for (const char of before) {
    if (char === '\n') line++
  }
  return { offset, line, column: offset - lineStart + 1 }
}

/** The full text of the given 1-based line, without its line break. */
export function lineAt(source: string, line: number): string {
  return source.split('\n')[line - 1]?.replace(/\r$/, '') ?? ''
}
