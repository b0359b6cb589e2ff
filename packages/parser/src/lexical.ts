/**
 * Lexical primitives: identifiers, literals, and the whitespace/comment
 * "junk" that may sit between any two tokens.
 *
 * Tokens are scanned byte by byte from the parser's cursor. Every character
 * class here is ASCII, so a byte outside it simply ends the token; only the
 * matched bytes are ever decoded.
 */

import { Parser, choice, fail, lookAhead, many, possibly, str, succeedWith } from 'arcsecond'

import { Exp, type Bool, type Int, type Str, type Var } from './ast.js'
import { firstOf } from './alternatives.js'

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

const TAB = 0x09
const LF = 0x0a
const CR = 0x0d
const SPACE = 0x20
const QUOTE = 0x27
const STAR = 0x2a
const MINUS = 0x2d
const SLASH = 0x2f
const UNDERSCORE = 0x5f

const decoder = new TextDecoder()

/** Returns the end of the token starting at `start`, or undefined when there is none. */
type Scanner = (bytes: DataView, start: number) => number | undefined

function byteAt(bytes: DataView, at: number): number {
  return at < bytes.byteLength ? bytes.getUint8(at) : -1
}

/** First position at or after `at` whose byte fails `accept`. */
function skip(bytes: DataView, at: number, accept: (byte: number) => boolean): number {
  let end = at
  while (end < bytes.byteLength && accept(bytes.getUint8(end))) end++
  return end
}

const isSpace = (b: number) => b === SPACE || b === TAB || b === CR || b === LF
const isDigit = (b: number) => b >= 0x30 && b <= 0x39
const isLetter = (b: number) => (b >= 0x41 && b <= 0x5a) || (b >= 0x61 && b <= 0x7a) || b === UNDERSCORE

function token(expected: string, scan: Scanner): Parser<string> {
  return new Parser<string>((state) => {
    if (state.isError) return state
    const { dataView, index } = state
    const end = scan(dataView, index)
    if (end === undefined) {
      return { ...state, isError: true, error: `Expected ${expected}` }
    }
    const text = decoder.decode(new Uint8Array(dataView.buffer, dataView.byteOffset + index, end - index))
    return { ...state, result: text, index: end }
  })
}

// ============================================================================
// Junk
// ============================================================================

/** Spaces, tabs and line breaks. Other Unicode spacing is not junk. */
export const whitespace: Parser<string> = token('whitespace', (bytes, start) => {
  const end = skip(bytes, start, isSpace)
  return end > start ? end : undefined
})

/** `--` and at least one more character, up to (not including) the newline. */
export const lineComment: Parser<string> = token('line comment', (bytes, start) => {
  if (byteAt(bytes, start) !== MINUS || byteAt(bytes, start + 1) !== MINUS) return undefined
  const end = skip(bytes, start + 2, (b) => b !== LF)
  return end > start + 2 ? end : undefined
})

/** `/*` through the first `*\/`. Block comments do not nest. */
export const blockComment: Parser<string> = token('block comment', (bytes, start) => {
  if (byteAt(bytes, start) !== SLASH || byteAt(bytes, start + 1) !== STAR) return undefined
  for (let at = start + 2; at + 1 < bytes.byteLength; at++) {
    if (bytes.getUint8(at) === STAR && bytes.getUint8(at + 1) === SLASH) return at + 2
  }
  return undefined
})

/**
 * Any run of whitespace and comments, including the empty run.
 * An opening `/*` that is never closed fails here rather than being left for
 * the next token to trip over.
 */
export const junk: Parser<null> = many(choice([whitespace, lineComment, blockComment]))
  .chain(() => possibly(lookAhead(str('/*'))))
  .chain((open): Parser<null> => (open === null ? succeedWith(null) : fail('Unterminated block comment')))

// ============================================================================
// Literals
// ============================================================================

/** A letter or `_`, then letters, digits and `_`. No words are reserved. */
export const variable: Parser<Var> = token('identifier', (bytes, start) =>
  isLetter(byteAt(bytes, start)) ? skip(bytes, start + 1, (b) => isLetter(b) || isDigit(b)) : undefined
).map(Exp.var)

/**
 * `true` or `false`, matched as a prefix: `trueish` reads as `true` followed
 * by `ish`.
 */
export const bool: Parser<Bool> = firstOf([
  str('true').map(() => Exp.bool(true)),
  str('false').map(() => Exp.bool(false)),
])

/** Optional `-`, then decimal digits, within the signed 64-bit range. */
export const int: Parser<Int> = token('integer', (bytes, start) => {
  const digits = byteAt(bytes, start) === MINUS ? start + 1 : start
  const end = skip(bytes, digits, isDigit)
  return end > digits ? end : undefined
}).chain((digits): Parser<Int> => {
  const value = BigInt(digits)
  if (value < INT64_MIN || value > INT64_MAX) {
    return fail(`Integer literal ${digits} does not fit in 64 bits`)
  }
  return succeedWith(Exp.int(value))
})

/** `'...'` with no escapes, so the body cannot contain `'`. */
export const string: Parser<Str> = token('string', (bytes, start) => {
  if (byteAt(bytes, start) !== QUOTE) return undefined
  const close = skip(bytes, start + 1, (b) => b !== QUOTE)
  return close < bytes.byteLength ? close + 1 : undefined
}).map((quoted) => Exp.str(quoted.slice(1, -1)))
