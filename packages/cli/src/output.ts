import { BadInput, ErrUnreachable, HasSourceLocation, TallyError } from '@tally/core'
import { lineAt, type Exp } from '@tally/parser'

export type AstFormat = 'json' | 'compact'

export const AST_FORMATS: readonly AstFormat[] = ['json', 'compact']

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER)
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

/** JSON has no 64-bit integers: small ones become numbers, the rest decimal strings. */
function bigintReplacer(_key: string, value: unknown): unknown {
  if (typeof value !== 'bigint') return value
  return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value.toString()
}

/** Render a parsed program as JSON. */
export function renderAst(exp: Exp, format: AstFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(exp, bigintReplacer, 2)
    case 'compact':
      return JSON.stringify(exp, bigintReplacer)
    default:
      throw ErrUnreachable.create({ value: String(format satisfies never) })
  }
}

export interface DiagnosticOptions {
  readonly color: boolean
  readonly debug: boolean
}

/**
 * Render a failure for stderr. Errors that carry a source location get the
 * offending line with a caret under the column.
 */
export function renderDiagnostic(err: unknown, source: string | undefined, opts: DiagnosticOptions): string {
  const red = opts.color ? '\x1b[31m' : ''
  const dim = opts.color ? '\x1b[2m' : ''
  const reset = opts.color ? '\x1b[0m' : ''

  const lines: string[] = []

  if (opts.debug && TallyError.isTallyError(err)) {
    lines.push(err.prettyPrint({ color: opts.color, includeStackTrace: true }))
  } else {
    const message = err instanceof Error ? err.message : String(err)
    lines.push(`${red}error${reset}: ${message}`)
  }

  if (source !== undefined && TallyError.has(err, HasSourceLocation)) {
    const { line, column } = err.data
    const gutter = String(line)
    const pad = ' '.repeat(gutter.length)
    lines.push(`${dim}${gutter} |${reset} ${lineAt(source, line)}`)
    lines.push(`${dim}${pad} |${reset} ${' '.repeat(column - 1)}${red}^${reset}`)
  }

  return lines.join('\n')
}

/** 2 for problems with the program text, 1 for everything else. */
export function exitCodeFor(err: unknown): number {
  return TallyError.has(err, BadInput) ? 2 : 1
}
