/**
 * Arcsecond grammar for Tally programs.
 *
 * Grammar (loosest binding first):
 *   program   := junk let junk
 *   let       := var '=' let let | select
 *   select    := vars '<-' select | where
 *   vars      := var ',' vars | var
 *   where     := union '?' where | union
 *   union     := difference '+' union | difference
 *   difference:= product '-' difference | product
 *   product   := table '*' product | table
 *   table     := row ';' table | row
 *   row       := cell ',' row | cell
 *   cell      := var ':' cell | equals
 *   equals    := or '==' equals | or
 *   or        := and '|' or | and
 *   and       := not '&' and | not
 *   not       := '!' not | atom
 *   atom      := '(' program ')' | bool | int | str | var
 *
 * Junk (whitespace and comments) may appear between any two tokens. Every
 * operator is right-associative: `a - b - c` is `a - (b - c)`.
 */

import { coroutine, recursiveParser, str, type Parser } from 'arcsecond'

import { Exp, type Var } from './ast.js'
import { firstOf } from './alternatives.js'
import { ErrSyntax, ErrTrailingInput } from './errors.js'
import { bool, int, junk, string, variable } from './lexical.js'
import { infix, infixChain, prefix, ternary } from './operators.js'
import { locate, type SourceLocation } from './position.js'

// ============================================================================
// Rules
// ============================================================================

const program: Parser<Exp> = recursiveParser(() =>
  coroutine<Exp>((run) => {
    run(junk)
    const exp = run(letExp)
    run(junk)
    return exp
  })
)

const parens: Parser<Exp> = coroutine<Exp>((run) => {
  run(str('('))
  const exp = run(program)
  run(str(')'))
  return exp
})

const atom: Parser<Exp> = firstOf([parens, bool, int, string, variable])

const notExp: Parser<Exp> = recursiveParser(() => prefix('!', notExp, Exp.not, atom))

const andExp: Parser<Exp> = recursiveParser(() => infixChain(notExp, '&', andExp, Exp.and))

const orExp: Parser<Exp> = recursiveParser(() => infixChain(andExp, '|', orExp, Exp.or))

const equalsExp: Parser<Exp> = recursiveParser(() => infixChain(orExp, '==', equalsExp, Exp.equals))

const cellExp: Parser<Exp> = recursiveParser(() => infix(variable, ':', cellExp, Exp.cell, equalsExp))

const rowExp: Parser<Exp> = recursiveParser(() => infixChain(cellExp, ',', rowExp, Exp.row))

const tableExp: Parser<Exp> = recursiveParser(() => infixChain(rowExp, ';', tableExp, Exp.table))

const productExp: Parser<Exp> = recursiveParser(() => infixChain(tableExp, '*', productExp, Exp.product))

const differenceExp: Parser<Exp> = recursiveParser(() =>
  infixChain(productExp, '-', differenceExp, Exp.difference)
)

const unionExp: Parser<Exp> = recursiveParser(() => infixChain(differenceExp, '+', unionExp, Exp.union))

const whereExp: Parser<Exp> = recursiveParser(() => infixChain(unionExp, '?', whereExp, Exp.where))

/** One or more comma-separated variables, in source order. */
const vars: Parser<[Var, ...Var[]]> = recursiveParser(() =>
  infix(
    variable,
    ',',
    vars,
    (head: Var, tail: [Var, ...Var[]]): [Var, ...Var[]] => [head, ...tail],
    variable.map((only): [Var, ...Var[]] => [only]),
  )
)

const selectExp: Parser<Exp> = recursiveParser(() => infix(vars, '<-', selectExp, Exp.select, whereExp))

const letExp: Parser<Exp> = recursiveParser(() => ternary(variable, '=', letExp, '', letExp, Exp.let, selectExp))

/** Every rule of the cascade by name, loosest first. */
export const grammar = {
  program,
  let: letExp,
  select: selectExp,
  where: whereExp,
  union: unionExp,
  difference: differenceExp,
  product: productExp,
  table: tableExp,
  row: rowExp,
  cell: cellExp,
  equals: equalsExp,
  or: orExp,
  and: andExp,
  not: notExp,
  atom,
} as const

export type RuleName = keyof typeof grammar

// ============================================================================
// Public API
// ============================================================================

/** Outcome of running one rule against the start of some source text. */
export type RuleResult<T> =
  | { readonly ok: true; readonly value: T; readonly rest: string; readonly end: SourceLocation }
  | { readonly ok: false; readonly reason: string; readonly location: SourceLocation }

// arcsecond prefixes its own messages with a byte position; callers get a location instead.
function describeFailure(error: unknown): string {
  return String(error).replace(/^ParseError \(position \d+\): /, '')
}

/**
 * Run a single rule against the start of `source`. Success does not require
 * the whole input to be consumed; whatever is left over comes back as `rest`.
 */
export function runRule<T>(rule: Parser<T>, source: string): RuleResult<T> {
  const result = rule.run(source)

  if (result.isError) {
    return { ok: false, reason: describeFailure(result.error), location: locate(source, result.index) }
  }

  const end = locate(source, result.index)
  return { ok: true, value: result.result, rest: source.slice(end.offset), end }
}

/**
 * Parse a complete Tally program into an Exp AST.
 *
 * @throws ErrSyntax when no alternative matches
 * @throws ErrTrailingInput when a program parses but input is left over
 */
export function parseProgram(source: string): Exp {
  const result = runRule(program, source)

  if (!result.ok) {
    throw ErrSyntax.create({ reason: result.reason, ...result.location })
  }

  if (result.rest !== '') {
    throw ErrTrailingInput.create({ remaining: result.rest, ...result.end })
  }

  return result.value
}
