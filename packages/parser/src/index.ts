/**
 * @tally/parser - Parse Tally programs into an Exp AST.
 *
 * @example
 * ```ts
 * import { parseProgram } from '@tally/parser'
 *
 * const ast = parseProgram(`
 *   Staff = name: 'Alice', id: 1; name: 'Bob', id: 2
 *   name <- Staff ? id == 2
 * `)
 * ```
 */

export { Exp } from './ast.js'
export type {
  And,
  Binary,
  BinaryType,
  Bool,
  Cell,
  Difference,
  Equals,
  Int,
  Let,
  Not,
  Or,
  Product,
  Row,
  Select,
  Str,
  Table,
  Union,
  Var,
  Where,
} from './ast.js'

export { grammar, parseProgram, runRule } from './grammar.js'
export type { RuleName, RuleResult } from './grammar.js'
export { ErrSyntax, ErrTrailingInput } from './errors.js'
export { lineAt, locate } from './position.js'
export type { SourceLocation } from './position.js'
export * as lexical from './lexical.js'
