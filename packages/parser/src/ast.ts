/**
 * AST types for parsed Tally programs.
 *
 * The parser produces this tree and never touches it again; downstream
 * consumers (an evaluator, the CLI's JSON output) only read it.
 */

/** An identifier reference. */
export type Var = {
  readonly type: 'var'
  readonly name: string
}

/** A 64-bit signed integer literal. */
export type Int = {
  readonly type: 'int'
  readonly value: bigint
}

export type Bool = {
  readonly type: 'bool'
  readonly value: boolean
}

/** A quoted string literal, taken verbatim (there are no escapes). */
export type Str = {
  readonly type: 'str'
  readonly value: string
}

/** `binder = bound body`: evaluate `bound`, bind it, continue with `body`. */
export type Let = {
  readonly type: 'let'
  readonly binder: Var
  readonly bound: Exp
  readonly body: Exp
}

/** `a, b <- source`: project the listed columns, in source order. */
export type Select = {
  readonly type: 'select'
  readonly vars: readonly [Var, ...Var[]]
  readonly source: Exp
}

/** `source ? predicate` */
export type Where = {
  readonly type: 'where'
  readonly source: Exp
  readonly predicate: Exp
}

/** `key: value`, one field of a row. */
export type Cell = {
  readonly type: 'cell'
  readonly key: Var
  readonly value: Exp
}

export type Not = {
  readonly type: 'not'
  readonly operand: Exp
}

/** Discriminants of the variants that carry a plain `left` and `right`. */
export type BinaryType =
  | 'union'
  | 'difference'
  | 'product'
  | 'table'
  | 'row'
  | 'equals'
  | 'or'
  | 'and'

/** Every two-operand variant: set operators, table/row concatenation, boolean operators. */
export type Binary<K extends BinaryType = BinaryType> = {
  readonly type: K
  readonly left: Exp
  readonly right: Exp
}

export type Union = Binary<'union'>
export type Difference = Binary<'difference'>
export type Product = Binary<'product'>
export type Table = Binary<'table'>
export type Row = Binary<'row'>
export type Equals = Binary<'equals'>
export type Or = Binary<'or'>
export type And = Binary<'and'>

/** The full expression AST. */
export type Exp =
  | Var
  | Int
  | Bool
  | Str
  | Let
  | Select
  | Where
  | Union
  | Difference
  | Product
  | Table
  | Row
  | Cell
  | Equals
  | Or
  | And
  | Not

/** Type + companion for Exp: one constructor per variant. */
export const Exp = {
  var(name: string): Var {
    return { type: 'var', name }
  },
  int(value: bigint): Int {
    return { type: 'int', value }
  },
  bool(value: boolean): Bool {
    return { type: 'bool', value }
  },
  str(value: string): Str {
    return { type: 'str', value }
  },
  let(binder: Var, bound: Exp, body: Exp): Let {
    return { type: 'let', binder, bound, body }
  },
  select(vars: readonly [Var, ...Var[]], source: Exp): Select {
    return { type: 'select', vars, source }
  },
  where(source: Exp, predicate: Exp): Where {
    return { type: 'where', source, predicate }
  },
  union(left: Exp, right: Exp): Union {
    return { type: 'union', left, right }
  },
  difference(left: Exp, right: Exp): Difference {
    return { type: 'difference', left, right }
  },
  product(left: Exp, right: Exp): Product {
    return { type: 'product', left, right }
  },
  table(left: Exp, right: Exp): Table {
    return { type: 'table', left, right }
  },
  row(left: Exp, right: Exp): Row {
    return { type: 'row', left, right }
  },
  cell(key: Var, value: Exp): Cell {
    return { type: 'cell', key, value }
  },
  equals(left: Exp, right: Exp): Equals {
    return { type: 'equals', left, right }
  },
  or(left: Exp, right: Exp): Or {
    return { type: 'or', left, right }
  },
  and(left: Exp, right: Exp): And {
    return { type: 'and', left, right }
  },
  not(operand: Exp): Not {
    return { type: 'not', operand }
  },
}
