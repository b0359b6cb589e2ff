import { describe, test, expect } from 'vitest'
import { str, type Parser } from 'arcsecond'
import { Exp } from '../ast.js'
import { grammar, runRule } from '../grammar.js'

const a = Exp.var('a')
const b = Exp.var('b')
const c = Exp.var('c')
const x = Exp.var('x')
const y = Exp.var('y')

/** Run a rule and require it to consume the whole input. */
function parseAll(rule: Parser<Exp>, source: string): Exp {
  const result = runRule(rule, source)
  if (!result.ok) throw new Error(`parse failed: ${result.reason}`)
  expect(result.rest).toBe('')
  return result.value
}

describe('right associativity', () => {
  test('difference', () => {
    expect(parseAll(grammar.difference, 'a - b - c')).toEqual(Exp.difference(a, Exp.difference(b, c)))
  })

  test('union', () => {
    expect(parseAll(grammar.union, 'a + b + c')).toEqual(Exp.union(a, Exp.union(b, c)))
  })

  test('product', () => {
    expect(parseAll(grammar.product, 'a * b * c')).toEqual(Exp.product(a, Exp.product(b, c)))
  })

  test('or and and', () => {
    expect(parseAll(grammar.or, 'a | b | c')).toEqual(Exp.or(a, Exp.or(b, c)))
    expect(parseAll(grammar.and, 'a & b & c')).toEqual(Exp.and(a, Exp.and(b, c)))
  })

  test('where', () => {
    expect(parseAll(grammar.where, 'a ? b ? c')).toEqual(Exp.where(a, Exp.where(b, c)))
  })

  test('cell', () => {
    expect(parseAll(grammar.cell, 'a: b: c')).toEqual(Exp.cell(a, Exp.cell(b, c)))
  })
})

describe('precedence', () => {
  test('difference binds tighter than union', () => {
    expect(parseAll(grammar.union, 'a + b - c')).toEqual(Exp.union(a, Exp.difference(b, c)))
    expect(parseAll(grammar.union, 'a - b + c')).toEqual(Exp.union(Exp.difference(a, b), c))
  })

  test('or binds tighter than equals', () => {
    expect(parseAll(grammar.equals, 'x == 1 | y')).toEqual(Exp.equals(x, Exp.or(Exp.int(1n), y)))
  })

  test('and binds tighter than or', () => {
    expect(parseAll(grammar.or, 'a & b | c')).toEqual(Exp.or(Exp.and(a, b), c))
  })

  test('minus right after a name is an operator', () => {
    expect(parseAll(grammar.difference, 'a-1')).toEqual(Exp.difference(a, Exp.int(1n)))
  })

  test('not nests', () => {
    expect(parseAll(grammar.not, '!! a')).toEqual(Exp.not(Exp.not(a)))
  })

  test('where over a comparison', () => {
    expect(parseAll(grammar.where, 't ? x == 1')).toEqual(Exp.where(Exp.var('t'), Exp.equals(x, Exp.int(1n))))
  })
})

describe('tables', () => {
  test('row of cells', () => {
    expect(parseAll(grammar.row, 'a: 1, b: 2')).toEqual(
      Exp.row(Exp.cell(a, Exp.int(1n)), Exp.cell(b, Exp.int(2n)))
    )
  })

  test('table of rows', () => {
    expect(parseAll(grammar.table, 'a: 1; b: 2')).toEqual(
      Exp.table(Exp.cell(a, Exp.int(1n)), Exp.cell(b, Exp.int(2n)))
    )
  })

  const staff = Exp.table(
    Exp.row(Exp.cell(Exp.var('name'), Exp.str('Alice')), Exp.cell(Exp.var('id'), Exp.int(1n))),
    Exp.row(Exp.cell(Exp.var('name'), Exp.str('Bob')), Exp.cell(Exp.var('id'), Exp.int(2n))),
  )

  test('stripped and spaced forms agree', () => {
    expect(parseAll(grammar.table, "name:'Alice',id:1;name:'Bob',id:2")).toEqual(staff)
    expect(parseAll(grammar.table, "name: 'Alice', id: 1; -- first\n  name: 'Bob', /* second */ id: 2")).toEqual(staff)
  })
})

describe('select', () => {
  test('one variable', () => {
    expect(parseAll(grammar.select, 'x <- t')).toEqual(Exp.select([x], Exp.var('t')))
  })

  test('two variables in order', () => {
    expect(parseAll(grammar.select, 'x, y <- t')).toEqual(Exp.select([x, y], Exp.var('t')))
  })

  test('three variables in order', () => {
    const result = parseAll(grammar.select, 'a,b , c <- t')
    expect(result).toEqual(Exp.select([a, b, c], Exp.var('t')))
  })

  test('without an arrow a comma list is a row', () => {
    expect(parseAll(grammar.select, 'a, b')).toEqual(Exp.row(a, b))
  })
})

describe('let', () => {
  test('binds and continues', () => {
    expect(parseAll(grammar.let, 'x = 1 x')).toEqual(Exp.let(x, Exp.int(1n), x))
  })

  test('body may be another let', () => {
    expect(parseAll(grammar.let, 'x = 1 y = x y')).toEqual(Exp.let(x, Exp.int(1n), Exp.let(y, x, y)))
  })
})

describe('atom', () => {
  test('parentheses hold a whole program', () => {
    expect(parseAll(grammar.atom, '( x = 1 x )')).toEqual(Exp.let(x, Exp.int(1n), x))
  })

  test('parentheses override precedence', () => {
    expect(parseAll(grammar.difference, '(a - b) - c')).toEqual(Exp.difference(Exp.difference(a, b), c))
  })

  test('a failed parenthesised expression reports the last alternative', () => {
    expect(runRule(grammar.program, '(x ==)')).toEqual({
      ok: false,
      reason: 'Expected identifier',
      location: { offset: 0, line: 1, column: 1 },
    })
  })

  test('operators are not consumed by a bare atom', () => {
    expect(runRule(grammar.atom, 'a + b')).toMatchObject({ ok: true, value: a, rest: ' + b' })
  })
})

describe('runRule', () => {
  test('failure reasons carry no byte position', () => {
    const result = runRule(str('=='), 'x')
    if (result.ok) throw new Error('expected a failure')
    expect(result.reason).toMatch(/^Expecting string '=='/)
    expect(result.location).toEqual({ offset: 0, line: 1, column: 1 })
  })
})
