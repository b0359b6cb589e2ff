/**
 * Operator builders used to assemble every precedence layer.
 *
 * Each builder tries its full operator form and, if any part of that form
 * fails, falls back to `next` from the position it started at; a failure of
 * both reports `next`'s error. Nothing is
 * retried with a shorter left operand: where a chain ends is decided purely
 * by how far the right-hand side can extend.
 */

import { coroutine, possibly, str, succeedWith, type Parser } from 'arcsecond'

import { firstOf } from './alternatives.js'
import { junk } from './lexical.js'

/** A token surrounded by junk on both sides, i.e. `junk op junk`. */
function padded(op: string): Parser<string> {
  const token = op === '' ? succeedWith('') : str(op)
  return coroutine<string>((run) => {
    run(junk)
    const matched = run(token)
    run(junk)
    return matched
  })
}

/** `op junk operand`, else `next`. */
export function prefix<R, T>(
  op: string,
  operand: Parser<R>,
  build: (operand: R) => T,
  next: Parser<T>,
): Parser<T> {
  const token = str(op)
  return firstOf([
    coroutine<T>((run) => {
      run(token)
      run(junk)
      return build(run(operand))
    }),
    next,
  ])
}

/** `left junk op junk right`, else `next`. */
export function infix<L, R, T>(
  left: Parser<L>,
  op: string,
  right: Parser<R>,
  build: (left: L, right: R) => T,
  next: Parser<T>,
): Parser<T> {
  const operator = padded(op)
  return firstOf([
    coroutine<T>((run) => {
      const l = run(left)
      run(operator)
      return build(l, run(right))
    }),
    next,
  ])
}

/**
 * `operand junk op junk self`, else `operand`: the common layer shape where
 * the fallthrough is the operand rule itself.
 *
 * Equivalent to `infix(operand, op, self, build, operand)`, but the operand
 * is parsed once and reused when no operator follows it. Without this every
 * layer would parse its operand twice and the cascade would do exponential
 * work per atom.
 */
export function infixChain<T>(
  operand: Parser<T>,
  op: string,
  self: Parser<T>,
  build: (left: T, right: T) => T,
): Parser<T> {
  const operator = padded(op)
  const tail = coroutine<T>((run) => {
    run(operator)
    return run(self)
  })
  return coroutine<T>((run) => {
    const l = run(operand)
    const r = run(possibly(tail))
    return r === null ? l : build(l, r)
  })
}

/**
 * `left junk opLeft junk middle junk opRight junk right`, else `next`.
 * `opRight` may be empty, in which case nothing separates middle from right.
 */
export function ternary<L, M, R, T>(
  left: Parser<L>,
  opLeft: string,
  middle: Parser<M>,
  opRight: string,
  right: Parser<R>,
  build: (left: L, middle: M, right: R) => T,
  next: Parser<T>,
): Parser<T> {
  const first = padded(opLeft)
  const second = padded(opRight)
  return firstOf([
    coroutine<T>((run) => {
      const l = run(left)
      run(first)
      const m = run(middle)
      run(second)
      return build(l, m, run(right))
    }),
    next,
  ])
}
