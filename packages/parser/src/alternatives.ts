import { Parser } from 'arcsecond'

/**
 * Ordered choice: the first alternative that succeeds wins. When all of them
 * fail, the failure reported is the last alternative's, whatever position the
 * earlier ones reached.
 */
export function firstOf<T>(alternatives: readonly [Parser<T>, ...Parser<T>[]]): Parser<T> {
  const [first, ...rest] = alternatives
  return new Parser<T>((state) => {
    let result = first.p(state)
    for (const next of rest) {
      if (!result.isError) break
      result = next.p(state)
    }
    return result
  })
}
