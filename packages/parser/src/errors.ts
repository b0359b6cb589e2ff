/**
 * Error boundary for the parser.
 */

import { BadInput, ErrFacet, HasSourceLocation, TallyError } from '@tally/core'

const ParserBoundary = TallyError.boundary('parser')

/** No alternative matched: a bad token, an out-of-range integer, or an operator missing its operand. */
export const ErrSyntax = ParserBoundary.define('syntax_error', {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput, HasSourceLocation],
  message: (d) => `Syntax error at line ${d.line}, column ${d.column}: ${d.reason}`,
})

/** A complete program parsed, but more input follows it. */
export const ErrTrailingInput = ParserBoundary.define('trailing_input', {
  customProps: ErrFacet.props<{ remaining: string }>(),
  facets: [BadInput, HasSourceLocation],
  message: (d) => `Unexpected input at line ${d.line}, column ${d.column}: "${excerpt(d.remaining)}"`,
})

function excerpt(text: string): string {
  const firstLine = text.split('\n')[0]
  return firstLine.length > 20 ? `${firstLine.slice(0, 20)}...` : firstLine
}
