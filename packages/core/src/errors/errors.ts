/**
 * Standard facets and domain-owned error definitions for the core boundary.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 */

import {ErrFacet, TallyError} from "../tally-error.js";

// ============================================================================
// Core Boundary
// ============================================================================

export const Core = TallyError.boundary("core");

// ============================================================================
// Standard Facets
// ============================================================================

/** Something expected was not found */
export const NotFound = ErrFacet.marker("NotFound");

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

/** Internal invariant violated - always a bug */
export const InvariantViolated = ErrFacet.marker("InvariantViolated");

/** Carries a position in some source text (1-based line and column) */
export const HasSourceLocation = ErrFacet.data<{ offset: number; line: number; column: number }>("HasSourceLocation");

// ============================================================================
// Standard Error Definitions
// ============================================================================

/** A value that should be unreachable was observed */
export const ErrUnreachable = Core.define("unreachable", {
  customProps: ErrFacet.props<{ value: string }>(),
  facets: [InvariantViolated],
  message: (d) => `Unreachable case: ${d.value}`,
});
