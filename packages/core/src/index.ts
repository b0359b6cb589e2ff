/**
 * @tally/core - Error system shared by the Tally packages
 */

export {Inspect, inspect} from "./inspect.js";

export {TallyError, ErrFacet} from "./tally-error.js";
export type {
  ErrMarkerFacet,
  ErrDataFacet,
  ErrFacetAny,
  ErrProps,
  ErrorDef,
  ErrorBoundary,
  FacetData,
  FacetsData,
} from "./tally-error.js";

export {
  Core,
  NotFound,
  BadInput,
  InvariantViolated,
  HasSourceLocation,
  ErrUnreachable,
} from "./errors/errors.js";
