/**
 * TallyError: errors built from facets and owned by a boundary.
 *
 * A facet is either a marker (`BadInput`) or a data trait (`HasSourceLocation`)
 * whose fields every error carrying it must supply. A boundary names the
 * package that owns an error and prefixes its code: `parser.syntax_error`.
 *
 * Callers discriminate by exact definition (`ErrSyntax.is(err)`) or by facet
 * (`TallyError.has(err, BadInput)`), never by class.
 */

import util from "node-inspect-extracted";
import {Inspect} from "./inspect.js";

// ============================================================================
// Facets
// ============================================================================

export interface ErrMarkerFacet {
  readonly kind: "marker";
  readonly name: string;
}

export interface ErrDataFacet<TData extends object = object> {
  readonly kind: "data";
  readonly name: string;
  /** Type carrier only, never set */
  readonly _data?: TData;
}

export type ErrFacetAny = ErrMarkerFacet | ErrDataFacet;

/** Fields an error adds on top of its facets. Type carrier only. */
export interface ErrProps<T extends object = object> {
  readonly _kind: "props";
  readonly _props?: T;
}

export const ErrFacet = {
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({kind: "marker" as const, name});
  },

  data<TData extends object>(name: string): ErrDataFacet<TData> {
    return Object.freeze({kind: "data" as const, name});
  },

  props<T extends object>(): ErrProps<T> {
    return {_kind: "props"};
  },
};

/** Fields contributed by one facet; markers contribute none. */
export type FacetData<F> = F extends ErrDataFacet<infer D> ? D : {};

type Intersect<U> = (U extends unknown ? (x: U) => void : never) extends (x: infer I) => void ? I : never;

/** Fields required by a list of facets. */
export type FacetsData<Fs extends readonly ErrFacetAny[]> = Intersect<FacetData<Fs[number]> | {}>;

// ============================================================================
// Errors and definitions
// ============================================================================

export interface TallyError<D = object> extends Error {
  readonly code: string;
  /** Owning boundary, the part of `code` before the first "." */
  readonly domain: string;
  readonly data: D;
  readonly facets: ReadonlySet<string>;
  prettyPrint(opts?: {color?: boolean; includeStackTrace?: boolean}): string;
}

export interface ErrorDef<D> {
  readonly code: string;
  create(data: D, cause?: unknown): TallyError<D>;
  is(err: unknown): err is TallyError<D>;
  /** Run `fn`; anything it throws becomes the cause of a new error of this kind. */
  wrap<T>(data: D, fn: () => T): T;
}

export interface ErrorBoundary {
  readonly domain: string;
  define<const Fs extends readonly ErrFacetAny[], P extends object = {}>(
    code: string,
    opts: {customProps?: ErrProps<P>; facets: Fs; message: (data: FacetsData<Fs> & P) => string},
  ): ErrorDef<FacetsData<Fs> & P>;
}

class TallyErrorImpl<D> extends Error implements TallyError<D> {
  readonly code: string;
  readonly domain: string;
  readonly data: D;
  readonly facets: ReadonlySet<string>;

  static {
    Inspect(this, (self, opts) => self.prettyPrint({color: opts.colors === true, includeStackTrace: true}));
  }

  constructor(code: string, domain: string, facets: ReadonlySet<string>, message: string, data: D, cause: unknown) {
    super(message, cause === undefined ? undefined : {cause});
    this.name = "TallyError";
    this.code = code;
    this.domain = domain;
    this.data = data;
    this.facets = facets;
  }

  prettyPrint(opts?: {color?: boolean; includeStackTrace?: boolean}): string {
    const color = opts?.color ?? false;
    const red = color ? "\x1b[31m" : "";
    const dim = color ? "\x1b[2m" : "";
    const reset = color ? "\x1b[0m" : "";

    const lines = [`${red}${this.code}${reset}: ${this.message}`];

    if (typeof this.data === "object" && this.data !== null && Object.keys(this.data).length > 0) {
      const shown = util.inspect(this.data, {colors: color, breakLength: Infinity});
      lines.push(`  ${dim}data:${reset} ${shown}`);
    }

    for (const cause of causeChain(this.cause)) {
      lines.push(`  ${dim}caused by:${reset} ${describe(cause)}`);
    }

    if (opts?.includeStackTrace) {
      const frames = (this.stack ?? "").split("\n").filter((line) => /^\s+at /.test(line));
      if (frames.length > 0) {
        lines.push(`  ${dim}stack:${reset}`);
        for (const frame of frames) lines.push(`${dim}    ${frame.trim()}${reset}`);
      }
    }

    return lines.join("\n");
  }
}

/** Follow `cause` links; stops at a repeat. */
function causeChain(first: unknown): unknown[] {
  const chain: unknown[] = [];
  let current = first;
  while (current !== undefined && !chain.includes(current)) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

function describe(cause: unknown): string {
  if (cause instanceof TallyErrorImpl) return `${cause.code}: ${cause.message}`;
  if (cause instanceof Error) return `${cause.name}: ${cause.message}`;
  return String(cause);
}

function defineError<D>(
  code: string,
  domain: string,
  facets: readonly ErrFacetAny[],
  message: (data: D) => string,
): ErrorDef<D> {
  const names: ReadonlySet<string> = Object.freeze(new Set(facets.map((f) => f.name)));

  function create(data: D, cause?: unknown): TallyError<D> {
    const err = new TallyErrorImpl(code, domain, names, message(data), data, cause);
    Error.captureStackTrace(err, create);
    return err;
  }

  return Object.freeze({
    code,
    create,
    is(err: unknown): err is TallyError<D> {
      return err instanceof TallyErrorImpl && err.code === code;
    },
    wrap<T>(data: D, fn: () => T): T {
      try {
        return fn();
      } catch (thrown) {
        throw create(data, thrown);
      }
    },
  });
}

// ============================================================================
// TallyError companion
// ============================================================================

export const TallyError = {
  /** An error domain. Codes defined through it read `${domain}.${code}`. */
  boundary(domain: string): ErrorBoundary {
    return {
      domain,
      define<const Fs extends readonly ErrFacetAny[], P extends object = {}>(
        code: string,
        opts: {customProps?: ErrProps<P>; facets: Fs; message: (data: FacetsData<Fs> & P) => string},
      ): ErrorDef<FacetsData<Fs> & P> {
        return defineError(`${domain}.${code}`, domain, opts.facets, opts.message);
      },
    };
  },

  isTallyError(err: unknown): err is TallyError {
    return err instanceof TallyErrorImpl;
  },

  /** True when `err` is a TallyError carrying `facet`; narrows `data` for data facets. */
  has<F extends ErrFacetAny>(err: unknown, facet: F): err is TallyError<FacetData<F>> {
    return err instanceof TallyErrorImpl && err.facets.has(facet.name);
  },
};
