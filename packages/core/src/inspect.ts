import type {InspectOptions} from "node-inspect-extracted";

/** Key Node's inspector (console.log, the REPL, test diffs) looks up on a value. */
export const inspect: unique symbol = Symbol.for("nodejs.util.inspect.custom");

/**
 * Make Node render instances of `cls` with `render`.
 * Call from a `static {}` block so the hook lands on the prototype once.
 */
export function Inspect<T>(cls: {prototype: T}, render: (self: T, options: InspectOptions) => string): void {
  Object.defineProperty(cls.prototype, inspect, {
    configurable: true,
    value(this: T, _depth: number, options: InspectOptions): string {
      return render(this, options);
    },
  });
}
