/**
 * CLI settings resolved from flags, then the environment, then the terminal.
 */

export interface CliConfig {
  /** Print full error chains with stack traces. */
  readonly debug: boolean;
  /** Colour diagnostics with ANSI escapes. */
  readonly color: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

function flag(value: string | undefined): boolean | undefined {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false") return false;
  return undefined;
}

export const CliConfig = {
  build(
    overrides: Partial<CliConfig> = {},
    env: Env = process.env,
    isTTY: boolean = process.stderr.isTTY === true,
  ): CliConfig {
    const debug = overrides.debug ?? flag(env.TALLY_DEBUG) ?? false;

    const noColor = env.NO_COLOR !== undefined && env.NO_COLOR !== "" ? false : undefined;
    const color = overrides.color ?? flag(env.TALLY_COLOR) ?? noColor ?? isTTY;

    return { debug, color };
  },
};
