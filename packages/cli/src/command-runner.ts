import { message } from '@optique/core/message'
import { printError } from '@optique/run'

import { CliConfig } from './config.js'
import { exitCodeFor, renderDiagnostic } from './output.js'
import type { DiagnosticFlags } from './parsers/standard-opts.js'
import { readSource, type SourceText } from './source.js'

/** Turn command-line flags into overrides; absent flags leave the environment in charge. */
export function configFromFlags(flags: DiagnosticFlags): CliConfig {
  if (flags.color && flags.noColor) {
    printError(message`--color and --no-color cannot be used together.`, { exitCode: 1 })
  }
  return CliConfig.build({
    debug: flags.debug ? true : undefined,
    color: flags.color ? true : flags.noColor ? false : undefined,
  })
}

/**
 * Read the program and hand it to `action`. Any failure is written to stderr
 * as a diagnostic and turned into an exit code.
 */
export function runOnSource(
  file: string | undefined,
  config: CliConfig,
  action: (source: SourceText) => void,
): number {
  let source: SourceText | undefined
  try {
    source = readSource(file)
    action(source)
    return 0
  } catch (err) {
    console.error(renderDiagnostic(err, source?.text, config))
    return exitCodeFor(err)
  }
}
