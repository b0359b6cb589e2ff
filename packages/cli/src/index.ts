/**
 * @tally/cli - command handlers behind the `tally` executable (see main.ts).
 */

export { handleParse, parseCommand } from './commands/parse-command.js'
export { handleCheck, checkCommand } from './commands/check-command.js'
export { configFromFlags, runOnSource } from './command-runner.js'
export { CliConfig } from './config.js'
export { AST_FORMATS, exitCodeFor, renderAst, renderDiagnostic } from './output.js'
export type { AstFormat, DiagnosticOptions } from './output.js'
export { readSource, STDIN } from './source.js'
export type { SourceText } from './source.js'
export { CLIBoundary, ErrSourceUnreadable } from './errors/errors.js'
