import { object } from '@optique/core/constructs'
import { constant } from '@optique/core/primitives'
import { parseProgram } from '@tally/parser'

import { configFromFlags, runOnSource } from '../command-runner.js'
import { renderAst, type AstFormat } from '../output.js'
import { diagnosticOptions, fileArgument, formatOption, type DiagnosticFlags } from '../parsers/standard-opts.js'

export const parseCommand = object({
  cmd: constant('parse' as const),
  file: fileArgument,
  format: formatOption,
  ...diagnosticOptions,
})

export function handleParse(opts: DiagnosticFlags & { readonly file?: string; readonly format: AstFormat }): number {
  return runOnSource(opts.file, configFromFlags(opts), (source) => {
    console.log(renderAst(parseProgram(source.text), opts.format))
  })
}
