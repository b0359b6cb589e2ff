import { object } from '@optique/core/constructs'
import { constant } from '@optique/core/primitives'
import { parseProgram } from '@tally/parser'

import { configFromFlags, runOnSource } from '../command-runner.js'
import { diagnosticOptions, fileArgument, type DiagnosticFlags } from '../parsers/standard-opts.js'

export const checkCommand = object({
  cmd: constant('check' as const),
  file: fileArgument,
  ...diagnosticOptions,
})

export function handleCheck(opts: DiagnosticFlags & { readonly file?: string }): number {
  return runOnSource(opts.file, configFromFlags(opts), (source) => {
    parseProgram(source.text)
    console.log('ok')
  })
}
