import { optional, withDefault } from '@optique/core/modifiers'
import { argument, option } from '@optique/core/primitives'
import { choice, string } from '@optique/core/valueparser'
import { message } from '@optique/core/message'

import { AST_FORMATS } from '../output.js'

// Program file, or stdin when omitted or "-"
export const fileArgument = optional(argument(string({ metavar: 'FILE' }), {
  description: message`Program to read (stdin when omitted or -)`,
}))

export const formatOption = withDefault(option('-f', '--format', choice(AST_FORMATS), {
  description: message`AST output format (json, compact)`,
}), 'json' as const)

// Diagnostic flags shared by every command
export const diagnosticOptions = {
  debug: option('--debug', { description: message`Print the full error chain with stack trace` }),
  color: option('--color', { description: message`Force coloured diagnostics` }),
  noColor: option('--no-color', { description: message`Disable coloured diagnostics` }),
}

export interface DiagnosticFlags {
  readonly debug: boolean
  readonly color: boolean
  readonly noColor: boolean
}
