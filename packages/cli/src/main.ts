import { or } from '@optique/core/constructs'
import { command } from '@optique/core/primitives'
import { message } from '@optique/core/message'
import { run } from '@optique/run'

import { checkCommand, handleCheck } from './commands/check-command.js'
import { handleParse, parseCommand } from './commands/parse-command.js'

const parser = or(
  command('parse', parseCommand, { description: message`Parse a program and print its AST` }),
  command('check', checkCommand, { description: message`Check that a program parses` }),
)

const result = run(parser, {
  programName: 'tally',
  version: '0.1.0',
  description: message`Parser for the Tally query language`,
  help: 'both',
})

switch (result.cmd) {
  case 'parse':
    process.exitCode = handleParse(result)
    break
  case 'check':
    process.exitCode = handleCheck(result)
    break
}
