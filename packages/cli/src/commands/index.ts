/**
 * commands/index.ts — Commander program, configured and returned without .parse().
 *
 * Imported by:
 *   src/bin/plinth.ts   (the executable)
 *   test/*.test.ts      (fresh program per test, parsed with { from: 'user' })
 */

import { Command } from 'commander'
import { createStatusCommand } from './status.js'
import { createCodeCommand } from './code.js'
import { createDistCommand } from './dist.js'
import { createInstantiateCommand } from './instantiate.js'
import { createCheckCommand } from './check.js'
import { createLogCommand } from './log.js'

export function createProgram(): Command {
  return new Command('plinth')
    .description(
      'Plinth — distribution registry for content-addressed code modules.\n' +
      'State lives in the home directory (--home, PLINTH_HOME, ~/.plinth).',
    )
    .version('0.1.0')
    .option('--home <dir>', 'Home directory holding state and logs')
    .option('--as <address>', 'Operator address used as the sender of every call')
    .addCommand(createStatusCommand())
    .addCommand(createCodeCommand())
    .addCommand(createDistCommand())
    .addCommand(createInstantiateCommand())
    .addCommand(createCheckCommand())
    .addCommand(createLogCommand())
}
