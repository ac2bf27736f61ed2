/**
 * plinth status — Show the state of the current home
 *
 * Displays:
 * - Home directory and acting operator
 * - CodeIndex and Distributor addresses, and the Distributor's owner
 * - Active distributions, instances recorded, and committed events
 */

import { Command } from 'commander';
import { openRuntime } from '../runtime.js';
import { t } from '../theme.js';
import { globalOptions, guarded, label, print, printJson } from './support.js';

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show the home directory, genesis addresses, owner and registry counts')
    .option('--json', 'Output as JSON')
    .action(guarded((options: { json?: boolean }, command: Command) => {
      const rt = openRuntime(globalOptions(command));
      const distributions = rt.distributor.getDistributions();
      const status = {
        home: rt.home,
        operator: rt.operator,
        owner: rt.distributor.owner(),
        code_index: rt.codeIndex.address,
        distributor: rt.distributor.address,
        distributions,
        num_instances: rt.distributor.numInstances(),
        events: rt.host.logs().length,
      };

      if (options.json === true) {
        printJson(status);
        return;
      }

      print(t.muted('─── Plinth Status ───────────────────────────────────'));
      if (rt.genesis) {
        print(t.amber('initialized new home'));
      }
      print(label('home') + t.white(status.home));
      print(label('operator') + t.white(status.operator));
      print(label('owner') + t.white(status.owner));
      print(label('code index') + t.text(status.code_index));
      print(label('distributor') + t.text(status.distributor));
      print(label('distributions') + t.white(`${distributions.length} active`));
      print(label('instances') + t.white(String(status.num_instances)));
      print(label('events') + t.white(String(status.events)));
      print(t.muted('─────────────────────────────────────────────────────'));
    }));
}
