/**
 * plinth instantiate — Produce a new set of instances of a distribution
 *
 * Runs the distribution's code module, then its initializer (if any) with the
 * given args, and records every produced address under a fresh InstanceId.
 * Either all of that happens or none of it does.
 */

import { Command } from 'commander';
import { EMPTY_BYTES, formatVersion } from '@plinth/kernel';
import type { Bytes32, Hex } from '@plinth/kernel';
import { openRuntime } from '../runtime.js';
import { t } from '../theme.js';
import { globalOptions, guarded, label, parseBytes32, parseHex, print, printJson } from './support.js';

export function createInstantiateCommand(): Command {
  return new Command('instantiate')
    .description('Instantiate an active distribution')
    .argument('<distributors-id>', 'Id printed by `dist add`', parseBytes32)
    .option('--args <hex>', 'Bytes passed to the module and initializer', parseHex, EMPTY_BYTES)
    .option('--json', 'Output as JSON')
    .action(guarded((distributorsId: Bytes32, options: { args: Hex; json?: boolean }, command: Command) => {
      const rt = openRuntime(globalOptions(command));
      const result = rt.distributor.instantiate({ sender: rt.operator }, distributorsId, options.args);
      rt.save();

      if (options.json === true) {
        printJson({
          instance_id: result.instanceId,
          name: result.name,
          version: formatVersion(result.version),
          instances: result.instances,
        });
        return;
      }
      print(label('instance id') + t.white(String(result.instanceId)));
      print(label('bundle') + t.white(`${result.name} ${formatVersion(result.version)}`));
      for (const instance of result.instances) {
        print(label('instance') + t.text(instance));
      }
    }));
}
