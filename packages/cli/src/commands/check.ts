/**
 * plinth check — Run the admission hooks for a call
 *
 * Answers: would a call from <caller> into <target> be admitted? Both must be
 * live instances sharing an InstanceId of an active distribution. Without
 * --target the caller is checked against itself, i.e. "is this a live
 * instance?". A rejection exits 1 with InvalidInstance(<caller>).
 */

import { Command } from 'commander';
import { guardedCall } from '@plinth/registry';
import type { Address, Hex } from '@plinth/kernel';
import { openRuntime } from '../runtime.js';
import { t } from '../theme.js';
import { globalOptions, guarded, label, parseAddress, parseHex, print } from './support.js';

const DEFAULT_SELECTOR: Hex = '0x00000000';

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Check whether <caller> is admitted to call into an instance')
    .argument('<caller>', 'Address calling into the instance', parseAddress)
    .option('--target <address>', 'Protected instance (defaults to <caller>)', parseAddress)
    .option('--selector <hex>', 'Selector of the guarded function', parseHex, DEFAULT_SELECTOR)
    .action(guarded((caller: Address, options: { target?: Address; selector: Hex }, command: Command) => {
      const rt = openRuntime(globalOptions(command));
      const instance = options.target ?? caller;
      const distributorsId = guardedCall(
        rt.host,
        rt.distributor,
        { instance, caller, selector: options.selector },
        (context) => context,
      );
      print(t.green('admitted'));
      print(label('instance id') + t.white(String(rt.distributor.getInstanceId(caller))));
      print(label('distribution') + t.white(distributorsId));
    }));
}
