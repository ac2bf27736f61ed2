/**
 * plinth dist — Manage the Distributor's distributions
 *
 * Subcommands:
 *   plinth dist add <fingerprint> [--initializer <address>]
 *   plinth dist remove <distributors-id>
 *   plinth dist list [--json]
 *   plinth dist transfer-ownership <address>
 *
 * add, remove and transfer-ownership are owner-only: they fail with
 * OwnableUnauthorizedAccount unless --as (or PLINTH_OPERATOR) names the owner.
 */

import { Command } from 'commander';
import type { Address, Bytes32 } from '@plinth/kernel';
import { openRuntime } from '../runtime.js';
import type { Runtime } from '../runtime.js';
import { t } from '../theme.js';
import { globalOptions, guarded, label, parseAddress, parseBytes32, print, printJson } from './support.js';

interface DistributionRow {
  readonly distributors_id: Bytes32;
  readonly id: Bytes32;
  readonly initializer: Address | null;
  readonly location: Address | null;
}

export function listDistributions(rt: Runtime): DistributionRow[] {
  const rows: DistributionRow[] = [];
  for (const distributorsId of rt.distributor.getDistributions()) {
    const component = rt.distributor.getDistributionComponent(distributorsId);
    if (component === null) continue;
    rows.push({
      distributors_id: distributorsId,
      id: component.id,
      initializer: component.initializer,
      location: rt.codeIndex.resolve(component.id),
    });
  }
  return rows;
}

function createAddCommand(): Command {
  return new Command('add')
    .description('Register a code fingerprint, optionally with an initializer, as a distribution')
    .argument('<fingerprint>', 'Fingerprint registered in the CodeIndex', parseBytes32)
    .option('--initializer <address>', 'Initializer program to run on new instances', parseAddress)
    .action(guarded((fingerprint: Bytes32, options: { initializer?: Address }, command: Command) => {
      const rt = openRuntime(globalOptions(command));
      const distributorsId = rt.distributor.addDistribution(
        { sender: rt.operator },
        fingerprint,
        options.initializer ?? null,
      );
      rt.save();
      print(label('distribution') + t.white(distributorsId));
    }));
}

function createRemoveCommand(): Command {
  return new Command('remove')
    .description('Deactivate a distribution; its instances stop passing admission checks')
    .argument('<distributors-id>', 'Id printed by `dist add`', parseBytes32)
    .action(guarded((distributorsId: Bytes32, _options: unknown, command: Command) => {
      const rt = openRuntime(globalOptions(command));
      rt.distributor.removeDistribution({ sender: rt.operator }, distributorsId);
      rt.save();
      print(label('removed') + t.white(distributorsId));
    }));
}

function createListCommand(): Command {
  return new Command('list')
    .description('List active distributions')
    .option('--json', 'Output as JSON')
    .action(guarded((options: { json?: boolean }, command: Command) => {
      const rows = listDistributions(openRuntime(globalOptions(command)));
      if (options.json === true) {
        printJson(rows);
        return;
      }
      if (rows.length === 0) {
        print(t.muted('(no active distributions)'));
        return;
      }
      for (const row of rows) {
        print(t.white(row.distributors_id));
        print('  ' + label('code', 14) + t.text(row.id));
        print('  ' + label('location', 14) + t.text(row.location ?? '(not registered)'));
        print('  ' + label('initializer', 14) + t.text(row.initializer ?? '(none)'));
      }
    }));
}

function createTransferOwnershipCommand(): Command {
  return new Command('transfer-ownership')
    .description('Hand the Distributor to a new owner')
    .argument('<address>', 'New owner', parseAddress)
    .action(guarded((newOwner: Address, _options: unknown, command: Command) => {
      const rt = openRuntime(globalOptions(command));
      rt.distributor.transferOwnership({ sender: rt.operator }, newOwner);
      rt.save();
      print(label('owner') + t.white(newOwner));
    }));
}

export function createDistCommand(): Command {
  return new Command('dist')
    .description('Add, remove and list distributions')
    .addCommand(createAddCommand())
    .addCommand(createRemoveCommand())
    .addCommand(createListCommand())
    .addCommand(createTransferOwnershipCommand());
}
