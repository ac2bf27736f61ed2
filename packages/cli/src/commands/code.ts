/**
 * plinth code — Deploy first-party programs and manage the CodeIndex
 *
 * Subcommands:
 *   plinth code deploy clone-distribution --name <n> --module-version <x.y.z> --source <address...> [--register]
 *   plinth code deploy metadata-initializer [--register]
 *   plinth code deploy implementation --label <label> [--register]
 *   plinth code register <address>
 *   plinth code resolve <fingerprint>
 *
 * Programs are deployed by the operator. Registration is permissionless.
 */

import { Argument, Command } from 'commander';
import { parseVersion } from '@plinth/kernel';
import type { Address, Bytes32, Program } from '@plinth/kernel';
import { cloneDistribution, implementation } from '@plinth/module-clone-distribution';
import { metadataInitializer } from '@plinth/module-metadata-initializer';
import { openRuntime } from '../runtime.js';
import { t } from '../theme.js';
import { globalOptions, guarded, label, parseAddress, parseAddressList, parseBytes32, print } from './support.js';

const DEPLOYABLE = ['clone-distribution', 'metadata-initializer', 'implementation'] as const;
type Deployable = (typeof DEPLOYABLE)[number];

interface DeployOptions {
  name?: string;
  moduleVersion?: string;
  source?: Address[];
  label?: string;
  register?: boolean;
}

/** Build the program to deploy from its name and options. */
export function buildProgram(kind: Deployable, options: DeployOptions): Program {
  switch (kind) {
    case 'clone-distribution': {
      if (options.name === undefined) throw new Error('clone-distribution requires --name');
      if (options.moduleVersion === undefined) throw new Error('clone-distribution requires --module-version');
      const version = parseVersion(options.moduleVersion);
      if (version === undefined) {
        throw new Error(`Invalid version "${options.moduleVersion}", expected major.minor.patch`);
      }
      return cloneDistribution({ sources: options.source ?? [], name: options.name, version });
    }
    case 'metadata-initializer':
      return metadataInitializer();
    case 'implementation':
      if (options.label === undefined) throw new Error('implementation requires --label');
      return implementation(options.label);
  }
}

function createDeployCommand(): Command {
  return new Command('deploy')
    .description('Deploy a first-party program as the operator')
    .addArgument(new Argument('<program>', 'Program to deploy').choices(DEPLOYABLE))
    .option('--name <name>', 'clone-distribution: bundle name')
    .option('--module-version <x.y.z>', 'clone-distribution: bundle version')
    .option('--source <address...>', 'clone-distribution: implementation(s) to clone', parseAddressList)
    .option('--label <label>', 'implementation: label')
    .option('--register', 'Also register the deployed code in the CodeIndex')
    .action(guarded((kind: Deployable, options: DeployOptions, command: Command) => {
      const rt = openRuntime(globalOptions(command));
      const program = buildProgram(kind, options);
      const address = rt.host.transact(() => {
        const deployed = rt.host.deploy(program, rt.operator);
        if (options.register === true) {
          rt.codeIndex.register(deployed);
        }
        return deployed;
      });
      rt.save();

      print(label('deployed') + t.white(address));
      print(label('fingerprint') + t.text(rt.host.fingerprintAt(address) ?? ''));
      if (options.register === true) {
        print(t.green('registered in CodeIndex'));
      }
    }));
}

function createRegisterCommand(): Command {
  return new Command('register')
    .description('Index the code at <address> under its fingerprint')
    .argument('<address>', 'Container holding the code', parseAddress)
    .action(guarded((container: Address, _options: unknown, command: Command) => {
      const rt = openRuntime(globalOptions(command));
      const fingerprint = rt.codeIndex.register(container);
      rt.save();
      print(label('fingerprint') + t.white(fingerprint));
      print(label('container') + t.text(container));
    }));
}

function createResolveCommand(): Command {
  return new Command('resolve')
    .description('Show the canonical address registered for <fingerprint>')
    .argument('<fingerprint>', 'SHA-256 fingerprint of the code', parseBytes32)
    .action(guarded((fingerprint: Bytes32, _options: unknown, command: Command) => {
      const rt = openRuntime(globalOptions(command));
      const location = rt.codeIndex.resolve(fingerprint);
      print(location === null ? t.muted('(not registered)') : location);
    }));
}

export function createCodeCommand(): Command {
  return new Command('code')
    .description('Deploy programs and manage the CodeIndex')
    .addCommand(createDeployCommand())
    .addCommand(createRegisterCommand())
    .addCommand(createResolveCommand());
}
