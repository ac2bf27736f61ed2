/**
 * Shared fixtures for registry tests: a host with a CodeIndex, a Distributor,
 * and small in-memory programs whose behaviour each test controls.
 */

import { ExecutionHost, asAddress, encodeDescriptor } from '@plinth/kernel';
import type {
  Address,
  CodeModule,
  ExecutionContext,
  Fingerprint,
  Hex,
  Initializer,
} from '@plinth/kernel';
import { deployCodeIndex, deployDistributor } from '../src/index.js';
import type { CodeIndex, Distributor } from '../src/index.js';

export const OPERATOR = asAddress('0x' + 'a1'.repeat(20));
export const STRANGER = asAddress('0x' + 'b2'.repeat(20));
export const SELECTOR: Hex = '0x12345678';

export interface ModuleOptions {
  /** Instances deployed per call. Defaults to 1. */
  readonly count?: number | undefined;
  /** Runs before the module deploys anything. */
  readonly before?: ((ctx: ExecutionContext) => void) | undefined;
  /** Replaces the deployed list entirely. */
  readonly instances?: ((ctx: ExecutionContext) => ReadonlyArray<Address>) | undefined;
}

export function testModule(label: string, options: ModuleOptions = {}): CodeModule {
  return {
    kind: 'module',
    bytecode: encodeDescriptor('TestModule', { label }),
    instantiate(ctx) {
      options.before?.(ctx);
      if (options.instances !== undefined) {
        return { instances: options.instances(ctx), name: label, version: { major: 1, minor: 0, patch: 0 } };
      }
      const instances: Address[] = [];
      for (let i = 0; i < (options.count ?? 1); i++) {
        instances.push(ctx.deploy({ kind: 'contract', bytecode: encodeDescriptor('TestInstance', { label, i }) }));
      }
      return { instances, name: label, version: { major: 1, minor: 0, patch: 0 } };
    },
  };
}

export function testInitializer(
  label: string,
  initialize: (ctx: ExecutionContext, instances: ReadonlyArray<Address>, args: Hex) => void,
): Initializer {
  return { kind: 'initializer', bytecode: encodeDescriptor('TestInitializer', { label }), initialize };
}

export interface Fixture {
  readonly host: ExecutionHost;
  readonly codeIndex: CodeIndex;
  readonly distributor: Distributor;
  readonly moduleAddress: Address;
  readonly moduleId: Fingerprint;
}

/** Host, CodeIndex and open Distributor, with `module` deployed and registered. */
export function setup(module: CodeModule = testModule('alpha')): Fixture {
  const host = new ExecutionHost();
  const codeIndex = deployCodeIndex(host, OPERATOR);
  const distributor = deployDistributor(host, OPERATOR, codeIndex);
  const moduleAddress = host.deploy(module, OPERATOR);
  const moduleId = codeIndex.register(moduleAddress);
  return { host, codeIndex, distributor, moduleAddress, moduleId };
}

/** Deploy and register another module on an existing fixture. */
export function addModule(fixture: Fixture, module: CodeModule): Fingerprint {
  return fixture.codeIndex.register(fixture.host.deploy(module, OPERATOR));
}
