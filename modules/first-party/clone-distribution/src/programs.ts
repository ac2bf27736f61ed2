/**
 * Plinth First-Party Clone Distribution — Programs
 *
 * A CloneDistribution is a code module that, on every instantiation, deploys
 * one minimal proxy per configured source implementation. Instances are
 * cheap: the proxies share the implementation's code and differ only in
 * address (and therefore in storage).
 *
 * The module ignores instantiation args; configuring instances is the job of
 * an initializer registered alongside it.
 */

import type { Address, CodeModule, ContractProgram, Program, ProgramResolver } from '@plinth/kernel';
import type { CloneDistributionConfig } from './manifest.js';
import {
  cloneDistributionBytecode,
  decodeCloneDistribution,
  decodeImplementation,
  implementationBytecode,
  minimalProxyBytecode,
  proxyImplementation,
} from './manifest.js';

export function cloneDistribution(config: CloneDistributionConfig): CodeModule {
  if (config.sources.length === 0) {
    throw new Error('CloneDistribution requires at least one source implementation');
  }
  return {
    kind: 'module',
    bytecode: cloneDistributionBytecode(config),
    instantiate(ctx) {
      const instances = config.sources.map((source) => ctx.deploy(minimalProxy(source)));
      return { instances, name: config.name, version: config.version };
    },
  };
}

export function minimalProxy(implementation: Address): ContractProgram {
  return { kind: 'contract', bytecode: minimalProxyBytecode(implementation) };
}

/** A labelled implementation contract for proxies to point at. */
export function implementation(label: string): ContractProgram {
  return { kind: 'contract', bytecode: implementationBytecode({ label }) };
}

/** Rebuilds every program this module can deploy from its bytecode. */
export const cloneDistributionResolver: ProgramResolver = {
  resolve(bytecode): Program | undefined {
    const distribution = decodeCloneDistribution(bytecode);
    if (distribution !== undefined && distribution.sources.length > 0) {
      return cloneDistribution(distribution);
    }
    const target = proxyImplementation(bytecode);
    if (target !== undefined) return minimalProxy(target);
    const impl = decodeImplementation(bytecode);
    if (impl !== undefined) return implementation(impl.label);
    return undefined;
  },
};
