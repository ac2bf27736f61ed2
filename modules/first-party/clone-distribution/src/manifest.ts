/**
 * Plinth First-Party Clone Distribution — Program Descriptors
 *
 * Bytecode layouts for the three programs this module deploys:
 *
 * - CloneDistribution  descriptor carrying { sources, name, version }
 * - Implementation     descriptor carrying { label }; the code instances proxy to
 * - MinimalProxy       the 45-byte EIP-1167 clone of one implementation:
 *
 *     363d3d373d3d3d363d73 <20-byte implementation> 5af43d82803e903d91602b57fd5bf3
 *
 * Each layout has a decoder that returns undefined for foreign bytecode, so a
 * program catalog can rebuild these programs from a persisted ledger.
 */

import {
  asAddress,
  decodeDescriptor,
  encodeDescriptor,
  formatVersion,
  isAddress,
  parseVersion,
} from '@plinth/kernel';
import type { Address, Hex, LedgerValue, Version } from '@plinth/kernel';

export const CLONE_DISTRIBUTION_KIND = 'CloneDistribution';
export const IMPLEMENTATION_KIND = 'Implementation';

const PROXY_PREFIX = '363d3d373d3d3d363d73';
const PROXY_SUFFIX = '5af43d82803e903d91602b57fd5bf3';
const PROXY_PATTERN = new RegExp(`^0x${PROXY_PREFIX}([0-9a-f]{40})${PROXY_SUFFIX}$`);

export interface CloneDistributionConfig {
  /** Implementations to clone, one instance each, in order. */
  readonly sources: ReadonlyArray<Address>;
  readonly name: string;
  readonly version: Version;
}

export interface ImplementationConfig {
  readonly label: string;
}

// ---------------------------------------------------------------------------
// MinimalProxy
// ---------------------------------------------------------------------------

export function minimalProxyBytecode(implementation: Address): Hex {
  return `0x${PROXY_PREFIX}${implementation.slice(2)}${PROXY_SUFFIX}`;
}

/** Implementation address a minimal proxy forwards to, or undefined. */
export function proxyImplementation(bytecode: Hex): Address | undefined {
  const match = PROXY_PATTERN.exec(bytecode);
  const body = match?.[1];
  return body === undefined ? undefined : asAddress(`0x${body}`);
}

// ---------------------------------------------------------------------------
// CloneDistribution
// ---------------------------------------------------------------------------

export function cloneDistributionBytecode(config: CloneDistributionConfig): Hex {
  const encoded: LedgerValue = {
    sources: [...config.sources],
    name: config.name,
    version: formatVersion(config.version),
  };
  return encodeDescriptor(CLONE_DISTRIBUTION_KIND, encoded);
}

export function decodeCloneDistribution(bytecode: Hex): CloneDistributionConfig | undefined {
  const descriptor = decodeDescriptor(bytecode);
  if (descriptor?.kind !== CLONE_DISTRIBUTION_KIND) return undefined;
  const { config } = descriptor;
  if (typeof config !== 'object' || config === null || Array.isArray(config)) return undefined;
  if (!('sources' in config && 'name' in config && 'version' in config)) return undefined;
  const { sources, name, version } = config;
  if (!Array.isArray(sources) || typeof name !== 'string' || typeof version !== 'string') return undefined;
  const parsedSources: Address[] = [];
  for (const source of sources) {
    if (!isAddress(source)) return undefined;
    parsedSources.push(source);
  }
  const parsedVersion = parseVersion(version);
  if (parsedVersion === undefined) return undefined;
  return { sources: parsedSources, name, version: parsedVersion };
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function implementationBytecode(config: ImplementationConfig): Hex {
  return encodeDescriptor(IMPLEMENTATION_KIND, { label: config.label });
}

export function decodeImplementation(bytecode: Hex): ImplementationConfig | undefined {
  const descriptor = decodeDescriptor(bytecode);
  if (descriptor?.kind !== IMPLEMENTATION_KIND) return undefined;
  const { config } = descriptor;
  if (typeof config !== 'object' || config === null || !('label' in config)) return undefined;
  const { label } = config;
  return typeof label === 'string' ? { label } : undefined;
}
