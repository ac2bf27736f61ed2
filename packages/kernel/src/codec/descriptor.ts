/**
 * Plinth Kernel — Program Descriptors
 *
 * First-party programs encode their identity as a descriptor:
 *
 *   utf8("plinth:" + kind + ":" + canonicalJson(config))
 *
 * Canonical JSON sorts object keys at every level, so two equal configs always
 * produce the same bytecode and therefore the same fingerprint, regardless of
 * property insertion order.
 */

import type { LedgerValue } from '../state/ledger.js';
import type { Hex } from '../types/values.js';
import { hexToUtf8, utf8ToHex } from './hex.js';

const PREFIX = 'plinth:';

/** A decoded descriptor. `config` is untrusted until the caller validates it. */
export interface Descriptor {
  readonly kind: string;
  readonly config: unknown;
}

/**
 * Deterministic JSON with sorted keys. `undefined` object members are
 * dropped, matching JSON.stringify.
 */
export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'bigint') return JSON.stringify(value.toString());
  if (typeof value !== 'object') return JSON.stringify(value);
  if (Array.isArray(value)) {
    return '[' + value.map(canonicalJson).join(',') + ']';
  }
  const pairs = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
  return '{' + pairs.join(',') + '}';
}

export function encodeDescriptor(kind: string, config: LedgerValue): Hex {
  if (kind.includes(':')) {
    throw new Error(`Descriptor kind must not contain ':' (got "${kind}")`);
  }
  return utf8ToHex(`${PREFIX}${kind}:${canonicalJson(config)}`);
}

/** Returns undefined for bytecode that is not a well-formed descriptor. */
export function decodeDescriptor(bytecode: Hex): Descriptor | undefined {
  const text = hexToUtf8(bytecode);
  if (!text.startsWith(PREFIX)) return undefined;
  const rest = text.slice(PREFIX.length);
  const split = rest.indexOf(':');
  if (split <= 0) return undefined;
  try {
    return { kind: rest.slice(0, split), config: JSON.parse(rest.slice(split + 1)) as unknown };
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}
