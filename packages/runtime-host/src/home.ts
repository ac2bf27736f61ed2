/**
 * Plinth Runtime Host — Home and Operator Resolution
 *
 * The home directory holds everything a CLI session persists:
 *
 *   <PLINTH_HOME>/
 *     state/ledger.json        kernel ledger snapshot
 *     state/deployment.json    genesis CodeIndex and Distributor addresses
 *     logs/events.jsonl        committed events, one JSON object per line
 *
 * Precedence for the home directory:
 *   1. explicit option (the --home flag)
 *   2. PLINTH_HOME environment variable
 *   3. ~/.plinth
 *
 * Precedence for the operator address (the `sender` of CLI calls):
 *   1. explicit option (the --as flag)
 *   2. PLINTH_OPERATOR environment variable
 *   3. DEFAULT_OPERATOR
 */

import { existsSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { asAddress } from '@plinth/kernel';
import type { Address } from '@plinth/kernel';

export const DEFAULT_OPERATOR: Address = asAddress('0x' + '00'.repeat(19) + '01');

export interface ResolveHomeOptions {
  readonly home?: string | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export interface ResolveOperatorOptions {
  readonly as?: string | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/** Resolve the home directory and create it if missing. */
export function resolvePlinthHome(opts: ResolveHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const home = firstNonEmpty(opts.home, env['PLINTH_HOME']) ?? join(homedir(), '.plinth');
  const absolute = resolve(home);
  if (!existsSync(absolute)) {
    mkdirSync(absolute, { recursive: true });
  }
  return absolute;
}

/**
 * Resolve the operator address.
 *
 * @throws {EncodingError} if the flag or variable is not a 20-byte address
 */
export function resolveOperator(opts: ResolveOperatorOptions = {}): Address {
  const env = opts.env ?? process.env;
  const raw = firstNonEmpty(opts.as, env['PLINTH_OPERATOR']);
  return raw === undefined ? DEFAULT_OPERATOR : asAddress(raw);
}

function firstNonEmpty(...values: ReadonlyArray<string | undefined>): string | undefined {
  return values.find((v) => v !== undefined && v !== '');
}
