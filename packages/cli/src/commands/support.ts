/**
 * Shared plumbing for command actions: global option lookup, argument
 * parsers, output, and the error boundary every action runs behind.
 */

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';
import { asAddress, asBytes32, asHex } from '@plinth/kernel';
import type { Address, Bytes32, Hex } from '@plinth/kernel';
import { t } from '../theme.js';
import type { GlobalOptions } from '../runtime.js';

/** --home and --as, wherever they were given on the command line. */
export function globalOptions(command: Command): GlobalOptions {
  const opts = command.optsWithGlobals();
  return { home: stringOption(opts['home']), as: stringOption(opts['as']) };
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

// ---------------------------------------------------------------------------
// Argument parsers (commander argParser signature)
// ---------------------------------------------------------------------------

export function parseAddress(value: string): Address {
  return convert(value, asAddress);
}

export function parseBytes32(value: string): Bytes32 {
  return convert(value, asBytes32);
}

export function parseHex(value: string): Hex {
  return convert(value, asHex);
}

export function parseAddressList(value: string, previous: ReadonlyArray<Address> | undefined): Address[] {
  return [...(previous ?? []), parseAddress(value)];
}

export function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function convert<T>(value: string, guard: (raw: string) => T): T {
  try {
    return guard(value);
  } catch (err: unknown) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export function print(line = ''): void {
  // eslint-disable-next-line no-console
  console.log(line);
}

export function printJson(value: unknown): void {
  print(JSON.stringify(value, null, 2));
}

/** `label` padded to a fixed column, muted. */
export function label(text: string, width = 16): string {
  return t.muted(text.padEnd(width));
}

/**
 * Render a failure as `error: <message>` on stderr and mark the process as
 * failed. A revert's message is already `Name(arg, ...)`.
 */
export function reportError(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  // eslint-disable-next-line no-console
  console.error(t.red(`error: ${message}`));
  process.exitCode = 1;
}

/** Run an action body behind reportError(). */
export function guarded<A extends unknown[]>(action: (...args: A) => void): (...args: A) => void {
  return (...args: A): void => {
    try {
      action(...args);
    } catch (err: unknown) {
      reportError(err);
    }
  };
}
