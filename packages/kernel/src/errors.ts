/**
 * Plinth Kernel — Error Types
 *
 * Every rejected operation surfaces as a RevertError: a named error with a
 * typed argument list, rendered as `Name(arg, ...)`. Throwing one inside
 * ExecutionHost.transact() discards every write made by the enclosing
 * transaction. Nothing in the kernel or registry retries or recovers.
 *
 * Concrete registry errors (DistributionNotFound, InvalidInstance, ...) live
 * in @plinth/registry. The kernel only owns the errors its own code raises.
 */

import type { Address } from './types/values.js';

/** A single rendered argument of a revert. */
export type RevertArg = string | number | bigint | null;

/**
 * Base class for all named reverts.
 *
 * `name` is stable and is the discriminator callers match on. `args` carries
 * the same values the subclass exposes as typed fields.
 */
export class RevertError extends Error {
  readonly args: ReadonlyArray<RevertArg>;

  constructor(name: string, args: ReadonlyArray<RevertArg> = []) {
    super(`${name}(${args.map(formatArg).join(', ')})`);
    this.name = name;
    this.args = args;
  }
}

/** Thrown when a value cannot be decoded as the expected hex shape. */
export class EncodingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EncodingError';
  }
}

/** No code is deployed at the given address. */
export class CodeNotFound extends RevertError {
  constructor(readonly container: Address) {
    super('CodeNotFound', [container]);
  }
}

/**
 * True if a thrown value carries a payload worth propagating verbatim.
 *
 * Reverts always carry one (their name). Other errors carry one when their
 * message is non-empty. `undefined`, `null`, an empty string, and a bare
 * `new Error()` carry none.
 */
export function hasRevertPayload(thrown: unknown): boolean {
  if (thrown instanceof RevertError) return true;
  if (thrown instanceof Error) return thrown.message !== '';
  if (typeof thrown === 'string') return thrown !== '';
  return thrown !== undefined && thrown !== null;
}

function formatArg(arg: RevertArg): string {
  if (arg === null) return 'null';
  if (typeof arg === 'string') return arg;
  return arg.toString();
}
