/**
 * Plinth Registry — Admission Guard
 *
 * The calling convention instances use to protect a privileged code path:
 *
 *   context = hooks.beforeCall({ sender: instance }, config, selector, caller, value, data)
 *   result  = fn(context)
 *   hooks.afterCall({ sender: instance }, config, selector, caller, value, data, context)
 *
 * The instance itself is the hook's sender (and so the default target); the
 * address that called into the instance is checked as `maybeInstance`. All
 * three steps run in one transaction, so a failing afterCall also discards
 * whatever `fn` wrote.
 */

import { EMPTY_BYTES } from '@plinth/kernel';
import type { Address, Bytes32, ExecutionHost, Hex, Selector } from '@plinth/kernel';
import type { CallContext } from './distributor.js';

/** The hook surface a guard needs. Distributor satisfies it. */
export interface AdmissionHooks {
  beforeCall(
    ctx: CallContext,
    config: Hex,
    selector: Selector,
    maybeInstance: Address,
    value: bigint,
    data: Hex,
  ): Bytes32;
  afterCall(
    ctx: CallContext,
    config: Hex,
    selector: Selector,
    maybeInstance: Address,
    value: bigint,
    data: Hex,
    beforeCallResult: Bytes32,
  ): void;
}

export interface GuardedCall {
  /** The protected instance. */
  readonly instance: Address;
  /** Whoever is calling into the instance. */
  readonly caller: Address;
  readonly selector: Selector;
  readonly value?: bigint | undefined;
  readonly data?: Hex | undefined;
  /** Explicit target for the check. Empty means the instance itself. */
  readonly config?: Hex | undefined;
}

export function guardedCall<T>(
  host: ExecutionHost,
  hooks: AdmissionHooks,
  call: GuardedCall,
  fn: (context: Bytes32) => T,
): T {
  const ctx: CallContext = { sender: call.instance };
  const config = call.config ?? EMPTY_BYTES;
  const value = call.value ?? 0n;
  const data = call.data ?? EMPTY_BYTES;
  return host.transact(() => {
    const context = hooks.beforeCall(ctx, config, call.selector, call.caller, value, data);
    const result = fn(context);
    hooks.afterCall(ctx, config, call.selector, call.caller, value, data, context);
    return result;
  });
}
