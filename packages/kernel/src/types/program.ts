/**
 * Plinth Kernel — Program Types
 *
 * A program is code that can be deployed at an address. Its `bytecode` is its
 * identity: the fingerprint of deployed code is SHA-256 over the bytecode, and
 * two programs with equal bytecode must behave identically. Configuration that
 * changes behaviour (clone sources, names, versions) is therefore part of the
 * bytecode.
 *
 * Three kinds exist:
 *
 *   - `module`       produces instances (the code side of a distribution)
 *   - `initializer`  configures freshly produced instances
 *   - `contract`     anything else; identity only, behaviour lives in the
 *                    TypeScript class that wraps the deployed address
 *
 * Programs never receive the execution host itself. They receive an
 * ExecutionContext: the address they run as, the caller, a storage view and a
 * deploy function. Which storage view they get is the whole security model —
 * a code module sees only its own slots, an initializer sees its caller's.
 */

import type { AccountStorage } from '../state/account-storage.js';
import type { Address, Hex, Version } from './values.js';

/**
 * The capabilities available to a running program.
 *
 * `self` is the address whose storage is exposed and which deploys on the
 * program's behalf. For an initializer this is the caller, not the
 * initializer's own address.
 */
export interface ExecutionContext {
  readonly self: Address;
  readonly sender: Address;
  readonly storage: AccountStorage;
  deploy(program: Program): Address;
}

/** What a code module reports after producing instances. */
export interface InstantiationResult {
  readonly instances: ReadonlyArray<Address>;
  readonly name: string;
  readonly version: Version;
}

export interface CodeModule {
  readonly kind: 'module';
  readonly bytecode: Hex;
  /** Deploy one or more fresh instances. `args` is passed through unchanged. */
  instantiate(context: ExecutionContext, args: Hex): InstantiationResult;
}

export interface Initializer {
  readonly kind: 'initializer';
  readonly bytecode: Hex;
  /**
   * Configure the given instances. Runs with the caller's storage; any throw
   * reverts the whole instantiation.
   */
  initialize(context: ExecutionContext, instances: ReadonlyArray<Address>, args: Hex): void;
}

export interface ContractProgram {
  readonly kind: 'contract';
  readonly bytecode: Hex;
}

export type Program = CodeModule | Initializer | ContractProgram;

/**
 * Rebuilds program behaviour from stored bytecode.
 *
 * The host keeps live program objects for everything deployed in-process.
 * After a ledger is reloaded from disk only the bytecode remains; a resolver
 * maps it back to a program, or returns undefined for unknown code.
 */
export interface ProgramResolver {
  resolve(bytecode: Hex): Program | undefined;
}
