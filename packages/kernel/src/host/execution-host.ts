/**
 * Plinth Kernel — Execution Host
 *
 * The deterministic, single-threaded environment every component runs in.
 * The host owns the ledger and is the only path to it:
 *
 * - deploy() assigns deterministic addresses and stores bytecode
 * - transact() makes an operation atomic: it either commits every write and
 *   event it made, or none of them
 * - emit() appends an event to the ledger inside the current transaction
 * - context() builds the capability bundle handed to a running program
 *
 * Transactions nest. A failure inside a nested transaction unwinds only that
 * level; if the error keeps propagating, each enclosing level unwinds in turn.
 * Committed events are forwarded to the EventLogger only when the outermost
 * transaction commits, so a sink never sees an event that was later reverted.
 *
 * Operations passed to transact() must be synchronous. There is no suspension
 * point between a call and its return other than nested calls.
 */

import { deriveAddress, fingerprintOf } from '../codec/hex.js';
import type { EventSink } from '../logging/event-sink.js';
import { EventLogger } from '../logging/event-logger.js';
import { AccountStorage } from '../state/account-storage.js';
import { Ledger } from '../state/ledger.js';
import type { KernelEvent, KernelEventName, LogRecord } from '../types/event.js';
import type { ExecutionContext, Program, ProgramResolver } from '../types/program.js';
import type { Address, Fingerprint, Hex } from '../types/values.js';
import { isHex } from '../types/values.js';

/** Host-reserved slots. Program storage can never address these. */
export const CODE_SLOT = '$code';
export const NONCE_SLOT = '$nonce';

export interface ExecutionHostOptions {
  /** Existing ledger, e.g. reloaded from disk. A fresh one is created if omitted. */
  readonly ledger?: Ledger | undefined;
  /** Rebuilds programs for bytecode not deployed in this process. */
  readonly resolver?: ProgramResolver | undefined;
  /** Receives committed events. */
  readonly sink?: EventSink | undefined;
}

export class ExecutionHost {
  readonly ledger: Ledger;
  private readonly programs: Map<Fingerprint, Program> = new Map();
  private readonly resolver: ProgramResolver | undefined;
  private readonly logger: EventLogger;

  constructor(options: ExecutionHostOptions = {}) {
    this.ledger = options.ledger ?? new Ledger();
    this.resolver = options.resolver;
    this.logger = new EventLogger(options.sink);
  }

  // -------------------------------------------------------------------------
  // Transactions
  // -------------------------------------------------------------------------

  /**
   * Run `operation` atomically.
   *
   * On throw every ledger write and event made by the operation (including
   * nested transactions that already committed) is discarded and the error
   * is rethrown unchanged.
   */
  transact<T>(operation: () => T): T {
    const firstRecord = this.ledger.logCount;
    const checkpoint = this.ledger.checkpoint();
    let result: T;
    try {
      result = operation();
    } catch (err: unknown) {
      this.ledger.revertTo(checkpoint);
      throw err;
    }
    this.ledger.commit(checkpoint);
    if (this.ledger.depth === 0) {
      this.logger.recordAll(this.ledger.logsSince(firstRecord));
    }
    return result;
  }

  get inTransaction(): boolean {
    return this.ledger.depth > 0;
  }

  // -------------------------------------------------------------------------
  // Code
  // -------------------------------------------------------------------------

  /**
   * Deploy a program on behalf of `deployer`.
   *
   * The address is derived from the deployer and its deployment nonce, so
   * replaying the same sequence of deployments reproduces the same addresses.
   */
  deploy(program: Program, deployer: Address): Address {
    return this.transact(() => {
      const nonce = this.nonceOf(deployer);
      const address = deriveAddress(deployer, nonce);
      if (this.codeAt(address) !== null) {
        throw new Error(`Deployment address ${address} is already occupied`);
      }
      this.ledger.write(deployer, NONCE_SLOT, nonce + 1);
      this.ledger.write(address, CODE_SLOT, program.bytecode);
      this.programs.set(fingerprintOf(program.bytecode), program);
      return address;
    });
  }

  /** Deployed bytecode, or null for an empty account. */
  codeAt(address: Address): Hex | null {
    const code = this.ledger.read(address, CODE_SLOT);
    return isHex(code) ? code : null;
  }

  /** Fingerprint of the code at `address`, or null for an empty account. */
  fingerprintAt(address: Address): Fingerprint | null {
    const code = this.codeAt(address);
    return code === null ? null : fingerprintOf(code);
  }

  /**
   * The program deployed at `address`.
   *
   * Falls back to the resolver for code deployed by an earlier process.
   * Returns undefined for empty accounts and for code nobody can rebuild.
   */
  programAt(address: Address): Program | undefined {
    const code = this.codeAt(address);
    if (code === null) return undefined;
    const fingerprint = fingerprintOf(code);
    const known = this.programs.get(fingerprint);
    if (known !== undefined) return known;

    const rebuilt = this.resolver?.resolve(code);
    if (rebuilt === undefined) return undefined;
    if (rebuilt.bytecode !== code) {
      throw new Error(`Resolver returned a program with different bytecode for ${address}`);
    }
    this.programs.set(fingerprint, rebuilt);
    return rebuilt;
  }

  nonceOf(account: Address): number {
    const nonce = this.ledger.read(account, NONCE_SLOT);
    return typeof nonce === 'number' ? nonce : 0;
  }

  // -------------------------------------------------------------------------
  // Storage and contexts
  // -------------------------------------------------------------------------

  storage(account: Address): AccountStorage {
    return new AccountStorage(this.ledger, account);
  }

  /**
   * Capabilities for a program running as `self` on behalf of `sender`.
   * Deployments made through the context are attributed to `self`.
   */
  context(self: Address, sender: Address): ExecutionContext {
    return {
      self,
      sender,
      storage: this.storage(self),
      deploy: (program: Program): Address => this.deploy(program, self),
    };
  }

  // -------------------------------------------------------------------------
  // Events
  // -------------------------------------------------------------------------

  emit(emitter: Address, event: KernelEvent): void {
    if (!this.inTransaction) {
      throw new Error(`Event ${event.name} emitted outside of a transaction`);
    }
    this.ledger.append({ index: this.ledger.logCount, emitter, event });
  }

  logs(filter?: { emitter?: Address; name?: KernelEventName }): ReadonlyArray<LogRecord> {
    return this.ledger.logs().filter(
      (r) =>
        (filter?.emitter === undefined || r.emitter === filter.emitter) &&
        (filter?.name === undefined || r.event.name === filter.name),
    );
  }
}
