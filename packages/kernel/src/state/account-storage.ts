/**
 * Plinth Kernel — Account Storage
 *
 * A view of the ledger restricted to one account's namespace. This is the
 * storage capability handed to programs: a code module receives its own,
 * an initializer receives the caller's.
 *
 * Slots starting with `$` belong to the execution host (code, nonce) and
 * cannot be written through this view.
 */

import type { Address } from '../types/values.js';
import type { Ledger, LedgerValue } from './ledger.js';

export class AccountStorage {
  constructor(
    private readonly ledger: Ledger,
    readonly account: Address,
  ) {}

  get(slot: string): LedgerValue | undefined {
    return this.ledger.read(this.account, slot);
  }

  set(slot: string, value: LedgerValue): void {
    assertWritable(slot);
    this.ledger.write(this.account, slot, value);
  }

  delete(slot: string): void {
    assertWritable(slot);
    this.ledger.erase(this.account, slot);
  }

  has(slot: string): boolean {
    return this.get(slot) !== undefined;
  }

  getString(slot: string): string | undefined {
    const value = this.get(slot);
    return typeof value === 'string' ? value : undefined;
  }

  /** Integer slots read as 0 until first written. */
  getNumber(slot: string): number {
    const value = this.get(slot);
    return typeof value === 'number' ? value : 0;
  }

  getStrings(slot: string): ReadonlyArray<string> {
    const value = this.get(slot);
    if (!Array.isArray(value)) return [];
    return value.filter((v): v is string => typeof v === 'string');
  }
}

function assertWritable(slot: string): void {
  if (slot.startsWith('$')) {
    throw new Error(`Storage slot "${slot}" is reserved for the execution host`);
  }
}
