/**
 * Plinth Kernel — Ledger
 *
 * The single owner of all persistent state: namespaced storage slots and the
 * event log. Every write is journaled so an enclosing operation can be
 * discarded as a whole.
 *
 * Checkpoints nest. revertTo(cp) undoes every write made since cp was taken,
 * including writes made under inner checkpoints that were already committed.
 * commit(cp) folds cp's writes into the enclosing checkpoint; once the
 * outermost checkpoint commits the journal is cleared and the writes are final.
 *
 * Stored values are immutable JSON values. A write replaces a value, it never
 * mutates one in place, so the journal holds references rather than copies.
 */

import type { Address } from '../types/values.js';
import type { LogRecord } from '../types/event.js';

/** A JSON value as stored in a slot. */
export type LedgerValue =
  | string
  | number
  | boolean
  | null
  | ReadonlyArray<LedgerValue>
  | { readonly [key: string]: LedgerValue };

export type LedgerRecord = { readonly [key: string]: LedgerValue };

/** True for a stored JSON object (not an array, not null). */
export function isLedgerRecord(value: LedgerValue | undefined): value is LedgerRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** True for any value a slot can hold. Used to validate persisted snapshots. */
export function isLedgerValue(value: unknown): value is LedgerValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(isLedgerValue);
      return Object.values(value).every(isLedgerValue);
    default:
      return false;
  }
}

declare const __checkpointBrand: unique symbol;

/** Opaque handle returned by checkpoint(). */
export type Checkpoint = number & { readonly [__checkpointBrand]: 'Checkpoint' };

/** Plain serializable form of a ledger, used by the runtime host for persistence. */
export interface LedgerSnapshot {
  readonly slots: Readonly<Record<string, LedgerValue>>;
  readonly logs: ReadonlyArray<LogRecord>;
}

type JournalEntry =
  | { readonly kind: 'slot'; readonly key: string; readonly previous: LedgerValue | undefined }
  | { readonly kind: 'log' };

export class Ledger {
  private readonly slots: Map<string, LedgerValue> = new Map();
  private readonly records: LogRecord[] = [];
  private readonly journal: JournalEntry[] = [];
  /** Journal length at the moment each open checkpoint was taken. */
  private readonly marks: number[] = [];

  constructor(snapshot?: LedgerSnapshot) {
    if (snapshot !== undefined) {
      for (const [key, value] of Object.entries(snapshot.slots)) {
        this.slots.set(key, value);
      }
      this.records.push(...snapshot.logs);
    }
  }

  // -------------------------------------------------------------------------
  // Storage
  // -------------------------------------------------------------------------

  read(account: Address, slot: string): LedgerValue | undefined {
    return this.slots.get(slotKey(account, slot));
  }

  write(account: Address, slot: string, value: LedgerValue): void {
    const key = slotKey(account, slot);
    this.record(key);
    this.slots.set(key, value);
  }

  erase(account: Address, slot: string): void {
    const key = slotKey(account, slot);
    if (!this.slots.has(key)) return;
    this.record(key);
    this.slots.delete(key);
  }

  // -------------------------------------------------------------------------
  // Event log
  // -------------------------------------------------------------------------

  append(record: LogRecord): void {
    if (this.marks.length > 0) {
      this.journal.push({ kind: 'log' });
    }
    this.records.push(record);
  }

  logs(): ReadonlyArray<LogRecord> {
    return [...this.records];
  }

  /** Records from position `index` onwards. */
  logsSince(index: number): ReadonlyArray<LogRecord> {
    return this.records.slice(index);
  }

  get logCount(): number {
    return this.records.length;
  }

  // -------------------------------------------------------------------------
  // Checkpoints
  // -------------------------------------------------------------------------

  /** Number of open checkpoints. Zero means no transaction is in progress. */
  get depth(): number {
    return this.marks.length;
  }

  checkpoint(): Checkpoint {
    this.marks.push(this.journal.length);
    return toCheckpoint(this.marks.length);
  }

  revertTo(checkpoint: Checkpoint): void {
    const mark = this.takeMark(checkpoint);
    while (this.journal.length > mark) {
      const entry = this.journal.pop();
      if (entry === undefined) break;
      if (entry.kind === 'log') {
        this.records.pop();
      } else if (entry.previous === undefined) {
        this.slots.delete(entry.key);
      } else {
        this.slots.set(entry.key, entry.previous);
      }
    }
  }

  commit(checkpoint: Checkpoint): void {
    this.takeMark(checkpoint);
    if (this.marks.length === 0) {
      this.journal.length = 0;
    }
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  /**
   * Serializable copy of the committed state.
   * Refuses to run while a checkpoint is open: uncommitted writes must never
   * be persisted.
   */
  snapshot(): LedgerSnapshot {
    if (this.marks.length > 0) {
      throw new Error(`Cannot snapshot a ledger with ${this.marks.length} open checkpoint(s)`);
    }
    const slots: Record<string, LedgerValue> = {};
    for (const key of [...this.slots.keys()].sort()) {
      const value = this.slots.get(key);
      if (value !== undefined) slots[key] = value;
    }
    return { slots, logs: [...this.records] };
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private record(key: string): void {
    if (this.marks.length > 0) {
      this.journal.push({ kind: 'slot', key, previous: this.slots.get(key) });
    }
  }

  /** Checkpoints close innermost-first; anything else is a host bug. */
  private takeMark(checkpoint: Checkpoint): number {
    if (checkpoint !== this.marks.length) {
      throw new Error(
        `Checkpoint ${checkpoint} is not the innermost open checkpoint (depth ${this.marks.length})`,
      );
    }
    const mark = this.marks.pop();
    if (mark === undefined) {
      throw new Error('No open checkpoint');
    }
    return mark;
  }
}

function slotKey(account: Address, slot: string): string {
  return `${account}/${slot}`;
}

function toCheckpoint(depth: number): Checkpoint {
  // The only place a Checkpoint is minted.
  return depth as Checkpoint;
}
