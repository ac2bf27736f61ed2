/**
 * Plinth Kernel — Ledger Tests
 *
 * LED-U1: writes outside a checkpoint are final immediately
 * LED-U2: revertTo restores previous values and removes new slots
 * LED-U3: an inner commit folds into the outer checkpoint; outer revert undoes both
 * LED-U4: log records appended under a checkpoint are removed on revert; logsSince slices the tail
 * LED-U5: snapshot refuses open checkpoints and round-trips through the constructor
 * LED-U6: checkpoints must close innermost-first
 */

import { describe, it, expect } from 'vitest';
import { Ledger, asAddress, asBytes32 } from '../src/index.js';
import type { LogRecord } from '../src/index.js';

const A = asAddress('0x' + 'aa'.repeat(20));
const B = asAddress('0x' + 'bb'.repeat(20));
const ID = asBytes32('0x' + '01'.repeat(32));

function record(index: number): LogRecord {
  return { index, emitter: A, event: { name: 'DistributionRemoved', distributorsId: ID } };
}

describe('LED-U1: writes without a checkpoint', () => {
  it('read returns the written value and undefined for unknown slots', () => {
    const ledger = new Ledger();
    ledger.write(A, 'x', 1);
    expect(ledger.read(A, 'x')).toBe(1);
    expect(ledger.read(B, 'x')).toBeUndefined();
    expect(ledger.depth).toBe(0);
  });

  it('erase of an absent slot is a no-op', () => {
    const ledger = new Ledger();
    ledger.erase(A, 'missing');
    expect(ledger.snapshot().slots).toEqual({});
  });
});

describe('LED-U2: revert', () => {
  it('restores overwritten and erased slots and drops new ones', () => {
    const ledger = new Ledger();
    ledger.write(A, 'kept', 'before');
    ledger.write(A, 'erased', true);

    const cp = ledger.checkpoint();
    ledger.write(A, 'kept', 'after');
    ledger.erase(A, 'erased');
    ledger.write(B, 'fresh', [1, 2]);
    ledger.revertTo(cp);

    expect(ledger.read(A, 'kept')).toBe('before');
    expect(ledger.read(A, 'erased')).toBe(true);
    expect(ledger.read(B, 'fresh')).toBeUndefined();
    expect(ledger.depth).toBe(0);
  });

  it('the same slot written twice reverts to its original value', () => {
    const ledger = new Ledger();
    ledger.write(A, 'n', 0);
    const cp = ledger.checkpoint();
    ledger.write(A, 'n', 1);
    ledger.write(A, 'n', 2);
    ledger.revertTo(cp);
    expect(ledger.read(A, 'n')).toBe(0);
  });
});

describe('LED-U3: nested checkpoints', () => {
  it('outer revert undoes writes from an inner checkpoint that committed', () => {
    const ledger = new Ledger();
    const outer = ledger.checkpoint();
    ledger.write(A, 'outer', 1);
    const inner = ledger.checkpoint();
    ledger.write(A, 'inner', 2);
    ledger.commit(inner);
    expect(ledger.read(A, 'inner')).toBe(2);
    ledger.revertTo(outer);

    expect(ledger.read(A, 'outer')).toBeUndefined();
    expect(ledger.read(A, 'inner')).toBeUndefined();
  });

  it('inner revert leaves outer writes in place', () => {
    const ledger = new Ledger();
    const outer = ledger.checkpoint();
    ledger.write(A, 'outer', 1);
    const inner = ledger.checkpoint();
    ledger.write(A, 'inner', 2);
    ledger.revertTo(inner);
    ledger.commit(outer);

    expect(ledger.read(A, 'outer')).toBe(1);
    expect(ledger.read(A, 'inner')).toBeUndefined();
  });
});

describe('LED-U4: log records', () => {
  it('revert removes records appended since the checkpoint', () => {
    const ledger = new Ledger();
    ledger.append(record(0));
    const cp = ledger.checkpoint();
    ledger.append(record(1));
    ledger.append(record(2));
    expect(ledger.logCount).toBe(3);
    ledger.revertTo(cp);

    expect(ledger.logCount).toBe(1);
    expect(ledger.logs().map((r) => r.index)).toEqual([0]);
  });

  it('logs() returns a copy', () => {
    const ledger = new Ledger();
    ledger.append(record(0));
    const first = ledger.logs();
    ledger.append(record(1));
    expect(first).toHaveLength(1);
  });

  it('logsSince returns the records from an index onwards as a copy', () => {
    const ledger = new Ledger();
    ledger.append(record(0));
    ledger.append(record(1));
    ledger.append(record(2));
    const tail = ledger.logsSince(1);
    ledger.append(record(3));

    expect(tail.map((r) => r.index)).toEqual([1, 2]);
    expect(ledger.logsSince(4)).toEqual([]);
  });
});

describe('LED-U5: snapshots', () => {
  it('throws while a checkpoint is open', () => {
    const ledger = new Ledger();
    ledger.checkpoint();
    expect(() => ledger.snapshot()).toThrow('Cannot snapshot a ledger with 1 open checkpoint(s)');
  });

  it('sorts slot keys and restores into an equal ledger', () => {
    const ledger = new Ledger();
    ledger.write(B, 'z', 'last');
    ledger.write(A, 'a', { nested: [true] });
    ledger.append(record(0));

    const snapshot = ledger.snapshot();
    expect(Object.keys(snapshot.slots)).toEqual([`${A}/a`, `${B}/z`]);

    const restored = new Ledger(snapshot);
    expect(restored.read(A, 'a')).toEqual({ nested: [true] });
    expect(restored.read(B, 'z')).toBe('last');
    expect(restored.logCount).toBe(1);
  });
});

describe('LED-U6: checkpoint ordering', () => {
  it('committing an outer checkpoint while an inner one is open throws', () => {
    const ledger = new Ledger();
    const outer = ledger.checkpoint();
    ledger.checkpoint();
    expect(() => ledger.commit(outer)).toThrow('Checkpoint 1 is not the innermost open checkpoint (depth 2)');
  });
});
