/**
 * Plinth Runtime Host — Ledger Store Tests
 *
 *   STORE-U1: a missing ledger loads as an empty ledger
 *   STORE-U2: slots and log records survive save → load
 *   STORE-U3: malformed files are rejected with StateCorruptedError
 *   STORE-U4: deployment addresses round-trip and are validated
 *   STORE-U5: parseKernelEvent accepts each event kind and rejects bad fields
 */

import { describe, it, expect } from 'vitest';
import { ExecutionHost, Ledger, asAddress, asBytes32 } from '@plinth/kernel';
import {
  DEPLOYMENT_FILE,
  LEDGER_FILE,
  StateCorruptedError,
  loadDeployment,
  loadLedger,
  parseKernelEvent,
  saveDeployment,
  saveLedger,
} from '../src/state/ledger-store.js';
import { MemoryStateIO } from '../src/state/state-io.js';

const A = asAddress('0x' + 'a0'.repeat(20));
const B = asAddress('0x' + 'b0'.repeat(20));
const C = asAddress('0x' + 'c0'.repeat(20));
const ID = asBytes32('0x' + '1d'.repeat(32));

describe('STORE-U1: empty home', () => {
  it('loads a fresh ledger when nothing was saved', () => {
    const ledger = loadLedger(new MemoryStateIO());
    expect(ledger.snapshot()).toEqual({ slots: {}, logs: [] });
  });
});

describe('STORE-U2: round trip', () => {
  it('restores storage, code and events', () => {
    const io = new MemoryStateIO();
    const host = new ExecutionHost();
    const deployed = host.deploy({ kind: 'contract', bytecode: '0x6001' }, A);
    host.transact(() => {
      host.storage(A).set('list', [ID, 2, { nested: true }]);
      host.emit(A, { name: 'DistributionAdded', id: ID, initializer: null, distributorsId: ID });
    });
    saveLedger(io, host.ledger);

    const reloaded = new ExecutionHost({ ledger: loadLedger(io) });
    expect(reloaded.codeAt(deployed)).toBe('0x6001');
    expect(reloaded.nonceOf(A)).toBe(1);
    expect(reloaded.storage(A).get('list')).toEqual([ID, 2, { nested: true }]);
    expect(reloaded.logs()).toEqual(host.logs());
  });

  it('refuses to save while a transaction is open', () => {
    const io = new MemoryStateIO();
    const ledger = new Ledger();
    ledger.checkpoint();
    expect(() => saveLedger(io, ledger)).toThrow(/open checkpoint/);
  });
});

describe('STORE-U3: corrupt ledger', () => {
  it('rejects an unknown format', () => {
    const io = new MemoryStateIO();
    io.writeJson(LEDGER_FILE, { format: 2, slots: {}, logs: [] });
    expect(() => loadLedger(io)).toThrow(new StateCorruptedError(LEDGER_FILE, 'unsupported format 2'));
  });

  it('rejects a log record with an unknown event', () => {
    const io = new MemoryStateIO();
    io.writeJson(LEDGER_FILE, {
      format: 1,
      slots: {},
      logs: [{ index: 0, emitter: A, event: { name: 'Mystery' } }],
    });
    expect(() => loadLedger(io)).toThrow('State file ledger.json is invalid: log record 0 is malformed');
  });

  it('rejects log records whose indexes are not consecutive', () => {
    const io = new MemoryStateIO();
    io.writeJson(LEDGER_FILE, {
      format: 1,
      slots: {},
      logs: [{ index: 3, emitter: A, event: { name: 'DistributionRemoved', distributorsId: ID } }],
    });
    expect(() => loadLedger(io)).toThrow(StateCorruptedError);
  });

  it('rejects a missing slots object', () => {
    const io = new MemoryStateIO();
    io.writeJson(LEDGER_FILE, { format: 1, logs: [] });
    expect(() => loadLedger(io)).toThrow('expected { format, slots, logs }');
  });
});

describe('STORE-U4: deployment', () => {
  it('is undefined before initialization and round-trips after', () => {
    const io = new MemoryStateIO();
    expect(loadDeployment(io)).toBeUndefined();
    saveDeployment(io, { codeIndex: A, distributor: B, owner: C });
    expect(loadDeployment(io)).toEqual({ codeIndex: A, distributor: B, owner: C });
  });

  it('rejects a non-address value', () => {
    const io = new MemoryStateIO();
    io.writeJson(DEPLOYMENT_FILE, { codeIndex: A, distributor: 'nope', owner: C });
    expect(() => loadDeployment(io)).toThrow(StateCorruptedError);
  });
});

describe('STORE-U5: parseKernelEvent', () => {
  it('accepts every event kind', () => {
    const events = [
      { name: 'Registered', container: A, fingerprint: ID },
      { name: 'DistributionAdded', id: ID, initializer: B, distributorsId: ID },
      { name: 'DistributionRemoved', distributorsId: ID },
      { name: 'Instantiated', distributorsId: ID, instanceId: 4, args: '0x', instances: [A, B] },
      { name: 'OwnershipTransferred', previousOwner: A, newOwner: B },
    ];
    for (const event of events) {
      expect(parseKernelEvent(event)).toEqual(event);
    }
  });

  it('rejects wrong field types', () => {
    expect(parseKernelEvent({ name: 'Registered', container: 'x', fingerprint: ID })).toBeUndefined();
    expect(
      parseKernelEvent({ name: 'Instantiated', distributorsId: ID, instanceId: 1, args: '0x', instances: ['bad'] }),
    ).toBeUndefined();
    expect(parseKernelEvent(null)).toBeUndefined();
  });
});
