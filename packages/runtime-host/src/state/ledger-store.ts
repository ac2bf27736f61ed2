/**
 * Plinth Runtime Host — Ledger Store
 *
 * Persists the kernel ledger and the genesis deployment between CLI runs:
 *
 *   state/ledger.json      { format, slots, logs }  (a LedgerSnapshot)
 *   state/deployment.json  { codeIndex, distributor, owner }
 *
 * Everything read back is validated. A file that exists but does not have
 * the expected shape is an error, never silently replaced by empty state:
 * losing the ledger would orphan every recorded instance.
 */

import { Ledger, isAddress, isBytes32, isHex, isLedgerValue } from '@plinth/kernel';
import type { Address, KernelEvent, LedgerSnapshot, LedgerValue, LogRecord } from '@plinth/kernel';
import type { StateIO } from './state-io.js';

export const LEDGER_FILE = 'ledger.json';
export const DEPLOYMENT_FILE = 'deployment.json';
const LEDGER_FORMAT = 1;

/** Addresses created when a home directory is first initialized. */
export interface Deployment {
  readonly codeIndex: Address;
  readonly distributor: Address;
  readonly owner: Address;
}

export class StateCorruptedError extends Error {
  constructor(filename: string, detail: string) {
    super(`State file ${filename} is invalid: ${detail}`);
    this.name = 'StateCorruptedError';
  }
}

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

export function saveLedger(io: StateIO, ledger: Ledger): void {
  const snapshot = ledger.snapshot();
  io.writeJson(LEDGER_FILE, { format: LEDGER_FORMAT, slots: snapshot.slots, logs: snapshot.logs });
}

/** The persisted ledger, or a fresh one if none was saved yet. */
export function loadLedger(io: StateIO): Ledger {
  const raw = io.readJson(LEDGER_FILE);
  if (raw === undefined) {
    return new Ledger();
  }
  return new Ledger(parseSnapshot(raw));
}

function parseSnapshot(raw: unknown): LedgerSnapshot {
  if (typeof raw !== 'object' || raw === null || !('format' in raw && 'slots' in raw && 'logs' in raw)) {
    throw new StateCorruptedError(LEDGER_FILE, 'expected { format, slots, logs }');
  }
  if (raw.format !== LEDGER_FORMAT) {
    throw new StateCorruptedError(LEDGER_FILE, `unsupported format ${String(raw.format)}`);
  }

  const { slots, logs } = raw;
  if (typeof slots !== 'object' || slots === null || Array.isArray(slots)) {
    throw new StateCorruptedError(LEDGER_FILE, 'slots must be an object');
  }
  const parsedSlots: Record<string, LedgerValue> = {};
  for (const [key, value] of Object.entries(slots)) {
    if (!isLedgerValue(value)) {
      throw new StateCorruptedError(LEDGER_FILE, `slot ${key} holds a non-JSON value`);
    }
    parsedSlots[key] = value;
  }

  if (!Array.isArray(logs)) {
    throw new StateCorruptedError(LEDGER_FILE, 'logs must be an array');
  }
  const parsedLogs: LogRecord[] = [];
  for (const entry of logs) {
    const record = parseLogRecord(entry);
    if (record === undefined || record.index !== parsedLogs.length) {
      throw new StateCorruptedError(LEDGER_FILE, `log record ${parsedLogs.length} is malformed`);
    }
    parsedLogs.push(record);
  }
  return { slots: parsedSlots, logs: parsedLogs };
}

function parseLogRecord(entry: unknown): LogRecord | undefined {
  if (typeof entry !== 'object' || entry === null) return undefined;
  if (!('index' in entry && 'emitter' in entry && 'event' in entry)) return undefined;
  const { index, emitter } = entry;
  const event = parseKernelEvent(entry.event);
  if (typeof index !== 'number' || !isAddress(emitter) || event === undefined) return undefined;
  return { index, emitter, event };
}

/** Validate an event read from disk against the KernelEvent union. */
export function parseKernelEvent(value: unknown): KernelEvent | undefined {
  if (typeof value !== 'object' || value === null || !('name' in value)) return undefined;
  const record: object = value;
  const field = (key: string): unknown => Reflect.get(record, key);

  switch (value.name) {
    case 'Registered': {
      const container = field('container');
      const fingerprint = field('fingerprint');
      return isAddress(container) && isBytes32(fingerprint)
        ? { name: 'Registered', container, fingerprint }
        : undefined;
    }
    case 'DistributionAdded': {
      const id = field('id');
      const initializer = field('initializer');
      const distributorsId = field('distributorsId');
      if (!isBytes32(id) || !isBytes32(distributorsId)) return undefined;
      if (initializer !== null && !isAddress(initializer)) return undefined;
      return { name: 'DistributionAdded', id, initializer, distributorsId };
    }
    case 'DistributionRemoved': {
      const distributorsId = field('distributorsId');
      return isBytes32(distributorsId) ? { name: 'DistributionRemoved', distributorsId } : undefined;
    }
    case 'Instantiated': {
      const distributorsId = field('distributorsId');
      const instanceId = field('instanceId');
      const args = field('args');
      const instances = field('instances');
      if (!isBytes32(distributorsId) || typeof instanceId !== 'number' || !isHex(args)) return undefined;
      if (!Array.isArray(instances)) return undefined;
      const parsed = instances.filter(isAddress);
      if (parsed.length !== instances.length) return undefined;
      return { name: 'Instantiated', distributorsId, instanceId, args, instances: parsed };
    }
    case 'OwnershipTransferred': {
      const previousOwner = field('previousOwner');
      const newOwner = field('newOwner');
      return isAddress(previousOwner) && isAddress(newOwner)
        ? { name: 'OwnershipTransferred', previousOwner, newOwner }
        : undefined;
    }
    default:
      return undefined;
  }
}

// ---------------------------------------------------------------------------
// Deployment
// ---------------------------------------------------------------------------

export function saveDeployment(io: StateIO, deployment: Deployment): void {
  io.writeJson(DEPLOYMENT_FILE, deployment);
}

/** The genesis deployment, or undefined if this home was never initialized. */
export function loadDeployment(io: StateIO): Deployment | undefined {
  const raw = io.readJson(DEPLOYMENT_FILE);
  if (raw === undefined) return undefined;
  if (typeof raw !== 'object' || raw === null || !('codeIndex' in raw && 'distributor' in raw && 'owner' in raw)) {
    throw new StateCorruptedError(DEPLOYMENT_FILE, 'expected { codeIndex, distributor, owner }');
  }
  const { codeIndex, distributor, owner } = raw;
  if (!isAddress(codeIndex) || !isAddress(distributor) || !isAddress(owner)) {
    throw new StateCorruptedError(DEPLOYMENT_FILE, 'addresses must be lowercase 20-byte hex');
  }
  return { codeIndex, distributor, owner };
}
