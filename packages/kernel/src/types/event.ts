/**
 * Plinth Kernel — Event Types
 *
 * Events are observable log records and part of the durable external
 * contract. They are appended to the ledger inside the emitting transaction,
 * so a reverted operation leaves no events behind. Only committed records
 * reach an EventSink.
 */

import type { Address, Bytes32, Fingerprint, Hex } from './values.js';

/** CodeIndex stored a new fingerprint → container binding. */
export interface RegisteredEvent {
  readonly name: 'Registered';
  readonly container: Address;
  readonly fingerprint: Fingerprint;
}

export interface DistributionAddedEvent {
  readonly name: 'DistributionAdded';
  readonly id: Fingerprint;
  readonly initializer: Address | null;
  readonly distributorsId: Bytes32;
}

export interface DistributionRemovedEvent {
  readonly name: 'DistributionRemoved';
  readonly distributorsId: Bytes32;
}

export interface InstantiatedEvent {
  readonly name: 'Instantiated';
  readonly distributorsId: Bytes32;
  readonly instanceId: number;
  readonly args: Hex;
  readonly instances: ReadonlyArray<Address>;
}

export interface OwnershipTransferredEvent {
  readonly name: 'OwnershipTransferred';
  readonly previousOwner: Address;
  readonly newOwner: Address;
}

export type KernelEvent =
  | RegisteredEvent
  | DistributionAddedEvent
  | DistributionRemovedEvent
  | InstantiatedEvent
  | OwnershipTransferredEvent;

export type KernelEventName = KernelEvent['name'];

/**
 * One entry of the ledger's event log.
 *
 * `index` is the position in the committed log and is stable: records are
 * never reordered, and reverted records are removed before any later record
 * can take their index.
 */
export interface LogRecord {
  readonly index: number;
  readonly emitter: Address;
  readonly event: KernelEvent;
}
