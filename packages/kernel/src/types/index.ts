/**
 * Plinth Kernel — Type Exports
 *
 * Re-exports all kernel types from a single entry point.
 * No logic lives in this file.
 */

export type { Address, Bytes32, Fingerprint, Hex, Selector, Version } from './values.js';
export { formatVersion, isAddress, isBytes32, isHex, parseVersion } from './values.js';

export type {
  DistributionAddedEvent,
  DistributionRemovedEvent,
  InstantiatedEvent,
  KernelEvent,
  KernelEventName,
  LogRecord,
  OwnershipTransferredEvent,
  RegisteredEvent,
} from './event.js';

export type {
  CodeModule,
  ContractProgram,
  ExecutionContext,
  Initializer,
  InstantiationResult,
  Program,
  ProgramResolver,
} from './program.js';
