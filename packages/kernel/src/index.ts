/**
 * @plinth/kernel
 *
 * Plinth execution kernel — value types, hex codec, journaled ledger,
 * execution host, program contracts, events, and the base error taxonomy.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API.
 * node:crypto is used for hashing only.
 *
 * Persistence and the file-backed event sink live in @plinth/runtime-host.
 * The registry components built on this kernel live in @plinth/registry.
 */

// Types
export type {
  Address,
  Bytes32,
  CodeModule,
  ContractProgram,
  DistributionAddedEvent,
  DistributionRemovedEvent,
  ExecutionContext,
  Fingerprint,
  Hex,
  Initializer,
  InstantiatedEvent,
  InstantiationResult,
  KernelEvent,
  KernelEventName,
  LogRecord,
  OwnershipTransferredEvent,
  Program,
  ProgramResolver,
  RegisteredEvent,
  Selector,
  Version,
} from './types/index.js';
export { formatVersion, isAddress, isBytes32, isHex, parseVersion } from './types/index.js';

// Errors
export type { RevertArg } from './errors.js';
export { CodeNotFound, EncodingError, RevertError, hasRevertPayload } from './errors.js';

// Codec
export {
  EMPTY_BYTES,
  ZERO_ADDRESS,
  addressWord,
  asAddress,
  asBytes32,
  asHex,
  byteLength,
  bytesToHex,
  concatHex,
  decodeAddress,
  deriveAddress,
  fingerprintOf,
  hexToBytes,
  hexToUtf8,
  sha256,
  uintWord,
  utf8ToHex,
} from './codec/hex.js';
export type { Descriptor } from './codec/descriptor.js';
export { canonicalJson, decodeDescriptor, encodeDescriptor } from './codec/descriptor.js';

// State
export type { Checkpoint, LedgerRecord, LedgerSnapshot, LedgerValue } from './state/ledger.js';
export { Ledger, isLedgerRecord, isLedgerValue } from './state/ledger.js';
export { AccountStorage } from './state/account-storage.js';

// Host
export type { ExecutionHostOptions } from './host/execution-host.js';
export { CODE_SLOT, ExecutionHost, NONCE_SLOT } from './host/execution-host.js';

// Event sink interface (implementation lives in runtime-host)
export type { EventSink } from './logging/event-sink.js';
export { EventLogger } from './logging/event-logger.js';
