/**
 * @plinth/runtime-host
 *
 * Plinth runtime host — every side effect of the system lives here: state
 * files, the JSONL event log, and home directory resolution. Depends on
 * @plinth/kernel for types and interfaces. No kernel or registry code imports
 * from this package.
 */

// StateIO — home-scoped I/O abstraction
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Ledger and deployment persistence
export type { Deployment } from './state/ledger-store.js';
export {
  DEPLOYMENT_FILE,
  LEDGER_FILE,
  StateCorruptedError,
  loadDeployment,
  loadLedger,
  parseKernelEvent,
  saveDeployment,
  saveLedger,
} from './state/ledger-store.js';

// Home and operator resolution
export type { ResolveHomeOptions, ResolveOperatorOptions } from './home.js';
export { DEFAULT_OPERATOR, resolveOperator, resolvePlinthHome } from './home.js';

// Event log
export type { FileEventSinkOptions } from './logging/file-event-sink.js';
export { EVENTS_LOG, FileEventSink } from './logging/file-event-sink.js';
export type { RandomSource } from './logging/ulid.js';
export { ulid } from './logging/ulid.js';
export type { LogEvent, LogFilter, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { filterLog, readLog } from './logging/log-reader.js';
