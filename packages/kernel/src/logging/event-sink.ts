/**
 * Plinth Kernel — Event Sink Interface
 *
 * The injection point for event persistence. The kernel owns the contract;
 * the runtime host provides the file-backed implementation. The kernel never
 * writes to disk itself.
 *
 * A sink only ever receives committed records, in log order, each exactly
 * once per process.
 */

import type { LogRecord } from '../types/event.js';

export interface EventSink {
  append(record: LogRecord): void;
}
