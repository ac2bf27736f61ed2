/**
 * Plinth Kernel — Event Logger
 *
 * Forwards committed log records to an injected EventSink. Without a sink
 * (tests, embedded use) record() is a no-op; the records still live in the
 * ledger and can be read back from ExecutionHost.logs().
 */

import type { LogRecord } from '../types/event.js';
import type { EventSink } from './event-sink.js';

export class EventLogger {
  constructor(private readonly sink?: EventSink) {}

  record(record: LogRecord): void {
    this.sink?.append(record);
  }

  recordAll(records: ReadonlyArray<LogRecord>): void {
    for (const record of records) {
      this.record(record);
    }
  }
}
