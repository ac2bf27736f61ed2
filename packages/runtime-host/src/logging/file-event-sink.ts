/**
 * Plinth Runtime Host — File-backed Event Sink
 *
 * Implements the EventSink interface from @plinth/kernel by appending one
 * JSONL line per committed event to `logs/events.jsonl`:
 *
 *   { event_id, timestamp, index, emitter, name, ...event fields }
 *
 * The kernel only forwards events once the outermost transaction commits,
 * so nothing written here is ever rolled back. The ledger stays the source
 * of truth; this log is the operator-facing audit trail.
 */

import type { EventSink, LogRecord } from '@plinth/kernel';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export const EVENTS_LOG = 'events.jsonl';

export interface FileEventSinkOptions {
  /** Wall clock for the `timestamp` field. Defaults to the system clock. */
  readonly clock?: (() => Date) | undefined;
  /** Event id generator. Defaults to ulid(). */
  readonly nextId?: (() => string) | undefined;
}

export class FileEventSink implements EventSink {
  private readonly clock: () => Date;
  private readonly nextId: () => string;

  constructor(
    private readonly stateIO: StateIO,
    options: FileEventSinkOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.nextId = options.nextId ?? (() => ulid());
  }

  append(record: LogRecord): void {
    const { name, ...fields } = record.event;
    const line = JSON.stringify({
      event_id: this.nextId(),
      timestamp: this.clock().toISOString(),
      index: record.index,
      emitter: record.emitter,
      name,
      ...fields,
    });
    this.stateIO.appendLine(EVENTS_LOG, line);
  }
}
