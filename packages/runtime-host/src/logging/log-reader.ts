/**
 * Plinth Runtime Host — LogReader
 *
 * Reads events.jsonl with dedupe-on-read. Pure: callers obtain the raw text
 * through StateIO.readLogRaw().
 *
 *   LOGR-U1: valid lines are parsed; malformed lines are counted in parseErrors
 *   LOGR-U2: duplicates by event_id are dropped, first occurrence wins
 *   LOGR-U3: content not ending in '\n' has its last (partial) line dropped and flagged
 *   LOGR-U4: more than one timestamp regression in file order flags outOfOrder
 *   LOGR-U5: output is sorted by (timestamp, index, event_id)
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One parsed line. Envelope fields are typed; the event payload stays in `fields`. */
export interface LogEvent {
  readonly event_id: string;
  readonly timestamp: string | undefined;
  /** Position in the ledger's committed log. */
  readonly index: number | undefined;
  readonly emitter: string | undefined;
  readonly name: string | undefined;
  readonly fields: Readonly<Record<string, unknown>>;
}

const ENVELOPE = new Set(['event_id', 'timestamp', 'index', 'emitter', 'name']);

export interface LogReadStats {
  /** Non-empty lines processed, excluding a dropped partial line. */
  readonly totalLines: number;
  readonly parsedEvents: number;
  readonly duplicates: number;
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
  /** A single regression is tolerated as clock skew. */
  readonly outOfOrder: boolean;
}

export interface LogReadResult {
  readonly events: ReadonlyArray<LogEvent>;
  readonly stats: LogReadStats;
}

export interface LogFilter {
  /** Keep only events with this name. */
  readonly name?: string | undefined;
  /** Keep only events from this emitter. */
  readonly emitter?: string | undefined;
  /** Keep the most recent N events. */
  readonly limit?: number | undefined;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readLog(rawContent: string): LogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const ordered: LogEvent[] = [];

  for (const line of lines) {
    const event = parseLine(line);
    if (event === undefined) {
      parseErrors++;
    } else if (seen.has(event.event_id)) {
      duplicates++;
    } else {
      seen.add(event.event_id);
      ordered.push(event);
    }
  }

  let regressions = 0;
  let previous: string | undefined;
  for (const event of ordered) {
    if (previous !== undefined && event.timestamp !== undefined && event.timestamp < previous) {
      regressions++;
    }
    previous = event.timestamp ?? previous;
  }

  return {
    events: [...ordered].sort(compareEvents),
    stats: {
      totalLines: lines.length,
      parsedEvents: ordered.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}

/** Apply name / emitter filters, then keep the last `limit` events. */
export function filterLog(events: ReadonlyArray<LogEvent>, filter: LogFilter): ReadonlyArray<LogEvent> {
  const matched = events.filter(
    (e) =>
      (filter.name === undefined || e.name === filter.name) &&
      (filter.emitter === undefined || e.emitter === filter.emitter),
  );
  return filter.limit === undefined ? matched : matched.slice(Math.max(0, matched.length - filter.limit));
}

function parseLine(line: string): LogEvent | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err: unknown) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return undefined;
  if (!('event_id' in parsed) || typeof parsed.event_id !== 'string') return undefined;

  const timestamp: unknown = Reflect.get(parsed, 'timestamp');
  const index: unknown = Reflect.get(parsed, 'index');
  const emitter: unknown = Reflect.get(parsed, 'emitter');
  const name: unknown = Reflect.get(parsed, 'name');
  if (timestamp !== undefined && typeof timestamp !== 'string') return undefined;
  if (index !== undefined && typeof index !== 'number') return undefined;
  if (emitter !== undefined && typeof emitter !== 'string') return undefined;
  if (name !== undefined && typeof name !== 'string') return undefined;

  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!ENVELOPE.has(key)) fields[key] = value;
  }
  return { event_id: parsed.event_id, timestamp, index, emitter, name, fields };
}

function compareEvents(a: LogEvent, b: LogEvent): number {
  const ta = a.timestamp ?? '';
  const tb = b.timestamp ?? '';
  if (ta !== tb) return ta < tb ? -1 : 1;
  const ia = a.index ?? -1;
  const ib = b.index ?? -1;
  if (ia !== ib) return ia - ib;
  if (a.event_id === b.event_id) return 0;
  return a.event_id < b.event_id ? -1 : 1;
}
