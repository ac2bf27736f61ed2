/**
 * plinth log — Query the committed event log
 *
 * Reads <home>/logs/events.jsonl (deduplicated by event_id, ordered by
 * timestamp then ledger index) and prints the matching events.
 */

import { Command } from 'commander';
import { EVENTS_LOG, filterLog, readLog } from '@plinth/runtime-host';
import type { Address } from '@plinth/kernel';
import { openRuntime } from '../runtime.js';
import { eventColor, t } from '../theme.js';
import { globalOptions, guarded, parseAddress, parseCount, print, printJson } from './support.js';

interface LogOptions {
  event?: string;
  emitter?: Address;
  limit: number;
  json?: boolean;
}

export function createLogCommand(): Command {
  return new Command('log')
    .description('Query the event log')
    .option('--event <name>', 'Filter by event name (e.g. Instantiated)')
    .option('--emitter <address>', 'Filter by emitting contract', parseAddress)
    .option('--limit <n>', 'Show only the most recent n events', parseCount, 100)
    .option('--json', 'Output as JSON')
    .action(guarded((options: LogOptions, command: Command) => {
      const rt = openRuntime(globalOptions(command));
      const { events, stats } = readLog(rt.io.readLogRaw(EVENTS_LOG));
      const shown = filterLog(events, { name: options.event, emitter: options.emitter, limit: options.limit });

      if (options.json === true) {
        printJson(shown.map((e) => ({
          event_id: e.event_id,
          timestamp: e.timestamp,
          index: e.index,
          emitter: e.emitter,
          name: e.name,
          ...e.fields,
        })));
        return;
      }

      if (stats.parseErrors > 0 || stats.partialTrailingLine) {
        // eslint-disable-next-line no-console
        console.error(t.amber(`warning: skipped ${stats.parseErrors} malformed line(s)` +
          (stats.partialTrailingLine ? ' and a partial trailing line' : '')));
      }
      if (shown.length === 0) {
        print(t.muted('(no events)'));
        return;
      }
      for (const e of shown) {
        const name = e.name ?? '?';
        print(
          t.dim(e.timestamp ?? '-') + '  ' +
          t.muted(`#${e.index ?? '?'}`) + '  ' +
          eventColor(e.name)(name.padEnd(20)) + ' ' +
          t.text(JSON.stringify(e.fields)),
        );
      }
    }));
}
