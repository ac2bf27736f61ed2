import { vi } from 'vitest';
import type { Command } from 'commander';
import { createProgram } from '../src/index.js';

export interface RunResult {
  readonly out: ReadonlyArray<string>;
  readonly err: ReadonlyArray<string>;
  readonly exitCode: number | undefined;
}

const ANSI = /\u001b\[[0-9;]*m/g;
const strip = (value: unknown): string => String(value).replace(ANSI, '');

/** Commander settings are not inherited through addCommand(); apply them everywhere. */
function quiet(command: Command): void {
  command.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} });
  for (const sub of command.commands) quiet(sub);
}

/** Parse `args` with a fresh program and capture console output, colors stripped. */
export function run(args: ReadonlyArray<string>): RunResult {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});
  process.exitCode = undefined;
  try {
    const program = createProgram();
    quiet(program);
    program.parse([...args], { from: 'user' });
    return {
      out: log.mock.calls.map((call) => strip(call[0])),
      err: error.mock.calls.map((call) => strip(call[0])),
      exitCode: typeof process.exitCode === 'number' ? process.exitCode : undefined,
    };
  } finally {
    log.mockRestore();
    error.mockRestore();
    process.exitCode = undefined;
  }
}
