/**
 * Console and process spies for CLI command tests
 */

import { vi, type MockInstance } from 'vitest';

export interface CliSpies {
  log: MockInstance<typeof console.log>;
  error: MockInstance<typeof console.error>;
  exit: MockInstance<typeof process.exit>;
  /** Everything printed with console.log, one call per line */
  stdout(): string[];
  /** Everything printed with console.error, one call per line */
  stderr(): string[];
  restore(): void;
}

function lines(calls: unknown[][]): string[] {
  return calls.map(call => call.map(String).join(' '));
}

export function spyOnCli(): CliSpies {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});
  const exit = vi.spyOn(process, 'exit').mockImplementation((() => undefined) as never);

  return {
    log,
    error,
    exit,
    stdout: () => lines(log.mock.calls),
    stderr: () => lines(error.mock.calls),
    restore: () => {
      log.mockRestore();
      error.mockRestore();
      exit.mockRestore();
    },
  };
}
