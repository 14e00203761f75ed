import { InvocationFailure } from '../src/errors.js';
import type { DirectoryReader, LaunchOutcome, ProcessLauncher } from '../src/core/kernel/contracts.js';

export interface FakeReader extends DirectoryReader {
  calls: string[];
}

export function fakeReader(names: string[]): FakeReader {
  const calls: string[] = [];
  return {
    calls,
    list: async (directory) => {
      calls.push(directory);
      return [...names];
    },
  };
}

/**
 * Records every invocation and fails the ones whose target ends with a
 * name registered through {@link FakeLauncher.failOn}.
 */
export class FakeLauncher implements ProcessLauncher {
  readonly calls: string[][] = [];
  private readonly failing = new Set<string>();

  failOn(fileName: string): this {
    this.failing.add(fileName);
    return this;
  }

  clearFailures(): void {
    this.failing.clear();
  }

  async launch(tokens: readonly string[]): Promise<LaunchOutcome> {
    this.calls.push([...tokens]);
    const target = tokens[tokens.length - 1] ?? '';
    for (const name of this.failing) {
      if (target.endsWith(name)) {
        return {
          ok: false,
          error: new InvocationFailure('Command exited with status 1', 'COMMAND_FAILED', { command: tokens, exitCode: 1 }),
        };
      }
    }
    return { ok: true, exitCode: 0 };
  }
}

/** A clock that advances `stepMs` on every read, starting at `start`. */
export function steppingClock(start: Date = new Date(2026, 0, 5, 9, 30, 0), stepMs = 30_000): () => Date {
  let current = start.getTime();
  return () => {
    const value = new Date(current);
    current += stepMs;
    return value;
  };
}
