import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { InvocationFailure } from '../../errors.js';
import type { LaunchOutcome, ProcessLauncher } from '../kernel/contracts.js';

/** The part of a spawned child the launcher listens to. */
export interface LaunchedChild {
  once(event: 'error', listener: (error: Error & { code?: string }) => void): unknown;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
}

export type SpawnFn = (command: string, args: string[]) => LaunchedChild;

export interface NodeProcessLauncherOptions {
  /** Treat a non-zero exit or a terminating signal as an invocation failure (default true). */
  failOnNonZeroExit?: boolean;
  spawn?: SpawnFn;
  commandExists?: (command: string) => boolean;
}

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

/**
 * Check whether a command binary exists on PATH.
 * Returns true for paths that exist or binaries found in $PATH dirs. On
 * Windows a bare name also matches with any `PATHEXT` suffix (`python` finds
 * `python.exe`).
 */
export function commandExists(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): boolean {
  const windows = platform === 'win32';
  if (command.includes('/') || (windows && command.includes('\\'))) return existsSync(command);

  const suffixes = [''];
  if (windows) {
    for (const ext of (env.PATHEXT ?? DEFAULT_PATHEXT).split(';')) {
      if (ext !== '') suffixes.push(ext, ext.toLowerCase());
    }
  }
  const dirs = (env.PATH ?? env.Path ?? '').split(windows ? ';' : ':');
  return dirs.some((dir) => dir !== '' && suffixes.some((suffix) => existsSync(join(dir, `${command}${suffix}`))));
}

function inheritStdio(command: string, args: string[]): LaunchedChild {
  // Steps share the terminal; their output is not captured.
  return spawn(command, args, { stdio: 'inherit' });
}

function commandNotFound(tokens: readonly string[]): LaunchOutcome {
  return {
    ok: false,
    error: new InvocationFailure(
      `Command not found: "${tokens[0]}" is not installed on this system.`,
      'COMMAND_NOT_FOUND',
      { command: tokens },
    ),
  };
}

/**
 * Spawns each command without a shell and resolves once it closes. Spawn
 * errors always become an {@link InvocationFailure}; unsuccessful exits do
 * too unless `failOnNonZeroExit` is false.
 */
export class NodeProcessLauncher implements ProcessLauncher {
  private readonly failOnNonZeroExit: boolean;
  private readonly spawnChild: SpawnFn;
  private readonly exists: (command: string) => boolean;

  constructor(options: NodeProcessLauncherOptions = {}) {
    this.failOnNonZeroExit = options.failOnNonZeroExit ?? true;
    this.spawnChild = options.spawn ?? inheritStdio;
    this.exists = options.commandExists ?? commandExists;
  }

  launch(tokens: readonly string[]): Promise<LaunchOutcome> {
    const [command, ...args] = tokens;
    if (command === undefined || command === '') {
      return Promise.resolve({
        ok: false,
        error: new InvocationFailure('Cannot launch an empty command', 'SPAWN_ERROR', { command: tokens }),
      });
    }
    if (!this.exists(command)) {
      return Promise.resolve(commandNotFound(tokens));
    }

    return new Promise<LaunchOutcome>((resolve) => {
      let child: LaunchedChild;
      try {
        child = this.spawnChild(command, args);
      } catch (error) {
        resolve({
          ok: false,
          error: new InvocationFailure(
            `Failed to spawn command: ${error instanceof Error ? error.message : String(error)}`,
            'SPAWN_ERROR',
            { command: tokens },
          ),
        });
        return;
      }

      let settled = false;
      const settle = (outcome: LaunchOutcome): void => {
        if (!settled) {
          settled = true;
          resolve(outcome);
        }
      };

      child.once('error', (error) => {
        if (error.code === 'ENOENT') {
          settle(commandNotFound(tokens));
          return;
        }
        settle({
          ok: false,
          error: new InvocationFailure(`Failed to spawn command: ${error.message}`, 'SPAWN_ERROR', { command: tokens }),
        });
      });

      child.once('close', (code, signal) => {
        if (code === 0 || !this.failOnNonZeroExit) {
          settle({ ok: true, exitCode: code ?? -1 });
          return;
        }
        const message = signal
          ? `Command was terminated by ${signal}`
          : `Command exited with status ${code}`;
        settle({
          ok: false,
          error: new InvocationFailure(message, 'COMMAND_FAILED', {
            command: tokens,
            exitCode: code ?? undefined,
            signal: signal ?? undefined,
          }),
        });
      });
    });
  }
}
