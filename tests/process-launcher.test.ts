import { EventEmitter } from 'node:events';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, test } from 'vitest';
import { NodeProcessLauncher, commandExists, type SpawnFn } from '../src/core/pipeline/process-launcher.js';
import { InvocationFailure } from '../src/errors.js';
import type { LaunchOutcome } from '../src/core/kernel/contracts.js';

class FakeChild extends EventEmitter {}

function recordingSpawn() {
  const spawned: Array<{ command: string; args: string[]; child: FakeChild }> = [];
  const spawn: SpawnFn = (command, args) => {
    const child = new FakeChild();
    spawned.push({ command, args, child });
    return child;
  };
  return { spawn, spawned };
}

function failureOf(outcome: LaunchOutcome): InvocationFailure {
  if (outcome.ok) {
    throw new Error('expected a failed launch');
  }
  return outcome.error;
}

describe('NodeProcessLauncher', () => {
  test('spawns the interpreter with the remaining tokens and resolves on exit 0', async () => {
    const { spawn, spawned } = recordingSpawn();
    const launcher = new NodeProcessLauncher({ spawn, commandExists: () => true });

    const pending = launcher.launch(['hive', '-f', '/pipeline/2-tables.hql']);
    expect(spawned).toHaveLength(1);
    expect(spawned[0].command).toBe('hive');
    expect(spawned[0].args).toEqual(['-f', '/pipeline/2-tables.hql']);
    spawned[0].child.emit('close', 0, null);

    await expect(pending).resolves.toEqual({ ok: true, exitCode: 0 });
  });

  test('treats a non-zero exit as a failure by default', async () => {
    const { spawn, spawned } = recordingSpawn();
    const launcher = new NodeProcessLauncher({ spawn, commandExists: () => true });

    const pending = launcher.launch(['bash', '1-a.sh']);
    spawned[0].child.emit('close', 3, null);
    const error = failureOf(await pending);

    expect(error).toBeInstanceOf(InvocationFailure);
    expect(error.code).toBe('COMMAND_FAILED');
    expect(error.message).toBe('Command exited with status 3');
    expect(error.exitCode).toBe(3);
    expect(error.command).toEqual(['bash', '1-a.sh']);
  });

  test('can count a non-zero exit as a success', async () => {
    const { spawn, spawned } = recordingSpawn();
    const launcher = new NodeProcessLauncher({ spawn, commandExists: () => true, failOnNonZeroExit: false });

    const pending = launcher.launch(['bash', '1-a.sh']);
    spawned[0].child.emit('close', 1, null);

    await expect(pending).resolves.toEqual({ ok: true, exitCode: 1 });
  });

  test('reports a terminating signal', async () => {
    const { spawn, spawned } = recordingSpawn();
    const launcher = new NodeProcessLauncher({ spawn, commandExists: () => true });

    const pending = launcher.launch(['python', '2-b.py']);
    spawned[0].child.emit('close', null, 'SIGTERM');
    const error = failureOf(await pending);

    expect(error.message).toBe('Command was terminated by SIGTERM');
    expect(error.signal).toBe('SIGTERM');
    expect(error.exitCode).toBeUndefined();
  });

  test('maps ENOENT from the child to COMMAND_NOT_FOUND', async () => {
    const { spawn, spawned } = recordingSpawn();
    const launcher = new NodeProcessLauncher({ spawn, commandExists: () => true });

    const pending = launcher.launch(['Rscript', '5-plot.R']);
    spawned[0].child.emit('error', Object.assign(new Error('spawn Rscript ENOENT'), { code: 'ENOENT' }));
    spawned[0].child.emit('close', -2, null);
    const error = failureOf(await pending);

    expect(error.code).toBe('COMMAND_NOT_FOUND');
    expect(error.message).toBe('Command not found: "Rscript" is not installed on this system.');
  });

  test('maps other spawn errors to SPAWN_ERROR', async () => {
    const { spawn, spawned } = recordingSpawn();
    const launcher = new NodeProcessLauncher({ spawn, commandExists: () => true });

    const pending = launcher.launch(['bash', '1-a.sh']);
    spawned[0].child.emit('error', Object.assign(new Error('spawn bash EACCES'), { code: 'EACCES' }));
    const error = failureOf(await pending);

    expect(error.code).toBe('SPAWN_ERROR');
    expect(error.message).toBe('Failed to spawn command: spawn bash EACCES');
  });

  test('does not spawn a command missing from PATH', async () => {
    const { spawn, spawned } = recordingSpawn();
    const launcher = new NodeProcessLauncher({ spawn, commandExists: () => false });

    const error = failureOf(await launcher.launch(['scala', '4-job.scala']));

    expect(spawned).toHaveLength(0);
    expect(error.code).toBe('COMMAND_NOT_FOUND');
  });

  test('turns a throwing spawn into SPAWN_ERROR', async () => {
    const launcher = new NodeProcessLauncher({
      spawn: () => {
        throw new Error('bad options');
      },
      commandExists: () => true,
    });

    const error = failureOf(await launcher.launch(['bash', '1-a.sh']));

    expect(error.code).toBe('SPAWN_ERROR');
    expect(error.message).toBe('Failed to spawn command: bad options');
  });

  test('rejects an empty command', async () => {
    const { spawn, spawned } = recordingSpawn();
    const launcher = new NodeProcessLauncher({ spawn, commandExists: () => true });

    const error = failureOf(await launcher.launch([]));

    expect(spawned).toHaveLength(0);
    expect(error.code).toBe('SPAWN_ERROR');
  });
});

describe('commandExists', () => {
  test('checks explicit paths directly', () => {
    expect(commandExists(process.execPath)).toBe(true);
    expect(commandExists('/definitely/not/here/interpreter')).toBe(false);
  });

  test('searches PATH directories for a bare name', () => {
    const bin = mkdtempSync(join(tmpdir(), 'prefixrun-bin-'));
    writeFileSync(join(bin, 'Rscript'), '');

    expect(commandExists('Rscript', { PATH: `/missing:${bin}` }, 'linux')).toBe(true);
    expect(commandExists('hive', { PATH: bin }, 'linux')).toBe(false);
  });

  test('tries PATHEXT suffixes on Windows', () => {
    const bin = mkdtempSync(join(tmpdir(), 'prefixrun-bin-'));
    writeFileSync(join(bin, 'python.exe'), '');

    expect(commandExists('python', { PATH: bin, PATHEXT: '.COM;.EXE;.CMD' }, 'win32')).toBe(true);
    expect(commandExists('python', { PATH: bin }, 'win32')).toBe(true);
    expect(commandExists('python', { PATH: bin, PATHEXT: '.CMD' }, 'win32')).toBe(false);
    expect(commandExists('python', { PATH: bin, PATHEXT: '.EXE' }, 'linux')).toBe(false);
  });
});
