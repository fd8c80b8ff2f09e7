/**
 * Unit tests for ExecaProcessSpawner
 */

import { describe, it, expect } from 'vitest';
import { ProcessStartError } from '@gpgpipe/core';
import { EventEmitter } from 'events';
import { ExecaProcessSpawner, waitForSpawn } from '../../../src/platform/ExecaProcessSpawner.js';

describe('ExecaProcessSpawner', () => {
  const spawner = new ExecaProcessSpawner();

  it('should start a process and report its exit', async () => {
    const child = await spawner.spawn(process.execPath, ['-e', 'process.exitCode = 3'], {
      pipeStdin: false,
      pipeStdout: false,
    });

    expect(child.pid).toBeGreaterThan(0);
    expect(child.stdin).toBeNull();
    expect(child.stdout).toBeNull();
    child.stderr.resume();
    await expect(child.exited).resolves.toEqual({ exitCode: 3, signal: null });
  });

  it('should open the requested pipes', async () => {
    const script = 'process.stdin.pipe(process.stdout)';
    const child = await spawner.spawn(process.execPath, ['-e', script], {
      pipeStdin: true,
      pipeStdout: true,
    });

    expect(child.stdin).not.toBeNull();
    expect(child.stdout).not.toBeNull();
    child.stdin?.end();
    child.stdout?.resume();
    child.stderr.resume();
    await expect(child.exited).resolves.toEqual({ exitCode: 0, signal: null });
  });

  it('should report a killed process with its signal', async () => {
    const child = await spawner.spawn(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], {
      pipeStdin: false,
      pipeStdout: false,
    });
    child.stderr.resume();

    child.kill();

    await expect(child.exited).resolves.toEqual({ exitCode: null, signal: 'SIGKILL' });
  });

  it('should reject with ProcessStartError when the executable does not exist', async () => {
    const missing = '/nonexistent/dir/gpg-missing';

    const error = await spawner
      .spawn(missing, [], { pipeStdin: false, pipeStdout: false })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessStartError);
    expect(error).toMatchObject({ executablePath: missing, code: 'ENOENT' });
  });

  describe('waitForSpawn', () => {
    it('should resolve true on spawn and remove its listeners', async () => {
      const child = new EventEmitter();
      const waiting = waitForSpawn(child, new Promise(() => undefined));

      child.emit('spawn');

      await expect(waiting).resolves.toBe(true);
      expect(child.listenerCount('spawn')).toBe(0);
      expect(child.listenerCount('error')).toBe(0);
    });

    it('should resolve false and stop listening when the process settles first', async () => {
      const child = new EventEmitter();

      await expect(waitForSpawn(child, Promise.resolve())).resolves.toBe(false);
      expect(child.listenerCount('spawn')).toBe(0);
      expect(child.listenerCount('error')).toBe(0);
    });

    it('should reject with an error emitted before spawning', async () => {
      const child = new EventEmitter();
      const failure = new Error('spawn ENOENT');
      const waiting = waitForSpawn(child, new Promise(() => undefined));

      child.emit('error', failure);

      await expect(waiting).rejects.toBe(failure);
    });
  });
});
