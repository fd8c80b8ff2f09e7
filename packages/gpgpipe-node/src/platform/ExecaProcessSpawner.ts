/**
 * ExecaProcessSpawner - starts child processes for the subprocess runner
 * Uses execa for reliable cross-platform process creation
 */

import { once, type EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';
import { execa, type ExecaChildProcess } from 'execa';
import { ProcessStartError } from '@gpgpipe/core';
import type { IProcessSpawner, ProcessExit, SpawnedProcess, SpawnOptions } from '@gpgpipe/core';

class ExecaSpawnedProcess implements SpawnedProcess {
  readonly exited: Promise<ProcessExit>;

  constructor(
    private readonly subprocess: ExecaChildProcess,
    readonly stderr: Readable
  ) {
    this.exited = subprocess.then((result) => ({
      // execa leaves exitCode unset when a signal ended the process
      exitCode: typeof result.exitCode === 'number' ? result.exitCode : null,
      signal: result.signal ?? null,
    }));
  }

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  get stdin(): Writable | null {
    return this.subprocess.stdin;
  }

  get stdout(): Readable | null {
    return this.subprocess.stdout;
  }

  kill(): void {
    this.subprocess.kill('SIGKILL');
  }
}

export class ExecaProcessSpawner implements IProcessSpawner {
  async spawn(
    executablePath: string,
    args: readonly string[],
    options: SpawnOptions
  ): Promise<SpawnedProcess> {
    const subprocess = execa(executablePath, args, {
      cwd: options.cwd,
      env: options.env,
      stdin: options.pipeStdin ? 'pipe' : 'ignore',
      stdout: options.pipeStdout ? 'pipe' : 'ignore',
      stderr: 'pipe',
      buffer: false, // Streams are consumed by the runner
      reject: false, // Exit status is evaluated by the runner
      windowsHide: true,
    });

    let started: boolean;
    try {
      started = await waitForSpawn(subprocess, subprocess);
    } catch (error) {
      await subprocess;
      throw toStartError(executablePath, error);
    }

    if (!started) {
      throw toStartError(executablePath, await subprocess);
    }

    if (!subprocess.stderr) {
      subprocess.kill('SIGKILL');
      await subprocess;
      throw new ProcessStartError(
        `The error stream of ${executablePath} could not be opened.`,
        executablePath
      );
    }

    return new ExecaSpawnedProcess(subprocess, subprocess.stderr);
  }
}

/**
 * Resolve true once the child has spawned, false if `settled` finishes first;
 * rejects when the child emits 'error' before spawning
 */
export async function waitForSpawn(
  child: EventEmitter,
  settled: PromiseLike<unknown>
): Promise<boolean> {
  const spawnWatch = new AbortController();
  try {
    return await Promise.race([
      once(child, 'spawn', { signal: spawnWatch.signal }).then(() => true),
      // execa settles without ever spawning when the arguments are rejected up front
      Promise.resolve(settled).then(() => false),
    ]);
  } finally {
    spawnWatch.abort();
  }
}

function toStartError(executablePath: string, error: unknown): ProcessStartError {
  const code =
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
      ? error.code
      : undefined;
  const reason = error instanceof Error ? error.message : String(error);

  return new ProcessStartError(
    `Failed to start ${executablePath}: ${reason}`,
    executablePath,
    code
  );
}
