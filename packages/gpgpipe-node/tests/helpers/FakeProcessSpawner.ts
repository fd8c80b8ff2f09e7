/**
 * In-process stand-in for a spawned child: PassThrough streams and a manually settled exit
 */

import { PassThrough } from 'stream';
import type { IProcessSpawner, ProcessExit, SpawnedProcess, SpawnOptions } from '@gpgpipe/core';

export class FakeProcess implements SpawnedProcess {
  readonly pid = 4242;
  readonly stdin: PassThrough | null;
  readonly stdout: PassThrough | null;
  readonly stderr = new PassThrough();
  readonly exited: Promise<ProcessExit>;
  killed = false;
  private resolveExit: (exit: ProcessExit) => void = () => undefined;

  constructor(options: SpawnOptions) {
    this.stdin = options.pipeStdin ? new PassThrough() : null;
    this.stdout = options.pipeStdout ? new PassThrough() : null;
    this.exited = new Promise<ProcessExit>((resolve) => {
      this.resolveExit = resolve;
    });
  }

  /**
   * Write stderr text, close the output streams and report the exit
   */
  exit(exitCode: number | null, stderr = '', signal: string | null = null): void {
    if (stderr.length > 0 && !this.stderr.destroyed) {
      this.stderr.write(stderr);
    }
    for (const stream of [this.stdout, this.stderr]) {
      if (stream && !stream.destroyed) {
        stream.end();
      }
    }
    this.resolveExit({ exitCode, signal });
  }

  /**
   * Close stdin from the process side, as a process that stops reading does
   */
  closeInput(): void {
    this.stdin?.destroy();
  }

  kill(): void {
    this.killed = true;
    this.closeInput();
    this.exit(null, '', 'SIGKILL');
  }
}

export interface SpawnCall {
  executablePath: string;
  args: readonly string[];
  options: SpawnOptions;
}

export class FakeProcessSpawner implements IProcessSpawner {
  readonly calls: SpawnCall[] = [];
  readonly processes: FakeProcess[] = [];

  async spawn(
    executablePath: string,
    args: readonly string[],
    options: SpawnOptions
  ): Promise<SpawnedProcess> {
    this.calls.push({ executablePath, args, options });
    const child = new FakeProcess(options);
    this.processes.push(child);
    return child;
  }

  get lastProcess(): FakeProcess {
    const child = this.processes.at(-1);
    if (!child) {
      throw new Error('No process has been spawned');
    }
    return child;
  }
}
