/**
 * Platform-agnostic process spawning interface
 * Implementation uses execa
 */

import type { Readable, Writable } from 'stream';

export interface SpawnOptions {
  /**
   * Open a pipe to the child's standard input
   */
  pipeStdin: boolean;

  /**
   * Open a pipe from the child's standard output
   */
  pipeStdout: boolean;

  cwd?: string;
  env?: Record<string, string>;
}

export interface ProcessExit {
  /**
   * Exit status, or null when the process was terminated by a signal
   */
  exitCode: number | null;
  signal: string | null;
}

/**
 * A running child process. The error stream is always piped.
 */
export interface SpawnedProcess {
  readonly pid: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable;

  /**
   * Settles once the process has exited and been reaped
   */
  readonly exited: Promise<ProcessExit>;

  /**
   * Forcibly terminate the process
   */
  kill(): void;
}

export interface IProcessSpawner {
  /**
   * Start the executable. Resolves once the process is running and rejects
   * with ProcessStartError when it cannot be started.
   */
  spawn(
    executablePath: string,
    args: readonly string[],
    options: SpawnOptions
  ): Promise<SpawnedProcess>;
}
