/**
 * Subprocess invocation contracts
 */

import type { Readable, Writable } from 'stream';

/**
 * One request to run an executable with an argument line, optional streams and a time limit
 */
export interface Invocation {
  /**
   * Resolved path of the executable
   */
  readonly executablePath: string;

  /**
   * Assembled argument line; split with tokenizeArgumentLine
   */
  readonly argumentLine: string;

  /**
   * Fed to the process's standard input, which is then closed
   */
  readonly input?: Readable | null;

  /**
   * Receives the process's standard output; left open afterwards
   */
  readonly output?: Writable | null;

  /**
   * Time limit in milliseconds; undefined or Infinity waits indefinitely
   */
  readonly timeoutMs?: number;
}

export type RunOptions = Omit<Invocation, 'executablePath' | 'argumentLine'>;

export interface ISubprocessRunner {
  /**
   * Resolves when the process completed successfully; rejects with the failure otherwise.
   * Never settles while any of its streams is still being copied.
   */
  run(invocation: Invocation): Promise<void>;
}
