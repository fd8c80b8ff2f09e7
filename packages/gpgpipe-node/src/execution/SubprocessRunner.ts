/**
 * Subprocess runner - executes a non-interactive command-line program
 *
 * Four activities run concurrently for every invocation:
 * - input pump (caller stream -> stdin, then stdin is closed; ends early if the process
 *   closes stdin or exits first)
 * - output pump (stdout -> caller stream)
 * - error capture (stderr -> text, always)
 * - exit watcher (waits for exit, kills the process when the time limit expires)
 *
 * run() settles only after all four have finished, so no copy is ever abandoned.
 */

import type { Readable, Writable } from 'stream';
import { setTimeout as delay } from 'timers/promises';
import {
  AggregateExecutionError,
  ProcessExecutionError,
  ProcessTimeoutError,
  UnsupportedStreamError,
  silentLogger,
  tokenizeArgumentLine,
} from '@gpgpipe/core';
import type {
  ILogger,
  Invocation,
  IProcessSpawner,
  ISubprocessRunner,
  ProcessExit,
  RunOptions,
  SpawnedProcess,
} from '@gpgpipe/core';
import { ExecaProcessSpawner } from '../platform/ExecaProcessSpawner.js';
import { StreamPump, assertReadable, assertWritable } from '../platform/StreamPump.js';

// Longest delay a Node.js timer accepts; anything above waits indefinitely
const MAX_TIMER_DELAY_MS = 2_147_483_647;

const TIMED_OUT = Symbol('timed-out');

// Raised by the input pump once the process end of stdin is gone
const CLOSED_PIPE_CODES = new Set<string | undefined>([
  'EPIPE',
  'ECONNRESET',
  'EOF',
  'ERR_STREAM_PREMATURE_CLOSE',
  'ERR_STREAM_DESTROYED',
]);

export interface SubprocessRunnerOptions {
  spawner?: IProcessSpawner;
  logger?: ILogger;
  /**
   * Working directory for every process started by this runner
   */
  cwd?: string;
  /**
   * Extra environment variables for every process started by this runner
   */
  env?: Record<string, string>;
}

export class SubprocessRunner implements ISubprocessRunner {
  private readonly spawner: IProcessSpawner;
  private readonly logger: ILogger;

  constructor(private readonly options: SubprocessRunnerOptions = {}) {
    this.spawner = options.spawner ?? new ExecaProcessSpawner();
    this.logger = options.logger ?? silentLogger;
  }

  async run(invocation: Invocation): Promise<void> {
    const { executablePath, argumentLine, input, output } = invocation;
    const timeoutMs = normalizeTimeout(invocation.timeoutMs);

    if (input) {
      assertReadable(input);
    }
    if (output) {
      assertWritable(output);
    }

    const args = tokenizeArgumentLine(argumentLine);
    const processName = processNameOf(executablePath);
    const startedAt = Date.now();

    this.logger.debug('Starting process', {
      executable: executablePath,
      argumentCount: args.length,
      timeoutMs: Number.isFinite(timeoutMs) ? timeoutMs : undefined,
    });

    const child = await this.spawner.spawn(executablePath, args, {
      pipeStdin: Boolean(input),
      pipeStdout: Boolean(output),
      cwd: this.options.cwd,
      env: this.options.env,
    });

    const settled = await Promise.allSettled([
      copyInput(child, input),
      copyOutput(child, output),
      readErrorStream(child.stderr),
      this.waitForExit(child, timeoutMs, processName),
    ]);
    const [, , errorResult, exitResult] = settled;

    const failures = settled
      .flatMap((result) => (result.status === 'rejected' ? [result.reason] : []))
      .flatMap((failure: unknown) =>
        failure instanceof AggregateError ? failure.errors : [failure]
      );

    if (failures.length === 1) {
      throw failures[0];
    }
    if (failures.length > 1) {
      this.logger.debug('Process activities failed concurrently', {
        executable: executablePath,
        failures: failures.length,
      });
      throw new AggregateExecutionError(failures);
    }

    if (errorResult.status === 'fulfilled' && exitResult.status === 'fulfilled') {
      const exit = exitResult.value;
      const stderr = errorResult.value;

      this.logger.debug('Process exited', {
        executable: executablePath,
        exitCode: exit.exitCode,
        signal: exit.signal,
        durationMs: Date.now() - startedAt,
      });

      // A non-zero exit with nothing on stderr counts as success
      if (exit.exitCode !== 0 && stderr.trim().length > 0) {
        throw new ProcessExecutionError(stderr, exit.exitCode);
      }
    }
  }

  /**
   * Run an executable with an argument line; convenience over run()
   */
  async runCommandLine(
    executablePath: string,
    argumentLine: string,
    options: RunOptions = {}
  ): Promise<void> {
    await this.run({ executablePath, argumentLine, ...options });
  }

  private async waitForExit(
    child: SpawnedProcess,
    timeoutMs: number,
    processName: string
  ): Promise<ProcessExit> {
    if (!Number.isFinite(timeoutMs)) {
      return child.exited;
    }

    const timer = new AbortController();
    let outcome: ProcessExit | typeof TIMED_OUT;
    try {
      outcome = await Promise.race([
        child.exited,
        delay(timeoutMs, TIMED_OUT, { signal: timer.signal }),
      ]);
    } finally {
      timer.abort();
    }

    if (outcome !== TIMED_OUT) {
      return outcome;
    }

    this.logger.warn('Process exceeded its time limit; terminating', {
      process: processName,
      pid: child.pid,
      timeoutMs,
    });
    child.kill();

    // The pumps finish once the process is gone
    await child.exited;
    throw new ProcessTimeoutError(timeoutMs, processName);
  }
}

async function copyInput(child: SpawnedProcess, input: Readable | null | undefined): Promise<void> {
  if (!input) {
    return;
  }
  if (!child.stdin) {
    throw new UnsupportedStreamError(
      'The standard input of the process is not available.',
      'destination'
    );
  }
  const closedByProcess = watchInputClosure(input, child.stdin);
  try {
    await new StreamPump(input, child.stdin, { endDestination: true }).run();
  } catch (error) {
    // The process exited or stopped reading; whatever input is left is discarded
    if (closedByProcess() && CLOSED_PIPE_CODES.has(errorCode(error))) {
      return;
    }
    throw error;
  }
}

/**
 * Report whether stdin went away before the caller's input did
 */
function watchInputClosure(input: Readable, stdin: Writable): () => boolean {
  let inputClosed = false;
  let stdinClosedFirst = false;
  const onStdinGone = (): void => {
    if (!inputClosed) {
      stdinClosedFirst = true;
    }
  };

  input.once('close', () => {
    inputClosed = true;
  });
  stdin.once('close', onStdinGone);
  stdin.once('error', onStdinGone);

  return () => stdinClosedFirst;
}

function errorCode(error: unknown): string | undefined {
  return typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
    ? error.code
    : undefined;
}

async function copyOutput(
  child: SpawnedProcess,
  output: Writable | null | undefined
): Promise<void> {
  if (!output) {
    return;
  }
  if (!child.stdout) {
    throw new UnsupportedStreamError(
      'The standard output of the process is not available.',
      'source'
    );
  }
  await new StreamPump(child.stdout, output).run();
}

async function readErrorStream(stderr: Readable): Promise<string> {
  stderr.setEncoding('utf-8');
  let text = '';
  for await (const chunk of stderr) {
    text += typeof chunk === 'string' ? chunk : String(chunk);
  }
  return text;
}

function normalizeTimeout(timeoutMs: number | undefined): number {
  if (timeoutMs === undefined) {
    return Infinity;
  }
  if (Number.isNaN(timeoutMs) || timeoutMs < 0) {
    throw new RangeError(
      `Invalid timeout: ${timeoutMs}. Expected a non-negative number of milliseconds.`
    );
  }
  return timeoutMs > MAX_TIMER_DELAY_MS ? Infinity : timeoutMs;
}

function processNameOf(executablePath: string): string {
  const fileName = executablePath.split(/[\\/]/).pop() ?? executablePath;
  return fileName.replace(/\.exe$/i, '');
}
