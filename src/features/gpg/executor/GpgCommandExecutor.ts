/**
 * GpgCommandExecutor - runs GpgCommand instances against a gpg executable
 */

import { ResultType, beginOperation, endVoidOperation, silentLogger } from '@gpgpipe/core';
import type {
  AsyncCallback,
  AsyncHandle,
  AsyncOperation,
  ILogger,
  ISubprocessRunner,
  RunOptions,
} from '@gpgpipe/core';
import { SubprocessRunner } from '@gpgpipe/node';
import type { GpgCommand } from '../command/GpgCommand.js';
import type { GpgPathFinder } from '../discovery/GpgPathFinder.js';

export interface GpgCommandExecutorOptions {
  runner?: ISubprocessRunner;
  logger?: ILogger;
}

export class GpgCommandExecutor {
  private readonly runner: ISubprocessRunner;
  private readonly logger: ILogger;

  constructor(
    readonly gpgPath: string,
    options: GpgCommandExecutorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.runner = options.runner ?? new SubprocessRunner({ logger: this.logger });
  }

  /**
   * Create an executor for whichever gpg the finder locates
   */
  static async discover(
    finder: GpgPathFinder,
    options: GpgCommandExecutorOptions = {}
  ): Promise<GpgCommandExecutor> {
    return new GpgCommandExecutor(await finder.find(), options);
  }

  /**
   * Run a command; input is fed to gpg's stdin, stdout is copied to output.
   * Without a timeout the call waits for gpg indefinitely.
   */
  async execute(command: GpgCommand | string, options: RunOptions = {}): Promise<void> {
    await this.runner.run({
      executablePath: this.gpgPath,
      argumentLine: command.toString(),
      ...options,
    });
  }

  beginExecute(
    command: GpgCommand | string,
    options: RunOptions = {},
    callback?: AsyncCallback<void>,
    token?: unknown
  ): AsyncOperation<void> {
    return beginOperation(
      ResultType.void,
      () => this.execute(command, options),
      callback,
      token,
      this.logger
    );
  }

  async endExecute(handle: AsyncHandle): Promise<void> {
    await endVoidOperation(handle);
  }
}
