/**
 * Single-completion result container behind every begin/end pair.
 *
 * An operation is completed exactly once, either with a value or with a failure.
 * Waiters share one promise that is only created when somebody actually waits,
 * and every read after completion yields the same value or re-raises the same error.
 */

import { DoubleCompletionError } from '../shared/utils/errors.js';
import { silentLogger, type ILogger } from '../shared/platform/ILogger.js';
import type { ResultType } from './ResultType.js';

/**
 * Opaque handle returned to callers of a begin method
 */
export interface AsyncHandle {
  /**
   * Caller-supplied correlation token, never interpreted
   */
  readonly token: unknown;

  /**
   * Momentary snapshot; does not wait
   */
  isCompleted(): boolean;
}

export type AsyncCallback<T> = (handle: AsyncOperation<T>) => void;

export interface AsyncOperationOptions<T> {
  /**
   * Invoked once the outcome is visible to readers
   */
  callback?: AsyncCallback<T>;
  token?: unknown;
  logger?: ILogger;
}

type SettledOutcome<T> =
  | { readonly status: 'succeeded'; readonly value: T }
  | { readonly status: 'failed'; readonly error: unknown };

type Outcome<T> = { readonly status: 'pending' } | SettledOutcome<T>;

export class AsyncOperation<T = void> implements AsyncHandle {
  readonly token: unknown;
  private outcome: Outcome<T> = { status: 'pending' };
  private waitHandle: Promise<SettledOutcome<T>> | undefined;
  private signal: ((outcome: SettledOutcome<T>) => void) | undefined;
  private readonly callback: AsyncCallback<T> | undefined;
  private readonly logger: ILogger;

  constructor(
    readonly resultType: ResultType<T>,
    options: AsyncOperationOptions<T> = {}
  ) {
    this.callback = options.callback;
    this.token = options.token;
    this.logger = options.logger ?? silentLogger;
  }

  isCompleted(): boolean {
    return this.outcome.status !== 'pending';
  }

  /**
   * Mark the operation as completed with a return value
   */
  complete(value: T): void {
    this.settle({ status: 'succeeded', value });
  }

  /**
   * Mark the operation as completed with a failure
   */
  fail(error: unknown): void {
    this.settle({ status: 'failed', error });
  }

  /**
   * Resolve once completed; rejects with the stored failure on every call
   */
  async wait(): Promise<void> {
    await this.getValue();
  }

  /**
   * Resolve with the return value once completed; rejects with the stored failure on every call
   */
  async getValue(): Promise<T> {
    const outcome = await this.settled();
    if (outcome.status === 'failed') {
      throw outcome.error;
    }
    return outcome.value;
  }

  private settle(outcome: SettledOutcome<T>): void {
    if (this.outcome.status !== 'pending') {
      throw new DoubleCompletionError();
    }

    this.outcome = outcome;

    // Only set when a waiter has already asked for the wait handle
    this.signal?.(outcome);

    if (this.callback) {
      try {
        this.callback(this);
      } catch (error) {
        this.logger.error('Completion callback threw', {
          resultType: this.resultType.name,
          error,
        });
      }
    }
  }

  private settled(): Promise<SettledOutcome<T>> {
    const outcome = this.outcome;
    if (outcome.status !== 'pending') {
      return Promise.resolve(outcome);
    }
    return this.getWaitHandle();
  }

  private getWaitHandle(): Promise<SettledOutcome<T>> {
    if (!this.waitHandle) {
      this.waitHandle = new Promise<SettledOutcome<T>>((resolve) => {
        this.signal = resolve;
      });
    }
    return this.waitHandle;
  }
}
