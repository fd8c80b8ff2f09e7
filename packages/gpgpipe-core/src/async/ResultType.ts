/**
 * Declared result type of an asynchronous operation.
 *
 * Generic parameters do not exist at runtime, so handles carry the ResultType
 * instance they were started with and end methods compare by identity.
 */

import { AsyncOperation, type AsyncHandle } from './AsyncOperation.js';

export class ResultType<T> {
  static readonly void: ResultType<void> = new ResultType<void>('void');
  static readonly boolean: ResultType<boolean> = new ResultType<boolean>('boolean');

  constructor(readonly name: string) {}

  /**
   * True when the handle is an operation started with this result type
   */
  owns(handle: AsyncHandle): handle is AsyncOperation<T> {
    return handle instanceof AsyncOperation && handle.resultType === this;
  }
}
