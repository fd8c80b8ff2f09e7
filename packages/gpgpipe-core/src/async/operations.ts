/**
 * Begin/end helpers: start a unit of work on a later turn of the event loop
 * and hand back a handle; end methods validate the handle and surface the outcome.
 */

import { MismatchedHandleError } from '../shared/utils/errors.js';
import { silentLogger, type ILogger } from '../shared/platform/ILogger.js';
import { AsyncOperation, type AsyncCallback, type AsyncHandle } from './AsyncOperation.js';
import type { ResultType } from './ResultType.js';

export type OperationWork<T> = () => T | Promise<T>;

/**
 * Start `work` asynchronously and return its handle immediately.
 * The work never runs inside this call.
 */
export function beginOperation<T>(
  resultType: ResultType<T>,
  work: OperationWork<T>,
  callback?: AsyncCallback<T>,
  token?: unknown,
  logger: ILogger = silentLogger
): AsyncOperation<T> {
  const operation = new AsyncOperation<T>(resultType, { callback, token, logger });

  const execute = async (): Promise<void> => {
    let value: T;
    try {
      value = await work();
    } catch (error) {
      operation.fail(error);
      return;
    }
    operation.complete(value);
  };

  setImmediate(() => {
    execute().catch((error: unknown) => {
      // Only reachable when something else completed the handle first
      logger.error('Failed to record the outcome of an asynchronous operation', {
        resultType: resultType.name,
        error,
      });
    });
  });

  return operation;
}

/**
 * Wait for an operation of the given result type and return its value,
 * re-raising its failure if it failed.
 */
export async function endOperation<T>(handle: AsyncHandle, resultType: ResultType<T>): Promise<T> {
  if (!resultType.owns(handle)) {
    throw new MismatchedHandleError(resultType.name, describeHandle(handle));
  }
  return handle.getValue();
}

/**
 * Wait for any operation and discard its value, re-raising its failure if it failed.
 */
export async function endVoidOperation(handle: AsyncHandle): Promise<void> {
  if (!(handle instanceof AsyncOperation)) {
    throw new MismatchedHandleError('void', describeHandle(handle));
  }
  await handle.wait();
}

function describeHandle(handle: AsyncHandle): string | undefined {
  return handle instanceof AsyncOperation ? handle.resultType.name : undefined;
}
