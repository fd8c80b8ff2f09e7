/**
 * Unit tests for the begin/end helpers
 */

import { describe, it, expect, vi } from 'vitest';
import { AsyncOperation } from '../../../src/async/AsyncOperation.js';
import { ResultType } from '../../../src/async/ResultType.js';
import {
  beginOperation,
  endOperation,
  endVoidOperation,
} from '../../../src/async/operations.js';
import { MismatchedHandleError } from '../../../src/shared/utils/errors.js';
import type { AsyncHandle } from '../../../src/async/AsyncOperation.js';

const STRING_RESULT = new ResultType<string>('string');

describe('beginOperation', () => {
  it('should never run the work inside the begin call', async () => {
    const work = vi.fn(() => 'done');

    const handle = beginOperation(STRING_RESULT, work);

    expect(work).not.toHaveBeenCalled();
    expect(handle.isCompleted()).toBe(false);
    await expect(endOperation(handle, STRING_RESULT)).resolves.toBe('done');
    expect(work).toHaveBeenCalledTimes(1);
  });

  it('should complete with the value of asynchronous work', async () => {
    const handle = beginOperation(STRING_RESULT, async () => 'later');

    await expect(endOperation(handle, STRING_RESULT)).resolves.toBe('later');
  });

  it('should fail the handle when the work throws', async () => {
    const failure = new Error('work failed');
    const handle = beginOperation(STRING_RESULT, () => {
      throw failure;
    });

    await expect(endOperation(handle, STRING_RESULT)).rejects.toBe(failure);
    await expect(endOperation(handle, STRING_RESULT)).rejects.toBe(failure);
  });

  it('should invoke the callback with the token after completion', async () => {
    const token = 'request-1';
    const seen: Array<{ completed: boolean; token: unknown }> = [];
    const handle = beginOperation(
      ResultType.void,
      () => undefined,
      (operation) => seen.push({ completed: operation.isCompleted(), token: operation.token }),
      token
    );

    await endVoidOperation(handle);

    expect(seen).toEqual([{ completed: true, token: 'request-1' }]);
  });
});

describe('endOperation', () => {
  it('should reject a handle started with another result type', async () => {
    const handle = beginOperation(ResultType.boolean, () => true);

    await expect(endOperation(handle, STRING_RESULT)).rejects.toBeInstanceOf(
      MismatchedHandleError
    );
    await expect(endOperation(handle, STRING_RESULT)).rejects.toThrow(
      'A mismatched handle was provided: expected an operation returning string, got boolean.'
    );
  });

  it('should reject a foreign handle', async () => {
    const foreign: AsyncHandle = { token: undefined, isCompleted: () => true };

    await expect(endOperation(foreign, STRING_RESULT)).rejects.toThrow(
      'A mismatched handle was provided: expected an operation returning string.'
    );
  });

  it('should accept a handle created directly with the same result type', async () => {
    const operation = new AsyncOperation(STRING_RESULT);
    operation.complete('direct');

    await expect(endOperation(operation, STRING_RESULT)).resolves.toBe('direct');
  });
});

describe('endVoidOperation', () => {
  it('should accept an operation of any result type and discard the value', async () => {
    const handle = beginOperation(STRING_RESULT, () => 'ignored');

    await expect(endVoidOperation(handle)).resolves.toBeUndefined();
  });

  it('should re-raise the failure', async () => {
    const failure = new Error('void failure');
    const handle = beginOperation(ResultType.void, () => Promise.reject(failure));

    await expect(endVoidOperation(handle)).rejects.toBe(failure);
  });

  it('should reject a foreign handle', async () => {
    const foreign: AsyncHandle = { token: undefined, isCompleted: () => false };

    await expect(endVoidOperation(foreign)).rejects.toBeInstanceOf(MismatchedHandleError);
  });
});
