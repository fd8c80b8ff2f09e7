/**
 * Unit tests for AsyncOperation
 */

import { describe, it, expect, vi } from 'vitest';
import { AsyncOperation } from '../../../src/async/AsyncOperation.js';
import { ResultType } from '../../../src/async/ResultType.js';
import { DoubleCompletionError } from '../../../src/shared/utils/errors.js';
import type { ILogger } from '../../../src/shared/platform/ILogger.js';

const NUMBER_RESULT = new ResultType<number>('number');

function createLogger() {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  } satisfies ILogger;
}

describe('AsyncOperation', () => {
  describe('completion', () => {
    it('should start pending', () => {
      const operation = new AsyncOperation(NUMBER_RESULT);

      expect(operation.isCompleted()).toBe(false);
    });

    it('should store the completed value', async () => {
      const operation = new AsyncOperation(NUMBER_RESULT);

      operation.complete(42);

      expect(operation.isCompleted()).toBe(true);
      await expect(operation.getValue()).resolves.toBe(42);
    });

    it('should throw DoubleCompletionError on a second complete', () => {
      const operation = new AsyncOperation(NUMBER_RESULT);
      operation.complete(1);

      expect(() => operation.complete(2)).toThrow(DoubleCompletionError);
    });

    it('should throw DoubleCompletionError when failing a completed operation', () => {
      const operation = new AsyncOperation(NUMBER_RESULT);
      operation.complete(1);

      expect(() => operation.fail(new Error('late'))).toThrow(DoubleCompletionError);
    });

    it('should keep the first outcome after a rejected second completion', async () => {
      const operation = new AsyncOperation(NUMBER_RESULT);
      operation.complete(1);

      expect(() => operation.complete(2)).toThrow(
        'An asynchronous operation can only complete once.'
      );
      await expect(operation.getValue()).resolves.toBe(1);
    });

    it('should carry the caller token', () => {
      const token = { requestId: 'abc' };
      const operation = new AsyncOperation(ResultType.void, { token });

      expect(operation.token).toBe(token);
    });
  });

  describe('waiting', () => {
    it('should resolve a waiter registered before completion', async () => {
      const operation = new AsyncOperation(NUMBER_RESULT);
      const pending = operation.getValue();

      setImmediate(() => operation.complete(7));

      await expect(pending).resolves.toBe(7);
    });

    it('should share one wait promise between waiters', async () => {
      const operation = new AsyncOperation(NUMBER_RESULT);
      const first = operation.getValue();
      const second = operation.getValue();

      operation.complete(3);

      await expect(Promise.all([first, second])).resolves.toEqual([3, 3]);
    });

    it('should resolve immediately when already completed', async () => {
      const operation = new AsyncOperation(ResultType.void);
      operation.complete();

      await expect(operation.wait()).resolves.toBeUndefined();
    });

    it('should re-raise the same failure on every wait', async () => {
      const operation = new AsyncOperation(NUMBER_RESULT);
      const failure = new Error('boom');

      operation.fail(failure);

      await expect(operation.wait()).rejects.toBe(failure);
      await expect(operation.wait()).rejects.toBe(failure);
      await expect(operation.getValue()).rejects.toBe(failure);
    });

    it('should reject an earlier waiter once the operation fails', async () => {
      const operation = new AsyncOperation(NUMBER_RESULT);
      const failure = new Error('later');
      const pending = operation.getValue();

      operation.fail(failure);

      await expect(pending).rejects.toBe(failure);
    });
  });

  describe('callback', () => {
    it('should invoke the callback with the completed operation', () => {
      const callback = vi.fn();
      const operation = new AsyncOperation(NUMBER_RESULT, { callback });

      operation.complete(5);

      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith(operation);
    });

    it('should see the completed state from inside the callback', () => {
      const states: boolean[] = [];
      const operation = new AsyncOperation(NUMBER_RESULT, {
        callback: (handle) => states.push(handle.isCompleted()),
      });

      operation.complete(9);

      expect(states).toEqual([true]);
    });

    it('should log a throwing callback without changing the outcome', async () => {
      const logger = createLogger();
      const operation = new AsyncOperation(NUMBER_RESULT, {
        logger,
        callback: () => {
          throw new Error('callback failure');
        },
      });

      expect(() => operation.complete(11)).not.toThrow();
      expect(logger.error).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith(
        'Completion callback threw',
        expect.objectContaining({ resultType: 'number' })
      );
      await expect(operation.getValue()).resolves.toBe(11);
    });
  });
});
