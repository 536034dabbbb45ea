/**
 * Tests for the Result<T, E> type used by the file collaborators
 */

import { describe, it, expect } from 'vitest';
import {
  type Result,
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  tryCatch,
} from '../result.js';

describe('Result Pattern', () => {
  describe('Ok', () => {
    it('holds the value and reports success', () => {
      const result = ok(42);

      expect(result).toBeInstanceOf(Ok);
      expect(result._tag).toBe('Ok');
      expect(result.isOk()).toBe(true);
      expect(result.isErr()).toBe(false);
      expect(result.value).toBe(42);
    });

    it('maps, unwraps and ignores the default', () => {
      const result = ok(10).map((x) => x * 2);

      expect(isOk(result) && result.value).toBe(20);
      expect(ok('actual').unwrap()).toBe('actual');
      expect(ok('actual').unwrapOr('default')).toBe('actual');
    });
  });

  describe('Err', () => {
    it('holds the error and reports failure', () => {
      const result = err('failure');

      expect(result).toBeInstanceOf(Err);
      expect(result._tag).toBe('Err');
      expect(result.isOk()).toBe(false);
      expect(result.isErr()).toBe(true);
      expect(result.error).toBe('failure');
    });

    it('short-circuits map and returns the default', () => {
      const result: Result<number, string> = err('initial error');
      const mapped = result.map((x) => x * 2);

      expect(isErr(mapped) && mapped.error).toBe('initial error');
      expect(result.unwrapOr(7)).toBe(7);
    });

    it('rethrows Error instances on unwrap', () => {
      const cause = new RangeError('out of range');

      expect(() => err(cause).unwrap()).toThrow(cause);
    });

    it('wraps other error values on unwrap', () => {
      expect(() => err('test error').unwrap()).toThrow(
        'Called unwrap on an Err value: test error'
      );
    });
  });

  describe('tryCatch', () => {
    it('captures the return value', () => {
      const result = tryCatch(
        (): unknown => JSON.parse('[1,2]'),
        () => 'unreachable'
      );

      expect(isOk(result) && result.value).toEqual([1, 2]);
    });

    it('maps thrown values through onError', () => {
      const result = tryCatch(
        () => {
          throw new Error('bad');
        },
        (error) => (error instanceof Error ? error.message : 'unknown')
      );

      expect(isErr(result) && result.error).toBe('bad');
    });
  });
});
