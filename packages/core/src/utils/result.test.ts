import { describe, expect, it } from 'vitest';
import { BenchrunError, ErrorCode, ErrorHelpers } from '../errors/index.js';
import {
  err,
  flatMap,
  isErr,
  isOk,
  ok,
  type Result,
  tryCatchAsync
} from './result.js';

describe('Result type', () => {
  describe('creation', () => {
    it('should create Ok result', () => {
      const result = ok(42);
      expect(result.ok).toBe(true);
      expect(result.value).toBe(42);
    });

    it('should create Err result', () => {
      const error = ErrorHelpers.unknownDriver('ruby');
      const result = err(error);
      expect(result.ok).toBe(false);
      expect(result.error).toBe(error);
    });
  });

  describe('type guards', () => {
    it('should identify Ok result', () => {
      const result: Result<number> = ok(42);
      expect(isOk(result)).toBe(true);
      expect(isErr(result)).toBe(false);
    });

    it('should identify Err result', () => {
      const result: Result<number> = err(ErrorHelpers.unknownDriver('ruby'));
      expect(isOk(result)).toBe(false);
      expect(isErr(result)).toBe(true);
    });
  });

  describe('flatMap', () => {
    const half = (x: number): Result<number> =>
      x % 2 === 0
        ? ok(x / 2)
        : err(new BenchrunError(ErrorCode.E_SYSTEM_UNKNOWN, `${x} is odd`));

    it('should chain Ok results', () => {
      const result = flatMap(ok(8), half);
      expect(isOk(result) && result.value).toBe(4);
    });

    it('should return the Err of the chained computation', () => {
      const result = flatMap(ok(3), half);
      expect(isErr(result) && result.error.message).toBe('3 is odd');
    });
  });

  describe('tryCatchAsync', () => {
    it('should wrap a resolved value', async () => {
      const result = await tryCatchAsync(async () => 'done', String);
      expect(isOk(result) && result.value).toBe('done');
    });

    it('should map a rejection', async () => {
      const result = await tryCatchAsync(
        async () => {
          throw new Error('boom');
        },
        (error) => BenchrunError.from(error, ErrorCode.E_DRIVER_RUN_FAILED)
      );
      expect(isErr(result) && result.error.code).toBe(ErrorCode.E_DRIVER_RUN_FAILED);
    });
  });
});
