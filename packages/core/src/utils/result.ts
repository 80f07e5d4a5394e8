/**
 * Result type for explicit error handling
 * Discovery, configuration loading and driver runs return a Result instead of throwing
 */

import type { BenchrunError } from '../errors/index.js';

export type Ok<T> = {
  readonly ok: true;
  readonly value: T;
};

export type Err<E = BenchrunError> = {
  readonly ok: false;
  readonly error: E;
};

export type Result<T, E = BenchrunError> = Ok<T> | Err<E>;

export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> => result.ok;

export const isErr = <T, E>(result: Result<T, E>): result is Err<E> => !result.ok;

export const ok = <T>(value: T): Ok<T> => ({
  ok: true,
  value
});

export const err = <E = BenchrunError>(error: E): Err<E> => ({
  ok: false,
  error
});

/**
 * Chain Result computations
 */
export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => {
  if (isOk(result)) {
    return fn(result.value);
  }
  return result;
};

/**
 * Async try/catch wrapper that returns Result
 */
export const tryCatchAsync = async <T, E>(
  fn: () => Promise<T>,
  errorMapper: (error: unknown) => E
): Promise<Result<T, E>> => {
  try {
    return ok(await fn());
  } catch (error) {
    return err(errorMapper(error));
  }
};
