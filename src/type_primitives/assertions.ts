/***
 * Assertions — Dev-only runtime validation and branded casting.
 *
 * All checks are guarded by __DEV__ and tree-shaken in production builds.
 * validate_and_cast is the primary tool for creating branded values:
 * it validates the input in dev and returns the value as the branded type.
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

/** 1, 2, 4, ... up to 2^31. */
export const is_power_of_two = (v: number): boolean =>
  is_non_negative_integer(v) && v > 0 && v <= 0x80000000 && (v & (v - 1)) === 0;

/** 0, 1, 3, 7, ... i.e. a power of two minus one. */
export const is_pow2_mask = (v: number): boolean =>
  is_non_negative_integer(v) && is_power_of_two(v + 1);

export function assert(condition: boolean, err_message: string): asserts condition {
  if (__DEV__ && !condition) {
    throw new TypeError(
      TYPE_ERROR.ASSERTION_FAIL_CONDITION,
      `Expected value to meet condition: ${err_message}`,
    );
  }
}

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new TypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
    );
  }
  return value as Result;
}
