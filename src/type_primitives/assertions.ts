/***
 * Assertions — Dev-only runtime validation and branded casting.
 *
 * All checks are guarded by __DEV__ and skipped in production builds.
 * validate_and_cast is the primary tool for creating branded IDs:
 * it validates the input in dev and returns the value as the branded type.
 *
 ***/

import { __DEV__ } from "../utils/env";
import { TYPE_ERROR, TypeError } from "./error";

// Above MAX_SAFE_INTEGER, v + 1 can round back to v.
export const is_positive_safe_integer = (v: number): boolean =>
  Number.isSafeInteger(v) && v > 0;

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new TypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
      { value },
    );
  }
  return value as Result;
}
