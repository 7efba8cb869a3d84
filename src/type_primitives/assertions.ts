/***
 * Assertions — Dev-only runtime validation and branded casting.
 *
 * validate_and_cast mints branded IDs: the check runs only under
 * __DEV__, and the value comes back as the branded type.
 * unsafe_cast re-types a value the caller already knows the shape of,
 * such as a storage pulled from a type-erased registry map.
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export const is_positive_integer = (v: number): boolean =>
  Number.isInteger(v) && v > 0;

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

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
