export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
};

/**
 * Creates a guard for a built-in primitive `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The primitive type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/** Guard verifying the value is a bigint. */
export const isBigInt = is('bigint');

/**
 * Guard verifying the value is `NaN`.
 *
 * Note:
 * Uses `Number.isNaN` (no coercion), composed from {@link isNumber}.
 * The sign of a NaN is not observable in JavaScript, which matches the
 * canonical `.nan` spelling ignoring it.
 */
export function isNaNValue(value: unknown): value is number {
  return isNumber(value) && Number.isNaN(value);
}

/**
 * Guard verifying the value is `Infinity`.
 */
export function isInfinityValue(value: unknown): value is number {
  return isNumber(value) && value === Infinity;
}

/**
 * Guard verifying the value is `-Infinity`.
 */
export function isNegativeInfinityValue(value: unknown): value is number {
  return isNumber(value) && value === -Infinity;
}

/**
 * Guard verifying the value is `-0`.
 *
 * Why `Object.is`:
 * JavaScript equality cannot distinguish `-0` from `0`:
 * - `-0 === 0` is true
 * - `String(-0)` is `"0"`
 *
 * `Object.is` can distinguish them:
 * - `Object.is(-0, 0)`   is false
 * - `Object.is(-0, -0)`  is true
 */
export function isNegativeZeroValue(value: unknown): value is number {
  return isNumber(value) && Object.is(value, -0);
}

/**
 * Guard verifying the value is an integral number that converts to `bigint`
 * without loss.
 *
 * Semantics:
 * - true  for:  0, 1, -1, 9007199254740991
 * - false for:  -0, 1.5, 2 ** 53, NaN, Infinity, non-numbers
 *
 * `-0` is excluded because `BigInt(-0)` is `0n` and the sign would be lost.
 */
export function isSafeIntegerValue(value: unknown): value is number {
  return (
    isNumber(value) && Number.isSafeInteger(value) && !isNegativeZeroValue(value)
  );
}
