/**
 * Structural guards used by the front-end adapters to classify the untyped
 * output of `JSON.parse` and of the TOML parser.
 */

/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is T[]`). Note: `T` is not validated at runtime.
 *
 * @typeParam T  Assumed element type (defaults to `unknown`).
 * @param value  Value to test.
 * @returns      `true` if `value` is an array.
 */
export function isArray<T = unknown>(value: unknown): value is T[] {
  return Array.isArray(value);
}

/**
 * Determines whether a value is a "plain object", i.e. a table as produced by
 * a parser rather than some other object that merely has `typeof "object"`.
 *
 * A value is considered plain if its prototype is either:
 * - `Object.prototype` (object literals, what `JSON.parse` builds), or
 * - `null` (objects created via `Object.create(null)`).
 *
 * As a result, this returns `false` for:
 * - Arrays
 * - Dates (including the parser's date-time class)
 * - Maps and Sets
 * - Class instances
 *
 * The ordering matters to the adapters: a date must be recognized as a
 * temporal scalar, never walked as a table with no members.
 *
 * @typeParam T
 *   The (assumed) type of the object's property values after a successful check.
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<string, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Checks that the value is a non-null object so properties can be read without
 * runtime errors and without type assertions (used to inspect thrown errors).
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Describes a runtime value for diagnostics (`"null"`, `"symbol"`, `"Map"`).
 *
 * @param value
 *   Any runtime value.
 * @returns
 *   `"null"` for `null`, the constructor name for class instances, and the
 *   `typeof` result otherwise.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;

  const proto = Object.getPrototypeOf(value);
  const ctor: unknown = isRecord(proto) ? proto.constructor : undefined;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
}
