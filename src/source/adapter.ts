import { describeValue, isArray, isPlainObject } from '../guards';
import {
  isBigInt,
  isBoolean,
  isNumber,
  isSafeIntegerValue,
  isString
} from '../utils/type-guards';
import type { SourceTemporal, SourceValue } from './types';

/**
 * Converts a runtime date object into a temporal source value.
 *
 * Front ends that distinguish local dates, local times and date-times supply
 * their own classifier; the default treats every date as a date-time.
 */
export type TemporalClassifier = (date: Date) => SourceTemporal;

/**
 * Classifies one parser-produced runtime value as a {@link SourceValue}.
 */
export type ValueAdapter = (raw: unknown) => SourceValue;

/**
 * Default temporal classifier: an ISO-8601 date-time.
 */
export const isoDateTime: TemporalClassifier = date => ({
  kind: 'datetime',
  text: date.toISOString()
});

export type AdapterOptions = {
  /**
   * How dates are mapped to `date` / `time` / `datetime`.
   *
   * @default isoDateTime
   */
  classifyTemporal: TemporalClassifier;

  /**
   * Whether `null` is part of the front end's grammar. When it is, `null`
   * becomes a `null` scalar; otherwise it is `unsupported`.
   *
   * @default false
   */
  acceptNull: boolean;
};

export function normalizeAdapterOptions(
  options: Partial<AdapterOptions>
): AdapterOptions {
  return {
    classifyTemporal: isoDateTime,
    acceptNull: false,
    ...options
  };
}

/**
 * Creates an adapter over the plain JavaScript values parsers build:
 * strings, numbers, bigints, booleans, dates, arrays and plain objects.
 *
 * Classification order
 * --------------------
 * 1. Primitives:
 *    - `null` is a `null` scalar when `acceptNull` is set.
 *    - `bigint` is always an integer.
 *    - `number` is an integer when it is a safe integer (and not `-0`),
 *      a float otherwise. A parser that yields `1.0` as the number `1`
 *      therefore produces an integer; both canonicalize to `1`.
 * 2. Dates: checked before plain objects (a `Date` is an object).
 * 3. Containers: arrays, then plain objects (tables).
 * 4. Anything else (`undefined`, functions, symbols, class instances, and
 *    `null` without `acceptNull`) becomes `unsupported`; materializing it is
 *    an error.
 *
 * Members are classified one level at a time, when the walker asks for them.
 *
 * @param options - See {@link AdapterOptions}.
 */
export function createValueAdapter(
  options: Partial<AdapterOptions> = {}
): ValueAdapter {
  const { classifyTemporal, acceptNull } = normalizeAdapterOptions(options);

  const adapt: ValueAdapter = raw => {
    // 1. Primitives
    if (raw === null && acceptNull) return { kind: 'null' };
    if (isString(raw)) return { kind: 'string', value: raw };
    if (isBoolean(raw)) return { kind: 'boolean', value: raw };
    if (isBigInt(raw)) return { kind: 'integer', value: raw };
    if (isNumber(raw)) {
      return isSafeIntegerValue(raw)
        ? { kind: 'integer', value: BigInt(raw) }
        : { kind: 'float', value: raw };
    }

    // 2. Dates
    if (raw instanceof Date) return classifyTemporal(raw);

    // 3. Containers
    if (isArray(raw)) {
      const elements = raw;
      return { kind: 'array', items: () => elements.map(adapt) };
    }
    if (isPlainObject(raw)) {
      const members = raw;
      return {
        kind: 'table',
        entries: () =>
          Object.keys(members).map(key => [key, adapt(members[key])] as const)
      };
    }

    // 4. Outside the closed kind set
    return { kind: 'unsupported', description: describeValue(raw) };
  };

  return adapt;
}
