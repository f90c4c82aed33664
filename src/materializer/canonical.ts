import type { SourceScalar } from '../source/types';
import { NodeFlag, type NodeFlags } from '../tree/types';
import {
  isInfinityValue,
  isNaNValue,
  isNegativeInfinityValue,
  isNegativeZeroValue
} from '../utils/type-guards';

/**
 * The text (and marker flags) committed to the tree for one scalar.
 *
 * Nothing else survives materialization: radix, precision, or the source
 * spelling of a number are not recorded.
 */
export type CanonicalScalar = {
  text: string;
  flags: NodeFlags;
};

/**
 * Canonical spellings for the non-finite floats.
 *
 * These are the YAML core-schema forms, understood by every emitter that
 * reads the tree; the TOML spellings (`inf`, `nan`) are not.
 */
export const FLOAT_POSITIVE_INFINITY = '.inf';
export const FLOAT_NEGATIVE_INFINITY = '-.inf';
export const FLOAT_NAN = '.nan';

/**
 * Formats a float.
 *
 * Finite values use the host conversion (`String(value)`), which produces the
 * shortest text that parses back to the same double (e.g. `3.14`, `1e+21`).
 *
 * Overrides:
 * - `Infinity`  -> `.inf`
 * - `-Infinity` -> `-.inf`
 * - `NaN`       -> `.nan`
 * - `-0`        -> `-0` (the host conversion would drop the sign)
 */
export function canonicalFloat(value: number): string {
  if (isInfinityValue(value)) return FLOAT_POSITIVE_INFINITY;
  if (isNegativeInfinityValue(value)) return FLOAT_NEGATIVE_INFINITY;
  if (isNaNValue(value)) return FLOAT_NAN;
  if (isNegativeZeroValue(value)) return '-0';
  return String(value);
}

/**
 * Formats an integer as signed decimal, without grouping or leading zeros.
 */
export function canonicalInteger(value: bigint): string {
  return value.toString(10);
}

export function canonicalBoolean(value: boolean): string {
  return value ? 'true' : 'false';
}

/**
 * Produces the canonical text of a scalar source value.
 *
 * Strings are the only scalars that carry a flag: {@link NodeFlag.ValueQuoted}
 * lets emitters reproduce the quoting, so `"8080"` and `8080` stay distinct
 * even though both are stored as the text `8080`.
 *
 * Temporal values are forwarded in the front end's own stringification.
 */
export function canonicalizeScalar(value: SourceScalar): CanonicalScalar {
  switch (value.kind) {
    case 'string':
      return { text: value.value, flags: NodeFlag.ValueQuoted };

    case 'integer':
      return { text: canonicalInteger(value.value), flags: NodeFlag.None };

    case 'float':
      return { text: canonicalFloat(value.value), flags: NodeFlag.None };

    case 'boolean':
      return { text: canonicalBoolean(value.value), flags: NodeFlag.None };

    case 'null':
      return { text: 'null', flags: NodeFlag.None };

    case 'date':
    case 'time':
    case 'datetime':
      return { text: value.text, flags: NodeFlag.None };
  }
}
