/**
 * Front-end value model.
 *
 * Every format front end (TOML, JSON, ...) presents its parsed document to the
 * materializer as a {@link SourceValue}. The model is a closed discriminated
 * union over `kind`; the materializer switches on it exhaustively.
 *
 * Ownership
 * ---------
 * Source values belong to the front end. The materializer reads them during a
 * single call and never retains them: every key and scalar it needs is copied
 * into the destination tree's arena.
 *
 * Laziness
 * --------
 * Composite members are exposed through iterables rather than arrays, so an
 * adapter can classify children on demand while the walker visits them. No
 * adapter has to convert the whole document up front.
 */

/**
 * An ordered mapping of keys to values.
 */
export type SourceTable = {
  kind: 'table';

  /**
   * Members in deterministic insertion order.
   */
  entries(): Iterable<readonly [key: string, value: SourceValue]>;
};

/**
 * An ordered sequence of values.
 */
export type SourceArray = {
  kind: 'array';

  /**
   * Elements in source order.
   */
  items(): Iterable<SourceValue>;
};

export type SourceString = {
  kind: 'string';
  value: string;
};

export type SourceInteger = {
  kind: 'integer';

  /**
   * Held as `bigint` so 64-bit integers survive without precision loss.
   */
  value: bigint;
};

export type SourceFloat = {
  kind: 'float';
  value: number;
};

export type SourceBoolean = {
  kind: 'boolean';
  value: boolean;
};

/**
 * An explicit null, for front ends whose grammar has one (JSON).
 */
export type SourceNull = {
  kind: 'null';
};

/**
 * Temporal scalars.
 *
 * The front end owns the formatting: `text` is its canonical stringification
 * (ISO-8601-like for TOML) and is forwarded untouched.
 */
export type SourceTemporal = {
  kind: 'date' | 'time' | 'datetime';
  text: string;
};

/**
 * A value the front end met but could not place in the closed kind set.
 *
 * Materializing it is an error; `description` names what was found
 * (e.g. `"null"`, `"symbol"`) so the report can say so.
 */
export type SourceUnsupported = {
  kind: 'unsupported';
  description: string;
};

/**
 * Scalar variants (everything that becomes a single text value).
 */
export type SourceScalar =
  | SourceString
  | SourceInteger
  | SourceFloat
  | SourceBoolean
  | SourceNull
  | SourceTemporal;

export type SourceValue =
  | SourceTable
  | SourceArray
  | SourceScalar
  | SourceUnsupported;

export type SourceKind = SourceValue['kind'];

/**
 * Builds a table from an already materialized list of entries.
 *
 * Useful for front ends that hold their members in memory anyway, and for
 * constructing documents by hand.
 *
 * @param entries - Members in the order they should be materialized.
 */
export function sourceTable(
  entries: readonly (readonly [string, SourceValue])[]
): SourceTable {
  return { kind: 'table', entries: () => entries };
}

/**
 * Builds an array from an already materialized list of elements.
 *
 * @param items - Elements in the order they should be materialized.
 */
export function sourceArray(items: readonly SourceValue[]): SourceArray {
  return { kind: 'array', items: () => items };
}
