import { TomlDate } from 'smol-toml';
import { createValueAdapter, type TemporalClassifier } from './adapter';

/**
 * Maps TOML's four temporal types onto the three temporal kinds.
 *
 * | TOML             | smol-toml check   | kind       |
 * | ---------------- | ----------------- | ---------- |
 * | Local Date       | `isDate()`        | `date`     |
 * | Local Time       | `isTime()`        | `time`     |
 * | Local Date-Time  | `isDateTime()`    | `datetime` |
 * | Offset Date-Time | `isDateTime()`    | `datetime` |
 *
 * The text is the parser's `toISOString()`, which already follows the TOML
 * shape of the value (a local date stays `1979-05-27`, a local time stays
 * `07:32:00.000`). A plain `Date` that did not come from the parser is treated
 * as an offset date-time.
 */
export const tomlTemporal: TemporalClassifier = date => {
  if (date instanceof TomlDate) {
    if (date.isDate()) return { kind: 'date', text: date.toISOString() };
    if (date.isTime()) return { kind: 'time', text: date.toISOString() };
  }
  return { kind: 'datetime', text: date.toISOString() };
};

/**
 * Adapts a value produced by `smol-toml`'s `parse` into a `SourceValue`.
 */
export const fromToml = createValueAdapter({ classifyTemporal: tomlTemporal });
