import { parse as parseTomlText, TomlError } from 'smol-toml';
import { isRecord } from '../guards';
import type { ErrorLocation } from '../report';
import type { ValueAdapter } from '../source/adapter';
import { fromJson } from '../source/json';
import { fromToml } from '../source/toml';
import { isNumber, isString } from '../utils/type-guards';

/**
 * A source format as seen by the entry points: a grammar parser (external)
 * plus the adapter that presents its output to the materializer.
 */
export type DocumentFormat = {
  /**
   * Display name used in error messages.
   */
  name: string;

  /**
   * Parses source text into the parser's own value model.
   *
   * @throws The parser's error on malformed input.
   */
  parse: (text: string) => unknown;

  adapt: ValueAdapter;

  /**
   * The parser's description of a failure, without any heading the parser
   * adds itself.
   */
  describe: (error: unknown) => string;

  /**
   * Extracts a line/column position from an error thrown by `parse`.
   */
  locate: (error: unknown, text: string) => ErrorLocation | undefined;
};

/**
 * Converts a 0-based character offset into a 1-based line/column pair.
 */
export function locateOffset(text: string, offset: number): ErrorLocation {
  const clamped = Math.max(0, Math.min(offset, text.length));
  const before = text.slice(0, clamped);
  const lineStart = before.lastIndexOf('\n') + 1;

  return {
    line: before.split('\n').length,
    column: clamped - lineStart + 1
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Heading `smol-toml` puts in front of every `TomlError` message.
 */
const TOML_ERROR_HEADING = /^Invalid TOML document:\s*/;

/**
 * TOML, parsed by `smol-toml`.
 *
 * Integers are read as `bigint` so the full 64-bit range survives.
 * `TomlError` carries the 1-based `line` and `column` of the failure.
 */
export const TOML_FORMAT: DocumentFormat = {
  name: 'TOML',
  parse: text => parseTomlText(text, { integersAsBigInt: true }),
  adapt: fromToml,
  describe: error => errorMessage(error).replace(TOML_ERROR_HEADING, ''),
  locate: error => {
    if (!(error instanceof TomlError) || !isRecord(error)) return undefined;

    const { line, column } = error;
    if (!isNumber(line)) return undefined;
    return isNumber(column) ? { line, column } : { line };
  }
};

const JSON_POSITION = /\bposition (\d+)/;

/**
 * JSON, parsed by `JSON.parse`.
 *
 * `SyntaxError` messages report a character offset ("... at position 12")
 * for most failures; it is converted into line and column when present.
 */
export const JSON_FORMAT: DocumentFormat = {
  name: 'JSON',
  parse: text => JSON.parse(text),
  adapt: fromJson,
  describe: errorMessage,
  locate: (error, text) => {
    if (!(error instanceof SyntaxError)) return undefined;

    const match = JSON_POSITION.exec(error.message);
    const offset = match?.[1];
    return isString(offset) ? locateOffset(text, Number(offset)) : undefined;
  }
};
