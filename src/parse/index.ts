import type { DocumentTree } from '../tree/tree';
import { JSON_FORMAT, TOML_FORMAT } from './formats';
import {
  type ParseOptions,
  type ParseTarget,
  parseFile,
  parseText
} from './modes';

export type { ParseOptions, ParseTarget } from './modes';

/**
 * Entry points
 * ------------
 * Three invocation modes per format, differing only in where the source text
 * lives relative to the destination arena:
 *
 * | Mode     | Source text                                   |
 * | -------- | --------------------------------------------- |
 * | in-place | parsed as given                               |
 * | in-arena | copied into the target arena, copy is parsed  |
 * | file     | read from disk (UTF-8), then parsed           |
 *
 * Each accepts an optional target:
 * - none: a new `DocumentTree` is created (with `options.onError`, if given);
 * - a `DocumentTree`: its root, or `options.node`;
 * - a `NodeRef`: that node. A key it already has is preserved.
 *
 * All of them return the tree that received the document and end in the same
 * `materialize` call.
 */

/**
 * Parses TOML text into a new tree.
 *
 * @example
 * ```ts
 * const tree = parseTomlInPlace('name = "Tom"', { filename: 'person.toml' });
 * tree.ref().get('name').val; // "Tom"
 * ```
 */
export function parseTomlInPlace(
  toml: string,
  options?: Partial<ParseOptions>
): DocumentTree;

/**
 * Parses TOML text into an existing tree or node.
 */
export function parseTomlInPlace(
  toml: string,
  target: ParseTarget,
  options?: Partial<ParseOptions>
): DocumentTree;

export function parseTomlInPlace(
  toml: string,
  targetOrOptions?: ParseTarget | Partial<ParseOptions>,
  options?: Partial<ParseOptions>
): DocumentTree {
  return parseText(TOML_FORMAT, 'in-place', toml, targetOrOptions, options);
}

/**
 * Copies TOML text into the tree's arena, then parses the copy.
 */
export function parseTomlInArena(
  toml: string,
  options?: Partial<ParseOptions>
): DocumentTree;

export function parseTomlInArena(
  toml: string,
  target: ParseTarget,
  options?: Partial<ParseOptions>
): DocumentTree;

export function parseTomlInArena(
  toml: string,
  targetOrOptions?: ParseTarget | Partial<ParseOptions>,
  options?: Partial<ParseOptions>
): DocumentTree {
  return parseText(TOML_FORMAT, 'arena', toml, targetOrOptions, options);
}

/**
 * Reads and parses a TOML file. The path is used as the error `source`.
 */
export function parseTomlFile(
  filename: string,
  options?: Partial<ParseOptions>
): DocumentTree;

export function parseTomlFile(
  filename: string,
  target: ParseTarget,
  options?: Partial<ParseOptions>
): DocumentTree;

export function parseTomlFile(
  filename: string,
  targetOrOptions?: ParseTarget | Partial<ParseOptions>,
  options?: Partial<ParseOptions>
): DocumentTree {
  return parseFile(TOML_FORMAT, filename, targetOrOptions, options);
}

/**
 * Parses JSON text into a new tree.
 */
export function parseJsonInPlace(
  json: string,
  options?: Partial<ParseOptions>
): DocumentTree;

export function parseJsonInPlace(
  json: string,
  target: ParseTarget,
  options?: Partial<ParseOptions>
): DocumentTree;

export function parseJsonInPlace(
  json: string,
  targetOrOptions?: ParseTarget | Partial<ParseOptions>,
  options?: Partial<ParseOptions>
): DocumentTree {
  return parseText(JSON_FORMAT, 'in-place', json, targetOrOptions, options);
}

export function parseJsonInArena(
  json: string,
  options?: Partial<ParseOptions>
): DocumentTree;

export function parseJsonInArena(
  json: string,
  target: ParseTarget,
  options?: Partial<ParseOptions>
): DocumentTree;

export function parseJsonInArena(
  json: string,
  targetOrOptions?: ParseTarget | Partial<ParseOptions>,
  options?: Partial<ParseOptions>
): DocumentTree {
  return parseText(JSON_FORMAT, 'arena', json, targetOrOptions, options);
}

export function parseJsonFile(
  filename: string,
  options?: Partial<ParseOptions>
): DocumentTree;

export function parseJsonFile(
  filename: string,
  target: ParseTarget,
  options?: Partial<ParseOptions>
): DocumentTree;

export function parseJsonFile(
  filename: string,
  targetOrOptions?: ParseTarget | Partial<ParseOptions>,
  options?: Partial<ParseOptions>
): DocumentTree {
  return parseFile(JSON_FORMAT, filename, targetOrOptions, options);
}
