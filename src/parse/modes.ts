import { readFileSync } from 'node:fs';

import { materialize } from '../materializer';
import type { ErrorHandler } from '../report';
import { NodeRef } from '../tree/node-ref';
import { DocumentTree } from '../tree/tree';
import type { NodeId } from '../tree/types';
import type { DocumentFormat } from './formats';

/**
 * Where a document is materialized:
 * - a `DocumentTree`: its root, or `ParseOptions.node` when given;
 * - a `NodeRef`: that node of its tree.
 */
export type ParseTarget = DocumentTree | NodeRef;

export type ParseOptions = {
  /**
   * Label reported as the error location's `source`.
   * File-based entry points use the path they read.
   */
  filename: string | undefined;

  /**
   * Destination node when the target is a `DocumentTree`.
   * Ignored for `NodeRef` targets.
   */
  node: NodeId | undefined;

  /**
   * @see MaterializeOptions.maxDepth
   * @default 1024
   */
  maxDepth: number;

  /**
   * Error handler for the tree created when no target is given.
   * An existing target keeps the handler it was constructed with.
   */
  onError: ErrorHandler | undefined;
};

/**
 * How the source text relates to the destination arena.
 *
 * - `in-place`:  the text is parsed where it is; only materialized keys and
 *                values are copied into the arena.
 * - `arena`:     the raw text is first copied into the arena and the copy is
 *                parsed, so the source stays alive as long as the tree.
 */
export type TextMode = 'in-place' | 'arena';

export function normalizeParseOptions(
  options: Partial<ParseOptions>
): ParseOptions {
  return {
    filename: undefined,
    node: undefined,
    maxDepth: 1024,
    onError: undefined,
    ...options
  };
}

/**
 * Distinguishes a target from an options bag in the overloaded entry points.
 */
export function isParseTarget(value: unknown): value is ParseTarget {
  return value instanceof DocumentTree || value instanceof NodeRef;
}

type ResolvedTarget = {
  tree: DocumentTree;
  node: NodeId;
};

function resolveTarget(
  target: ParseTarget | undefined,
  options: ParseOptions
): ResolvedTarget {
  if (target instanceof NodeRef) {
    return { tree: target.tree, node: target.id };
  }

  const tree =
    target ?? new DocumentTree(options.onError ? { onError: options.onError } : {});
  return { tree, node: options.node ?? tree.rootId() };
}

/**
 * Parses `text` completely, then materializes it.
 *
 * A parse failure is reported before any node is touched, so a malformed
 * document never leaves partial content behind.
 */
function parseInto(
  format: DocumentFormat,
  text: string,
  { tree, node }: ResolvedTarget,
  options: ParseOptions
): void {
  let parsed: unknown;
  try {
    parsed = format.parse(text);
  } catch (error) {
    tree.fail(`Invalid ${format.name} document: ${format.describe(error)}`, {
      source: options.filename,
      ...format.locate(error, text)
    });
  }

  materialize(format.adapt(parsed), tree, node, { maxDepth: options.maxDepth });
}

/**
 * Shared body of every text entry point.
 *
 * @returns The tree that received the document (created when no target is
 *          given).
 */
export function parseText(
  format: DocumentFormat,
  mode: TextMode,
  text: string,
  targetOrOptions: ParseTarget | Partial<ParseOptions> | undefined,
  maybeOptions: Partial<ParseOptions> | undefined
): DocumentTree {
  const target = isParseTarget(targetOrOptions) ? targetOrOptions : undefined;
  const options = normalizeParseOptions(
    (isParseTarget(targetOrOptions) ? maybeOptions : targetOrOptions) ?? {}
  );

  const resolved = resolveTarget(target, options);

  let source = text;
  if (mode === 'arena') {
    const span = resolved.tree.copyToArena(text);
    source = resolved.tree.text(span);
  }

  parseInto(format, source, resolved, options);
  return resolved.tree;
}

/**
 * Shared body of every file entry point.
 *
 * Read failures are reported (with the path as `source`) before parsing.
 */
export function parseFile(
  format: DocumentFormat,
  filename: string,
  targetOrOptions: ParseTarget | Partial<ParseOptions> | undefined,
  maybeOptions: Partial<ParseOptions> | undefined
): DocumentTree {
  const target = isParseTarget(targetOrOptions) ? targetOrOptions : undefined;
  const options = normalizeParseOptions({
    ...((isParseTarget(targetOrOptions) ? maybeOptions : targetOrOptions) ??
      {}),
    filename
  });

  const resolved = resolveTarget(target, options);

  let text: string;
  try {
    text = readFileSync(filename, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return resolved.tree.fail(`Cannot read ${format.name} file: ${message}`, {
      source: filename
    });
  }

  parseInto(format, text, resolved, options);
  return resolved.tree;
}
