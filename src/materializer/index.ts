import { describeValue, isRecord } from '../guards';
import type {
  SourceArray,
  SourceScalar,
  SourceTable,
  SourceValue
} from '../source/types';
import type { DocumentTree } from '../tree/tree';
import type { NodeId } from '../tree/types';
import { canonicalizeScalar } from './canonical';
import type { MaterializeOptions, WorkItem } from './types';

export type { MaterializeOptions } from './types';

/**
 * Merges caller options with the materialization defaults.
 */
export function normalizeMaterializeOptions(
  options: Partial<MaterializeOptions>
): MaterializeOptions {
  return {
    maxDepth: 1024,
    ...options
  };
}

/**
 * Pushes `scheduled` so that the first entry is popped first.
 *
 * Children are allocated when their parent is visited, so their order in the
 * tree is already fixed; visiting them in source order as well keeps the arena
 * layout in document order.
 */
function pushInSourceOrder(stack: WorkItem[], scheduled: WorkItem[]): void {
  for (let index = scheduled.length - 1; index >= 0; index--) {
    const item = scheduled[index];
    if (item) stack.push(item);
  }
}

/**
 * Table -> map.
 *
 * Every member becomes a keyed child whose value stays empty until the
 * member itself is visited.
 */
function visitTable(
  tree: DocumentTree,
  stack: WorkItem[],
  item: WorkItem,
  table: SourceTable
): void {
  // Preserve a key the node already carries (e.g. `[server]` materialized
  // into an existing `server:` member).
  tree.toMap(item.node, tree.keySpan(item.node));

  const scheduled: WorkItem[] = [];
  for (const [key, member] of table.entries()) {
    const child = tree.appendChild(item.node);
    tree.toKeyVal(child, tree.copyToArena(key), null);
    scheduled.push({ value: member, node: child, depth: item.depth + 1 });
  }

  pushInSourceOrder(stack, scheduled);
}

/**
 * Array -> seq. Elements become keyless children.
 */
function visitArray(
  tree: DocumentTree,
  stack: WorkItem[],
  item: WorkItem,
  array: SourceArray
): void {
  tree.toSeq(item.node, tree.keySpan(item.node));

  const scheduled: WorkItem[] = [];
  for (const element of array.items()) {
    const child = tree.appendChild(item.node);
    scheduled.push({ value: element, node: child, depth: item.depth + 1 });
  }

  pushInSourceOrder(stack, scheduled);
}

/**
 * Scalar -> keyed or keyless scalar, depending on whether the node already
 * has a key.
 */
function visitScalar(
  tree: DocumentTree,
  node: NodeId,
  scalar: SourceScalar
): void {
  const { text, flags } = canonicalizeScalar(scalar);
  const val = tree.copyToArena(text);
  const key = tree.keySpan(node);

  if (key !== null) {
    tree.toKeyVal(node, key, val);
  } else {
    tree.toVal(node, val);
  }

  if (flags !== 0) tree.addFlags(node, flags);
}

/**
 * Runtime fallback for a `kind` outside the closed set.
 *
 * Unreachable for well-typed callers; reached only when a hand-built value
 * bypasses the type system. Such a value fails loudly rather than leaving an
 * empty node behind.
 */
function reportUnknownKind(
  tree: DocumentTree,
  node: NodeId,
  value: never
): never {
  const raw: unknown = value;
  const kind = isRecord(raw) ? String(raw.kind) : describeValue(raw);
  return tree.fail(
    `Cannot materialize source value of unknown kind "${kind}" into node ${node}.`
  );
}

function visit(tree: DocumentTree, stack: WorkItem[], item: WorkItem): void {
  const { value, node } = item;

  switch (value.kind) {
    case 'table':
      return visitTable(tree, stack, item, value);

    case 'array':
      return visitArray(tree, stack, item, value);

    case 'string':
    case 'integer':
    case 'float':
    case 'boolean':
    case 'null':
    case 'date':
    case 'time':
    case 'datetime':
      return visitScalar(tree, node, value);

    case 'unsupported':
      return tree.fail(
        `Cannot materialize unsupported source value (${value.description}) into node ${node}.`
      );

    default:
      return reportUnknownKind(tree, node, value);
  }
}

/**
 * Materializes a source value into `node` of `tree`.
 *
 * Contract
 * --------
 * - Structure: one destination node per source value; table member order,
 *   array element order and nesting depth are preserved.
 * - Keys: a key carried by `node` before the call is still there afterwards,
 *   whatever the source kind.
 * - Ownership: every key and scalar text is copied into `tree`'s arena; nothing
 *   in the tree refers to memory owned by the source value.
 * - Errors: reported through `tree.onError`. A failed call leaves the tree
 *   partially written; its content must not be relied upon.
 *
 * Traversal
 * ---------
 * The walk uses an explicit stack of {@link WorkItem}s instead of recursion,
 * so memory use follows the document's nesting depth on the heap, capped by
 * `options.maxDepth`.
 *
 * Trace (`{ a = 1, b = [2, 3] }` into the root):
 * 1. Pop (table, 0): root -> map; append 1 (key `a`), 2 (key `b`);
 *    push (array, 2), (1, 1).
 * 2. Pop (1, 1): node 1 -> keyed scalar `a: 1`.
 * 3. Pop (array, 2): node 2 -> seq keyed `b`; append 3, 4; push (3, 4), (2, 3).
 * 4. Pop (2, 3), then (3, 4): keyless scalars `2`, `3`.
 *
 * @param value - The parsed document (or any sub-value of one).
 * @param tree - Destination tree.
 * @param node - Destination node; the tree's root by default.
 * @param options - See {@link MaterializeOptions}.
 */
export function materialize(
  value: SourceValue,
  tree: DocumentTree,
  node: NodeId = tree.rootId(),
  options: Partial<MaterializeOptions> = {}
): void {
  const { maxDepth } = normalizeMaterializeOptions(options);
  const stack: WorkItem[] = [{ value, node, depth: 0 }];

  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    if (item.depth > maxDepth) {
      tree.fail(
        `Document nesting exceeds the maximum depth of ${maxDepth} at node ${item.node}.`
      );
    }

    visit(tree, stack, item);
  }
}
