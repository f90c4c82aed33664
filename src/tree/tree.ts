import {
  type ErrorLocation,
  reportError,
  throwingErrorHandler
} from '../report';
import { Arena, type TextSpan } from './arena';
import { NodeRef } from './node-ref';
import type {
  NodeFlags,
  NodeId,
  NodeKind,
  NodeRecord,
  TreeOptions
} from './types';

const ROOT_ID: NodeId = 0;

/**
 * Merges caller options with the tree defaults.
 */
export function normalizeTreeOptions(
  options: Partial<TreeOptions>
): TreeOptions {
  return {
    onError: throwingErrorHandler,
    arenaCapacity: 256,
    ...options
  };
}

function createRecord(parent: NodeId | null): NodeRecord {
  return {
    kind: 'unset',
    flags: 0,
    key: null,
    val: null,
    parent,
    children: []
  };
}

/**
 * Arena-backed, index-addressed document tree.
 *
 * Nodes live in a dense array addressed by {@link NodeId}; keys and values are
 * {@link TextSpan}s into the tree's own {@link Arena}. The tree is the single
 * destination for every front-end format.
 *
 * Mutation primitives
 * -------------------
 * `toMap`, `toSeq`, `toKeyVal` and `toVal` reassign a node's kind in place.
 * Each of them *replaces* the key: callers that want to keep a key pass it
 * back in (see `materialize`). Flags are cleared on reassignment.
 *
 * Errors go through the handler bound at construction.
 */
export class DocumentTree {
  readonly arena: Arena;
  readonly onError: TreeOptions['onError'];

  #nodes: NodeRecord[] = [createRecord(null)];

  constructor(options: Partial<TreeOptions> = {}) {
    const normalized = normalizeTreeOptions(options);
    this.arena = new Arena(normalized.arenaCapacity);
    this.onError = normalized.onError;
  }

  /**
   * Number of nodes, including the root.
   */
  get size(): number {
    return this.#nodes.length;
  }

  rootId(): NodeId {
    return ROOT_ID;
  }

  /**
   * Navigation handle for `id` (the root by default).
   */
  ref(id: NodeId = ROOT_ID): NodeRef {
    this.#record(id);
    return new NodeRef(this, id);
  }

  /**
   * Reports an error through the tree's handler.
   */
  fail(message: string, location?: ErrorLocation): never {
    return reportError(this.onError, { message, location });
  }

  // ---------------------------------------------------------------------------
  // Arena
  // ---------------------------------------------------------------------------

  allocArena(size: number): TextSpan {
    return this.arena.alloc(size);
  }

  copyToArena(text: string): TextSpan {
    return this.arena.copy(text);
  }

  text(span: TextSpan): string {
    return this.arena.text(span);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  kind(id: NodeId): NodeKind {
    return this.#record(id).kind;
  }

  isMap(id: NodeId): boolean {
    return this.kind(id) === 'map';
  }

  isSeq(id: NodeId): boolean {
    return this.kind(id) === 'seq';
  }

  isScalar(id: NodeId): boolean {
    return this.kind(id) === 'scalar';
  }

  hasKey(id: NodeId): boolean {
    return this.#record(id).key !== null;
  }

  /**
   * The key span of `id`, or `null` when the node has no key.
   */
  keySpan(id: NodeId): TextSpan | null {
    return this.#record(id).key;
  }

  key(id: NodeId): string {
    const span = this.#record(id).key;
    if (span === null) return this.fail(`Node ${id} has no key.`);
    return this.text(span);
  }

  hasVal(id: NodeId): boolean {
    return this.#record(id).val !== null;
  }

  valSpan(id: NodeId): TextSpan | null {
    return this.#record(id).val;
  }

  val(id: NodeId): string {
    const span = this.#record(id).val;
    if (span === null) return this.fail(`Node ${id} has no value.`);
    return this.text(span);
  }

  hasFlags(id: NodeId, flags: NodeFlags): boolean {
    return (this.#record(id).flags & flags) === flags;
  }

  parent(id: NodeId): NodeId | null {
    return this.#record(id).parent;
  }

  numChildren(id: NodeId): number {
    return this.#record(id).children.length;
  }

  children(id: NodeId): readonly NodeId[] {
    return this.#record(id).children;
  }

  /**
   * The child at `position`, or `undefined` when out of range. Positions
   * count from the first child only; negative positions are out of range.
   */
  child(id: NodeId, position: number): NodeId | undefined {
    const { children } = this.#record(id);
    return position >= 0 ? children[position] : undefined;
  }

  /**
   * The first child of `id` whose key equals `key`.
   */
  findChild(id: NodeId, key: string): NodeId | undefined {
    for (const childId of this.#record(id).children) {
      const span = this.#record(childId).key;
      if (span !== null && this.text(span) === key) return childId;
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Appends a new `unset` child to a container node.
   */
  appendChild(parent: NodeId): NodeId {
    const record = this.#record(parent);

    if (record.kind !== 'map' && record.kind !== 'seq') {
      return this.fail(
        `Cannot append a child to node ${parent}: expected a map or seq, found ${record.kind}.`
      );
    }

    const id = this.#nodes.length;
    this.#nodes.push(createRecord(parent));
    record.children.push(id);
    return id;
  }

  /**
   * Reassigns `id` as a map with the given key (none when omitted).
   */
  toMap(id: NodeId, key: TextSpan | null = null): void {
    this.#reassignContainer(id, 'map', key);
  }

  /**
   * Reassigns `id` as a seq with the given key (none when omitted).
   */
  toSeq(id: NodeId, key: TextSpan | null = null): void {
    this.#reassignContainer(id, 'seq', key);
  }

  /**
   * Reassigns `id` as a keyed scalar.
   *
   * `val` may be `null` to name a member whose value is assigned later.
   */
  toKeyVal(id: NodeId, key: TextSpan, val: TextSpan | null): void {
    this.#reassignScalar(id, key, val);
  }

  /**
   * Reassigns `id` as a keyless scalar.
   */
  toVal(id: NodeId, val: TextSpan): void {
    this.#reassignScalar(id, null, val);
  }

  addFlags(id: NodeId, flags: NodeFlags): void {
    this.#record(id).flags |= flags;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  #record(id: NodeId): NodeRecord {
    const record = Number.isInteger(id) ? this.#nodes[id] : undefined;
    if (!record) {
      return this.fail(`Unknown node id ${id} (tree has ${this.size} nodes).`);
    }
    return record;
  }

  #reassignContainer(
    id: NodeId,
    kind: 'map' | 'seq',
    key: TextSpan | null
  ): void {
    const record = this.#record(id);

    // Children of a map are keyed and children of a seq are not, so a node
    // that already holds children may only be reassigned to its own kind.
    if (record.children.length > 0 && record.kind !== kind) {
      this.fail(
        `Cannot reassign node ${id} to ${kind}: it already holds ${record.children.length} children as ${record.kind}.`
      );
    }

    record.kind = kind;
    record.key = key;
    record.val = null;
    record.flags = 0;
  }

  #reassignScalar(id: NodeId, key: TextSpan | null, val: TextSpan | null): void {
    const record = this.#record(id);

    if (record.children.length > 0) {
      this.fail(
        `Cannot reassign node ${id} to scalar: it holds ${record.children.length} children.`
      );
    }

    record.kind = 'scalar';
    record.key = key;
    record.val = val;
    record.flags = 0;
  }
}
