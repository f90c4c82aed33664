import type { DocumentTree } from './tree';
import { NodeFlag, type NodeId, type NodeKind } from './types';

/**
 * A `(tree, id)` pair for convenient navigation.
 *
 * Holds no state of its own: every accessor reads the tree, so a ref sees
 * later mutations of its node.
 *
 * @example
 * ```ts
 * const tree = parseTomlInPlace('[server]\nport = 8080');
 * tree.ref().get('server').get('port').val; // "8080"
 * ```
 */
export class NodeRef {
  constructor(
    readonly tree: DocumentTree,
    readonly id: NodeId
  ) {}

  get kind(): NodeKind {
    return this.tree.kind(this.id);
  }

  get isMap(): boolean {
    return this.tree.isMap(this.id);
  }

  get isSeq(): boolean {
    return this.tree.isSeq(this.id);
  }

  get isScalar(): boolean {
    return this.tree.isScalar(this.id);
  }

  get hasKey(): boolean {
    return this.tree.hasKey(this.id);
  }

  get key(): string {
    return this.tree.key(this.id);
  }

  get hasVal(): boolean {
    return this.tree.hasVal(this.id);
  }

  get val(): string {
    return this.tree.val(this.id);
  }

  /**
   * Whether the value came from a string literal.
   */
  get isQuoted(): boolean {
    return this.tree.hasFlags(this.id, NodeFlag.ValueQuoted);
  }

  get numChildren(): number {
    return this.tree.numChildren(this.id);
  }

  /**
   * Whether a child with `key` exists.
   */
  has(key: string): boolean {
    return this.tree.findChild(this.id, key) !== undefined;
  }

  /**
   * The child addressed by `key` (maps) or by `position` (any container).
   *
   * A missing child is reported through the tree's error handler.
   */
  get(keyOrPosition: string | number): NodeRef {
    const childId =
      typeof keyOrPosition === 'number'
        ? this.tree.child(this.id, keyOrPosition)
        : this.tree.findChild(this.id, keyOrPosition);

    if (childId === undefined) {
      return this.tree.fail(
        `Node ${this.id} has no child ${JSON.stringify(keyOrPosition)}.`
      );
    }

    return new NodeRef(this.tree, childId);
  }

  children(): NodeRef[] {
    return this.tree.children(this.id).map(id => new NodeRef(this.tree, id));
  }
}
