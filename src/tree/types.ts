import type { ErrorHandler } from '../report';
import type { TextSpan } from './arena';

/**
 * Index of a node inside its `DocumentTree`.
 *
 * Ids are dense, start at 0 (the root) and are never reused: nodes are only
 * ever appended.
 */
export type NodeId = number;

/**
 * Destination shape of a node.
 *
 * - `unset`:  freshly allocated, not yet assigned.
 * - `map`:    keyed children.
 * - `seq`:    positional children.
 * - `scalar`: a single text value; "keyed" when the node also carries a key.
 */
export type NodeKind = 'unset' | 'map' | 'seq' | 'scalar';

/**
 * Marker bits attached to nodes for downstream emitters.
 */
export const NodeFlag = {
  None: 0,

  /**
   * The value came from a string literal and should be emitted quoted.
   */
  ValueQuoted: 1 << 0
} as const;

export type NodeFlags = number;

/**
 * Internal node storage.
 */
export type NodeRecord = {
  kind: NodeKind;
  flags: NodeFlags;
  key: TextSpan | null;
  val: TextSpan | null;
  parent: NodeId | null;
  children: NodeId[];
};

export type TreeOptions = {
  /**
   * Receives every error raised while operating on the tree.
   *
   * @default throwingErrorHandler
   */
  onError: ErrorHandler;

  /**
   * Initial arena size in bytes; the arena grows on demand.
   *
   * @default 256
   */
  arenaCapacity: number;
};
