import type { SourceValue } from '../source/types';
import type { NodeId } from '../tree/types';

export type MaterializeOptions = {
  /**
   * Deepest nesting level accepted below the target node (the target itself
   * is level 0). A document nested deeper is reported through the tree's
   * error handler.
   *
   * @default 1024
   */
  maxDepth: number;
};

/**
 * One pending unit of work: a source value and the node it materializes into.
 */
export type WorkItem = {
  value: SourceValue;
  node: NodeId;
  depth: number;
};
