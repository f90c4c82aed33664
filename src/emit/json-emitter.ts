import type { DocumentTree } from '../tree/tree';
import { NodeFlag, type NodeId } from '../tree/types';

export type EmitOptions = {
  /**
   * Node to emit; the root by default.
   */
  node: NodeId | undefined;

  /**
   * Spaces per nesting level. `0` emits everything on one line.
   *
   * @default 2
   */
  indent: number;
};

export function normalizeEmitOptions(options: Partial<EmitOptions>): EmitOptions {
  return {
    node: undefined,
    indent: 2,
    ...options
  };
}

/**
 * The JSON number grammar (RFC 8259, section 6).
 */
const JSON_NUMBER = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

/**
 * Chooses the JSON spelling of a scalar.
 *
 * Values are stored as text, so the type is recovered from the text itself:
 * 1. Quoted (string literal in the source) -> JSON string, always.
 * 2. `true`, `false`, `null`                -> the JSON literal.
 * 3. Text matching the JSON number grammar  -> emitted raw, digit for digit
 *    (no round trip through `number`, so 64-bit integers survive).
 * 4. Anything else (`.inf`, dates, ...)     -> JSON string.
 *
 * A keyed member that never received a value emits `null`.
 */
function emitScalar(tree: DocumentTree, id: NodeId): string {
  if (!tree.hasVal(id)) return 'null';

  const text = tree.val(id);
  if (tree.hasFlags(id, NodeFlag.ValueQuoted)) return JSON.stringify(text);

  if (text === 'true' || text === 'false' || text === 'null') return text;
  if (JSON_NUMBER.test(text)) return text;

  return JSON.stringify(text);
}

type Frame =
  | { type: 'node'; id: NodeId; depth: number }
  | { type: 'text'; text: string };

/**
 * Serializes a tree (or a subtree) as JSON.
 *
 * The walk uses an explicit stack of frames: container nodes expand into
 * their punctuation and children, pushed in reverse so they pop in order.
 *
 * @example
 * ```ts
 * const tree = parseTomlInPlace('a = 1\nb = [2, 3]');
 * emitJson(tree, { indent: 0 }); // '{"a":1,"b":[2,3]}'
 * ```
 */
export function emitJson(
  tree: DocumentTree,
  options: Partial<EmitOptions> = {}
): string {
  const { node, indent } = normalizeEmitOptions(options);
  const newline = indent > 0 ? '\n' : '';
  const separator = indent > 0 ? ': ' : ':';
  const pad = (depth: number) => newline + ' '.repeat(indent * depth);

  const out: string[] = [];
  const stack: Frame[] = [
    { type: 'node', id: node ?? tree.rootId(), depth: 0 }
  ];

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    if (frame.type === 'text') {
      out.push(frame.text);
      continue;
    }

    const { id, depth } = frame;
    const kind = tree.kind(id);

    if (kind === 'unset') {
      out.push('null');
      continue;
    }

    if (kind === 'scalar') {
      out.push(emitScalar(tree, id));
      continue;
    }

    const isMap = kind === 'map';
    const children = tree.children(id);

    if (children.length === 0) {
      out.push(isMap ? '{}' : '[]');
      continue;
    }

    // Build the frames in document order, then push them reversed.
    const frames: Frame[] = [{ type: 'text', text: isMap ? '{' : '[' }];
    children.forEach((childId, index) => {
      const label = isMap ? JSON.stringify(tree.key(childId)) + separator : '';
      frames.push({
        type: 'text',
        text: (index > 0 ? ',' : '') + pad(depth + 1) + label
      });
      frames.push({ type: 'node', id: childId, depth: depth + 1 });
    });
    frames.push({ type: 'text', text: pad(depth) + (isMap ? '}' : ']') });

    for (let index = frames.length - 1; index >= 0; index--) {
      const next = frames[index];
      if (next) stack.push(next);
    }
  }

  return out.join('');
}
