import { describe, expect, it } from 'vitest';
import { materialize } from '../../materializer';
import { sourceArray, sourceTable } from '../../source/types';
import { DocumentTree } from '../tree';

describe('NodeRef', () => {
  const tree = new DocumentTree();
  materialize(
    sourceTable([
      ['name', { kind: 'string', value: 'docarena' }],
      [
        'tags',
        sourceArray([
          { kind: 'string', value: 'tree' },
          { kind: 'integer', value: 2n }
        ])
      ]
    ]),
    tree
  );
  const root = tree.ref();

  it('navigates by key and by position', () => {
    expect(root.isMap).toBe(true);
    expect(root.has('name')).toBe(true);
    expect(root.has('version')).toBe(false);
    expect(root.get('name').val).toBe('docarena');
    expect(root.get('tags').get(1).val).toBe('2');
  });

  it('exposes kind, key and quoting', () => {
    const tags = root.get('tags');

    expect(tags.kind).toBe('seq');
    expect(tags.isSeq).toBe(true);
    expect(tags.key).toBe('tags');
    expect(tags.numChildren).toBe(2);
    expect(tags.get(0).isQuoted).toBe(true);
    expect(tags.get(1).isQuoted).toBe(false);
    expect(tags.get(1).hasKey).toBe(false);
  });

  it('lists children in order', () => {
    expect(root.children().map(child => child.key)).toEqual(['name', 'tags']);
  });

  it('reports a missing child through the tree handler', () => {
    expect(() => root.get('version')).toThrow(
      '[docarena] Node 0 has no child "version".'
    );
    expect(() => root.get('tags').get(5)).toThrow(
      '[docarena] Node 2 has no child 5.'
    );
    expect(() => root.get('tags').get(-1)).toThrow(
      '[docarena] Node 2 has no child -1.'
    );
  });
});
