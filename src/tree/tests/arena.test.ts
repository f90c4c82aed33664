import { describe, expect, it } from 'vitest';
import { Arena } from '../arena';

/**
 * Test suite: append-only arena.
 *
 * Coverage:
 * - Sequential allocation and growth.
 * - UTF-8 copy / decode.
 * - Span stability across reallocation.
 * - Bounds checks.
 */
describe('Arena', () => {
  it('hands out consecutive spans and doubles its capacity on demand', () => {
    // 1. Allocate past the initial capacity.
    const arena = new Arena(4);
    const first = arena.alloc(3);
    const second = arena.alloc(5);

    // 2. Assert the spans are adjacent.
    expect(first).toEqual({ offset: 0, length: 3 });
    expect(second).toEqual({ offset: 3, length: 5 });

    // 3. Assert the bookkeeping.
    expect(arena.size).toBe(8);
    expect(arena.capacity).toBe(8);
  });

  it('copies text as UTF-8 and decodes it back', () => {
    const arena = new Arena();

    const span = arena.copy('héllo');

    // "é" takes two bytes.
    expect(span.length).toBe(6);
    expect(arena.text(span)).toBe('héllo');
  });

  it('keeps earlier spans valid after the buffer is reallocated', () => {
    // 1. Start with a tiny buffer so every copy reallocates.
    const arena = new Arena(1);
    const span = arena.copy('abc');

    // 2. Force several reallocations.
    for (let index = 0; index < 50; index++) arena.copy(`filler-${index}`);

    // 3. Assert the first span still reads the same text.
    expect(arena.capacity).toBeGreaterThan(1);
    expect(arena.text(span)).toBe('abc');
  });

  it('allocates empty spans at the current end', () => {
    const arena = new Arena();
    arena.copy('ab');

    const span = arena.alloc(0);

    expect(span).toEqual({ offset: 2, length: 0 });
    expect(arena.text(span)).toBe('');
  });

  it('exposes writable bytes for a reserved span', () => {
    const arena = new Arena();
    const span = arena.alloc(2);

    arena.bytes(span).set([104, 105]);

    expect(arena.text(span)).toBe('hi');
  });

  it('rejects negative and fractional sizes', () => {
    const arena = new Arena();

    expect(() => arena.alloc(-1)).toThrow(
      '[docarena] Invalid arena allocation size: -1. Expected a non-negative integer.'
    );
    expect(() => arena.alloc(1.5)).toThrow(/Invalid arena allocation size/);
  });

  it('rejects spans outside the allocated region', () => {
    const arena = new Arena();
    arena.copy('abc');

    expect(() => arena.text({ offset: 2, length: 5 })).toThrow(
      '[docarena] Span [2, +5) lies outside the arena (size 3).'
    );
  });
});
