/**
 * A range of bytes inside an {@link Arena}.
 *
 * Spans are plain offsets, not views, so they stay valid when the arena
 * grows and its backing buffer is reallocated.
 */
export type TextSpan = {
  readonly offset: number;
  readonly length: number;
};

const DEFAULT_CAPACITY = 256;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Append-only UTF-8 byte storage.
 *
 * Contract:
 * - `alloc` only ever appends; bytes handed out are never moved relative to
 *   the arena's origin and never reused.
 * - Growth doubles the backing buffer and copies the bytes written so far.
 * - Not re-entrant: a single writer at a time (see `DocumentTree`).
 */
export class Arena {
  #buffer: Uint8Array;
  #size = 0;

  constructor(capacity: number = DEFAULT_CAPACITY) {
    this.#buffer = new Uint8Array(Math.max(1, Math.floor(capacity)));
  }

  /**
   * Number of bytes allocated so far.
   */
  get size(): number {
    return this.#size;
  }

  /**
   * Number of bytes the current backing buffer can hold.
   */
  get capacity(): number {
    return this.#buffer.length;
  }

  /**
   * Reserves `size` bytes at the end of the arena.
   *
   * The reserved bytes are zeroed; fill them through {@link Arena.bytes}.
   *
   * @throws If `size` is negative or not an integer.
   */
  alloc(size: number): TextSpan {
    if (!Number.isInteger(size) || size < 0) {
      throw new Error(
        `[docarena] Invalid arena allocation size: ${size}. Expected a non-negative integer.`
      );
    }

    this.#reserve(this.#size + size);

    const span: TextSpan = { offset: this.#size, length: size };
    this.#size += size;
    return span;
  }

  /**
   * Copies `text` into the arena as UTF-8.
   */
  copy(text: string): TextSpan {
    const encoded = encoder.encode(text);
    const span = this.alloc(encoded.length);
    this.#buffer.set(encoded, span.offset);
    return span;
  }

  /**
   * Returns a writable view over the bytes of `span`.
   *
   * The view aliases the current backing buffer; it must not be kept across
   * further allocations, which may replace the buffer.
   */
  bytes(span: TextSpan): Uint8Array {
    this.#assertInBounds(span);
    return this.#buffer.subarray(span.offset, span.offset + span.length);
  }

  /**
   * Decodes the bytes of `span` as UTF-8.
   */
  text(span: TextSpan): string {
    if (span.length === 0) return '';
    return decoder.decode(this.bytes(span));
  }

  #reserve(required: number): void {
    if (required <= this.#buffer.length) return;

    let capacity = this.#buffer.length;
    while (capacity < required) capacity *= 2;

    const next = new Uint8Array(capacity);
    next.set(this.#buffer.subarray(0, this.#size));
    this.#buffer = next;
  }

  #assertInBounds(span: TextSpan): void {
    if (
      span.offset < 0 ||
      span.length < 0 ||
      span.offset + span.length > this.#size
    ) {
      throw new Error(
        `[docarena] Span [${span.offset}, +${span.length}) lies outside the arena (size ${this.#size}).`
      );
    }
  }
}
