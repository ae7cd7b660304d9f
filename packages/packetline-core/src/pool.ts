// Reusable read buffers.

/**
 * Pool of byte regions keyed by size.
 *
 * A rented buffer belongs to the borrower until it is released. Contents are
 * not cleared on release; borrowers only read the part they filled.
 */
export class BufferPool {
  private free = new Map<number, Uint8Array[]>();
  private lent = new Set<Uint8Array>();

  constructor(private readonly maxRetained = 8) {}

  /** Number of buffers currently rented out. */
  get outstanding(): number {
    return this.lent.size;
  }

  /** Number of free buffers held for `size`. */
  available(size: number): number {
    return this.free.get(size)?.length ?? 0;
  }

  rent(size: number): Uint8Array {
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`buffer size must be a positive integer, got ${size}`);
    }
    const buffer = this.free.get(size)?.pop() ?? new Uint8Array(size);
    this.lent.add(buffer);
    return buffer;
  }

  /**
   * Return a rented buffer. Returns false, and keeps nothing, for a buffer
   * this pool did not lend or one already released.
   */
  release(buffer: Uint8Array): boolean {
    if (!this.lent.delete(buffer)) return false;

    let list = this.free.get(buffer.length);
    if (!list) {
      list = [];
      this.free.set(buffer.length, list);
    }
    if (list.length < this.maxRetained) {
      list.push(buffer);
    }
    return true;
  }

  /**
   * Rent a buffer for the duration of `fn`. The buffer goes back to the pool
   * however `fn` ends, so `fn` must not keep references into it.
   */
  async lease<T>(size: number, fn: (buffer: Uint8Array) => T | Promise<T>): Promise<T> {
    const buffer = this.rent(size);
    try {
      return await fn(buffer);
    } finally {
      this.release(buffer);
    }
  }
}
