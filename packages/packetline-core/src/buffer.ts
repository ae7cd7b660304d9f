// Outgoing buffer: bytes to send plus a write cursor.

/**
 * A fully formed region ready for transmission.
 *
 * The bytes are never modified after construction. Only the send loop moves
 * the cursor, as the transport accepts bytes.
 */
export class OutgoingBuffer {
  readonly bytes: Uint8Array;
  readonly length: number;
  private position = 0;

  constructor(bytes: Uint8Array, length: number = bytes.length) {
    if (!Number.isInteger(length) || length < 0 || length > bytes.length) {
      throw new RangeError(`length ${length} outside 0..${bytes.length}`);
    }
    this.bytes = bytes;
    this.length = length;
  }

  /** Allocate a zeroed buffer of `size` bytes. */
  static alloc(size: number): OutgoingBuffer {
    return new OutgoingBuffer(new Uint8Array(size));
  }

  /** Offset of the first byte not yet written. */
  get cursor(): number {
    return this.position;
  }

  get remaining(): number {
    return this.length - this.position;
  }

  get done(): boolean {
    return this.position >= this.length;
  }

  /** View of the bytes still to be written. */
  pending(): Uint8Array {
    return this.bytes.subarray(this.position, this.length);
  }

  /** Record that the transport accepted `count` more bytes. */
  advance(count: number): void {
    if (!Number.isInteger(count) || count < 0 || count > this.remaining) {
      throw new RangeError(`cannot advance by ${count}, ${this.remaining} bytes remain`);
    }
    this.position += count;
  }
}
