// Unbounded FIFO between callers of send() and the send loop.

import type { OutgoingBuffer } from "./buffer.ts";

/**
 * Multi-producer single-consumer queue of outgoing buffers.
 *
 * Every operation runs to completion on the event loop, so pushes from any
 * number of callers and shifts from the send loop never interleave.
 */
export class OutgoingQueue {
  private items: OutgoingBuffer[] = [];
  private head = 0;

  get size(): number {
    return this.items.length - this.head;
  }

  push(buffer: OutgoingBuffer): void {
    this.items.push(buffer);
  }

  /** Take the oldest buffer, or undefined when empty. */
  shift(): OutgoingBuffer | undefined {
    if (this.head >= this.items.length) return undefined;

    const buffer = this.items[this.head];
    this.head++;

    // Compact once the consumed prefix dominates
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return buffer;
  }

  /** Discard everything queued; returns how many buffers were dropped. */
  clear(): number {
    const dropped = this.size;
    this.items = [];
    this.head = 0;
    return dropped;
  }
}
