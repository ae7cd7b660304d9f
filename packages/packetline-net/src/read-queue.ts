// Buffered inbound deliveries for event-driven Node sockets.
//
// Node pushes "data"/"message" events; the receive loop pulls with read().
// This queue sits between them.

import { SocketError } from "@packetline/core";

type WaitOutcome = "ready" | "aborted" | "timeout";

/**
 * FIFO of received chunks with a single pending reader.
 *
 * Chunk boundaries are kept: one read never spans two chunks.
 */
export class ReadQueue {
  private chunks: Uint8Array[] = [];
  private queued = 0;
  private ended = false;
  private failure: SocketError | null = null;
  private waiter: (() => void) | null = null;

  /** `onDrain` runs after a read takes bytes off the queue. */
  constructor(private readonly onDrain: () => void = () => {}) {}

  /** Bytes currently queued. */
  get size(): number {
    return this.queued;
  }

  push(chunk: Uint8Array): void {
    if (this.ended) return;
    this.chunks.push(chunk);
    this.queued += chunk.length;
    this.waiter?.();
  }

  /** No more data will arrive; queued chunks stay readable. */
  end(): void {
    this.ended = true;
    this.waiter?.();
  }

  /**
   * Reads fail with `error` once queued chunks are consumed. A fatal error
   * fails every later read; any other error fails one read and is cleared.
   */
  fail(error: SocketError): void {
    if (this.failure?.fatal) return;
    this.failure = error;
    this.waiter?.();
  }

  /**
   * Copy up to `into.length` bytes of the oldest chunk.
   *
   * Resolves 0 on abort or for an empty chunk. Rejects with a timeout after
   * `timeoutMs` (0 waits forever), with the recorded failure, or with
   * "closed" once the queue has ended and drained.
   */
  async read(into: Uint8Array, signal: AbortSignal, timeoutMs: number): Promise<number> {
    if (this.chunks.length === 0 && !this.ended && !this.failure) {
      const outcome = await this.wait(signal, timeoutMs);
      if (outcome === "aborted") return 0;
      if (outcome === "timeout") throw SocketError.timeout("read", timeoutMs);
    }

    const chunk = this.chunks.shift();
    if (chunk) {
      const count = Math.min(chunk.length, into.length);
      into.set(chunk.subarray(0, count));
      if (count < chunk.length) {
        this.chunks.unshift(chunk.subarray(count));
      }
      this.queued -= count;
      this.onDrain();
      return count;
    }

    const failure = this.failure;
    if (failure) {
      if (!failure.fatal) this.failure = null;
      throw failure;
    }
    throw SocketError.closed();
  }

  private wait(signal: AbortSignal, timeoutMs: number): Promise<WaitOutcome> {
    if (signal.aborted) return Promise.resolve("aborted");
    if (this.waiter) {
      return Promise.reject(new Error("ReadQueue supports a single pending read"));
    }

    return new Promise((resolve) => {
      const timer = timeoutMs > 0 ? setTimeout(() => finish("timeout"), timeoutMs) : null;
      const onAbort = () => finish("aborted");

      const finish = (outcome: WaitOutcome) => {
        if (timer) clearTimeout(timer);
        signal.removeEventListener("abort", onAbort);
        this.waiter = null;
        resolve(outcome);
      };

      this.waiter = () => finish("ready");
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }
}
