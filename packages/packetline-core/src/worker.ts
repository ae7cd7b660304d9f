// Shared context and helpers for the send and receive loops.

import type { SocketConfig } from "./config.ts";
import type { SocketError } from "./errors.ts";
import type { Diagnostics } from "./logging.ts";
import type { BufferPool } from "./pool.ts";
import type { OutgoingQueue } from "./queue.ts";
import type { SocketHandle } from "./transport.ts";

/** Connection state as seen by the caller. */
export type ConnectionState = "disconnected" | "connecting" | "connected";

/** Everything a loop needs from the connection that started it. */
export interface WorkerContext {
  readonly handle: SocketHandle;
  readonly config: Readonly<SocketConfig>;
  readonly queue: OutgoingQueue;
  readonly pool: BufferPool;
  readonly diagnostics: Diagnostics;
  /** Aborted by stop(), or when the receive loop ends on its own. */
  readonly signal: AbortSignal;

  state(): ConnectionState;
  isConnected(): boolean;
  reportError(error: SocketError): void;
  /** Raw bytes from one read; a view into a pooled buffer. */
  onBytes(bytes: Uint8Array): void;
  /** Called exactly once, as the send loop's last act. */
  onSendExit(): void;
  /** Called exactly once, as the receive loop's last act. */
  onReceiveExit(): void;
}

/**
 * Sleep for `ms`, waking early when `signal` aborts. Never rejects.
 */
export function idle(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const wake = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", wake);
      resolve();
    };
    const timer = setTimeout(wake, ms);
    signal.addEventListener("abort", wake, { once: true });
  });
}

/**
 * Yield while the connection is still being established.
 *
 * Returns true when the loop should go active, false when it should end
 * without doing any I/O.
 */
export async function waitForConnect(ctx: WorkerContext): Promise<boolean> {
  while (ctx.state() === "connecting" && !ctx.signal.aborted) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
  return !ctx.signal.aborted && ctx.isConnected();
}
