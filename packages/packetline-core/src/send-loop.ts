// Send loop: drains the outgoing queue onto the socket.

import type { OutgoingBuffer } from "./buffer.ts";
import { SocketError } from "./errors.ts";
import type { SocketHandle } from "./transport.ts";
import { idle, waitForConnect, type WorkerContext } from "./worker.ts";

/**
 * Run until the connection drops, the signal aborts, or a fatal error.
 *
 * Each pass writes every queued buffer in FIFO order, then idles for
 * `senderPollIntervalMs`. A buffer whose write fails is dropped. Whatever
 * ends the loop, `onSendExit` runs exactly once afterwards.
 */
export async function runSendLoop(ctx: WorkerContext): Promise<void> {
  try {
    if (!(await waitForConnect(ctx))) return;

    while (ctx.isConnected() && !ctx.signal.aborted) {
      try {
        for (let buffer = ctx.queue.shift(); buffer; buffer = ctx.queue.shift()) {
          if (ctx.signal.aborted) return;
          await writeFully(ctx.handle, buffer, ctx.signal);
        }
      } catch (err) {
        if (ctx.signal.aborted) break;

        const error = SocketError.from(err);
        ctx.reportError(error);
        if (error.fatal) break;
      }

      await idle(ctx.config.senderPollIntervalMs, ctx.signal);
    }
  } finally {
    ctx.diagnostics.debug("send loop finished", { aborted: ctx.signal.aborted });
    ctx.onSendExit();
  }
}

/**
 * Write until the buffer's cursor reaches its length.
 */
export async function writeFully(
  handle: SocketHandle,
  buffer: OutgoingBuffer,
  signal: AbortSignal,
): Promise<void> {
  while (!buffer.done) {
    const written = await handle.write(buffer.pending(), signal);
    if (written <= 0) {
      throw new SocketError("io", `transport accepted no bytes (${buffer.remaining} pending)`);
    }
    buffer.advance(written);
  }
}
