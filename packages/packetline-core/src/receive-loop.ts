// Receive loop: reads into pooled buffers and forwards raw bytes.

import { SocketError } from "./errors.ts";
import { idle, waitForConnect, type WorkerContext } from "./worker.ts";

/**
 * Run until the connection drops, the signal aborts, or a fatal error.
 *
 * A zero-length read forwards nothing. Forwarded bytes are a view into a
 * pooled buffer that is reused once `onBytes` returns. Whatever ends the
 * loop, `onReceiveExit` runs exactly once afterwards.
 */
export async function runReceiveLoop(ctx: WorkerContext): Promise<void> {
  try {
    if (!(await waitForConnect(ctx))) return;

    while (ctx.isConnected() && !ctx.signal.aborted) {
      try {
        await ctx.pool.lease(ctx.config.readChunkSize, async (chunk) => {
          const count = await ctx.handle.read(chunk, ctx.signal);
          if (count > 0 && !ctx.signal.aborted) {
            ctx.onBytes(chunk.subarray(0, count));
          }
        });
      } catch (err) {
        if (ctx.signal.aborted) break;

        const error = SocketError.from(err);
        if (error.kind === "closed" && !ctx.handle.connected) {
          ctx.diagnostics.debug("peer closed the connection");
          break;
        }
        ctx.reportError(error);
        if (error.fatal) break;
      }

      await idle(ctx.config.listenerPollIntervalMs, ctx.signal);
    }
  } finally {
    ctx.diagnostics.debug("receive loop finished", { aborted: ctx.signal.aborted });
    ctx.onReceiveExit();
  }
}
