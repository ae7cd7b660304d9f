// Callback-to-promise bridge with timeout and cancellation.

import { SocketError } from "@packetline/core";

/**
 * Start a callback-style socket operation and settle on whichever comes
 * first: its callback, `timeoutMs` (0 disables), or `signal` aborting.
 * Late callbacks after a timeout or abort are ignored.
 */
export function settle<T>(
  operation: "read" | "write",
  timeoutMs: number,
  signal: AbortSignal,
  start: (done: (error: Error | null | undefined, value: T) => void) => void,
): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(SocketError.cancelled(operation));
  }

  return new Promise<T>((resolve, reject) => {
    let finished = false;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => fail(SocketError.timeout(operation, timeoutMs)), timeoutMs)
        : null;
    const onAbort = () => fail(SocketError.cancelled(operation));

    const finish = (): boolean => {
      if (finished) return false;
      finished = true;
      if (timer) clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
      return true;
    };
    const fail = (error: SocketError) => {
      if (finish()) reject(error);
    };

    signal.addEventListener("abort", onAbort, { once: true });

    try {
      start((error, value) => {
        if (error) {
          fail(SocketError.from(error));
        } else if (finish()) {
          resolve(value);
        }
      });
    } catch (error) {
      fail(SocketError.from(error));
    }
  });
}
