// In-memory transport and diagnostics for tests.

import { SocketError } from "./errors.ts";
import type { Diagnostics } from "./logging.ts";
import type {
  Endpoint,
  SocketFactory,
  SocketHandle,
  SocketOptions,
  SupportedProtocol,
} from "./transport.ts";

type Delivery = Uint8Array | SocketError;

/**
 * Scriptable socket handle.
 *
 * Writes are copied into `writes`. Reads take scripted deliveries in order
 * and wait when there are none.
 */
export class MockSocketHandle implements SocketHandle {
  connected = true;

  /** Copy of the bytes accepted by each write call. */
  readonly writes: Uint8Array[] = [];
  /** Every configure() call, in order. */
  readonly configured: Partial<SocketOptions>[] = [];
  closeCount = 0;

  /** Upper bound on bytes accepted per write call. */
  maxWriteSize = Number.POSITIVE_INFINITY;

  private deliveries: Delivery[] = [];
  private writeFailures: SocketError[] = [];
  private wake: (() => void) | null = null;

  constructor(
    readonly protocol: SupportedProtocol = "tcp",
    readonly endpoint: Endpoint = { address: "127.0.0.1", port: 0 },
  ) {}

  /** Queue bytes for the next read. An empty array is a zero-length read. */
  deliver(bytes: Uint8Array | number[]): void {
    this.deliveries.push(bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes));
    this.notify();
  }

  /** Make the next read reject with `error`. */
  deliverError(error: SocketError): void {
    this.deliveries.push(error);
    this.notify();
  }

  /** Make the next write reject with `error`. */
  failNextWrite(error: SocketError): void {
    this.writeFailures.push(error);
  }

  /** Simulate the peer closing the connection. */
  disconnectRemote(): void {
    this.connected = false;
    this.notify();
  }

  /** All written bytes joined in order. */
  written(): Uint8Array {
    const total = this.writes.reduce((n, w) => n + w.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const w of this.writes) {
      out.set(w, offset);
      offset += w.length;
    }
    return out;
  }

  async write(bytes: Uint8Array, signal: AbortSignal): Promise<number> {
    if (signal.aborted) throw SocketError.cancelled("write");
    if (!this.connected) throw SocketError.closed();

    const failure = this.writeFailures.shift();
    if (failure) throw failure;

    const count = Math.min(bytes.length, this.maxWriteSize);
    this.writes.push(bytes.slice(0, count));
    return count;
  }

  async read(into: Uint8Array, signal: AbortSignal): Promise<number> {
    while (this.deliveries.length === 0) {
      if (signal.aborted) return 0;
      if (!this.connected) throw SocketError.closed();
      await this.waitForDelivery(signal);
    }

    const next = this.deliveries.shift();
    if (next instanceof SocketError) throw next;
    if (!next) return 0;

    const count = Math.min(next.length, into.length);
    into.set(next.subarray(0, count));
    return count;
  }

  configure(options: Partial<SocketOptions>): void {
    this.configured.push({ ...options });
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.connected = false;
    this.notify();
  }

  private waitForDelivery(signal: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        signal.removeEventListener("abort", done);
        this.wake = null;
        resolve();
      };
      this.wake = done;
      signal.addEventListener("abort", done, { once: true });
    });
  }

  private notify(): void {
    this.wake?.();
  }
}

/** Factory handing out MockSocketHandles and recording what was opened. */
export class MockSocketFactory implements SocketFactory {
  readonly opened: Array<{ protocol: SupportedProtocol; endpoint: Endpoint }> = [];
  readonly handles: MockSocketHandle[] = [];

  /** When set, open() rejects with it. */
  failWith: Error | null = null;
  /** When set, open() waits for this promise before completing. */
  gate: Promise<void> | null = null;

  async open(
    protocol: SupportedProtocol,
    endpoint: Endpoint,
    _signal: AbortSignal,
  ): Promise<MockSocketHandle> {
    this.opened.push({ protocol, endpoint });
    if (this.gate) await this.gate;
    if (this.failWith) throw this.failWith;

    const handle = new MockSocketHandle(protocol, endpoint);
    this.handles.push(handle);
    return handle;
  }

  get latest(): MockSocketHandle | undefined {
    return this.handles[this.handles.length - 1];
  }
}

/** Diagnostics that keep every line instead of printing it. */
export interface RecordingDiagnostics extends Diagnostics {
  readonly debugs: string[];
  readonly errors: Array<{ message: string; details: Record<string, unknown> }>;
}

export function recordingDiagnostics(): RecordingDiagnostics {
  const debugs: string[] = [];
  const errors: Array<{ message: string; details: Record<string, unknown> }> = [];
  return {
    debugs,
    errors,
    debug(message: string): void {
      debugs.push(message);
    },
    error(message: string, details: Record<string, unknown> = {}): void {
      errors.push({ message, details });
    },
  };
}
