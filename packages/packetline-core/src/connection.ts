// Connection manager: owns the socket, the connection state, and the two
// worker loops.
//
// Lifecycle: disconnected -> connecting -> connected -> disconnected.
// A connect() while connecting or connected is rejected; stop() first.

import type { OutgoingBuffer } from "./buffer.ts";
import { resolveSocketConfig, type SocketConfig } from "./config.ts";
import { ConfigurationError, SocketError } from "./errors.ts";
import { EventHub, type Listener } from "./events.ts";
import { createDiagnostics, describeError, type Diagnostics } from "./logging.ts";
import { BufferPool } from "./pool.ts";
import { OutgoingQueue } from "./queue.ts";
import { runReceiveLoop } from "./receive-loop.ts";
import { resolveIPv4, type Lookup } from "./resolve.ts";
import { runSendLoop } from "./send-loop.ts";
import {
  ProtocolType,
  isSupportedProtocol,
  type SocketClient,
  type SocketFactory,
  type SocketHandle,
} from "./transport.ts";
import type { ConnectionState, WorkerContext } from "./worker.ts";

/** Notifications from a connection. */
export interface ConnectionEvents {
  /** Socket connected and both loops started. Fired once per connection. */
  connected: [];
  /** Receive loop ended. Fired once per connection. */
  disconnected: [];
  /** A read or write failed. */
  socketError: [error: SocketError];
  /** Raw bytes from one read; only valid during the callback. */
  bytesReceived: [bytes: Uint8Array];
}

/** Configuration for a connection manager. */
export interface ConnectionManagerOptions extends Partial<SocketConfig> {
  /** Opens sockets. */
  factory: SocketFactory;
  /** Host lookup. Default: node:dns lookup. */
  lookup?: Lookup;
  /** Where errors are reported. Default: console, namespace "packetline:socket". */
  diagnostics?: Diagnostics;
}

interface Session {
  handle: SocketHandle;
  controller: AbortController;
  sending: Promise<void>;
  receiving: Promise<void>;
}

/**
 * Single-connection socket client moving raw buffers.
 *
 * Failures never reject out of connect() or stop(): they are reported to
 * diagnostics, and socket errors also through the socketError event.
 */
export class ConnectionManager implements SocketClient<OutgoingBuffer> {
  readonly config: Readonly<SocketConfig>;

  private factory: SocketFactory;
  private lookup: Lookup | undefined;
  private diagnostics: Diagnostics;
  private events: EventHub<ConnectionEvents>;
  private queue = new OutgoingQueue();
  private pool = new BufferPool();

  private state: ConnectionState = "disconnected";
  private session: Session | null = null;
  private attempt: AbortController | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: ConnectionManagerOptions) {
    this.config = resolveSocketConfig(options);
    this.factory = options.factory;
    this.lookup = options.lookup;
    this.diagnostics = options.diagnostics ?? createDiagnostics();
    this.events = new EventHub<ConnectionEvents>((error, event) => {
      this.diagnostics.error(`${String(event)} listener threw`, describeError(error));
    });
  }

  /** Get the current connection state. */
  getState(): ConnectionState {
    return this.state;
  }

  /** Number of buffers waiting for the send loop. */
  get pendingSends(): number {
    return this.queue.size;
  }

  isConnected(): boolean {
    return this.state === "connected" && this.session !== null && this.session.handle.connected;
  }

  on<K extends keyof ConnectionEvents>(event: K, listener: Listener<ConnectionEvents[K]>): () => void {
    return this.events.on(event, listener);
  }

  off<K extends keyof ConnectionEvents>(event: K, listener: Listener<ConnectionEvents[K]>): void {
    this.events.off(event, listener);
  }

  /**
   * Resolve `address`, open a socket and start the worker loops.
   *
   * Resolves true once connected (after the connected event), false when the
   * attempt was rejected, failed, or cancelled by stop().
   */
  async connect(
    address: string,
    port: number,
    protocol: ProtocolType = ProtocolType.Tcp,
  ): Promise<boolean> {
    if (this.state !== "disconnected" || this.stopping) {
      this.reportConfigurationError(
        ConfigurationError.busy(this.stopping ? "stopping" : this.state),
      );
      return false;
    }
    if (!isSupportedProtocol(protocol)) {
      this.reportConfigurationError(ConfigurationError.unsupportedProtocol(protocol));
      return false;
    }
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      this.reportConfigurationError(ConfigurationError.invalidPort(port));
      return false;
    }

    const attempt = new AbortController();
    this.attempt = attempt;
    this.setState("connecting");

    let handle: SocketHandle;
    try {
      const ip = await resolveIPv4(address, this.lookup);
      if (attempt.signal.aborted) {
        return this.abandonAttempt(null);
      }
      this.diagnostics.debug("connecting", { address, ip, port, protocol });
      handle = await this.factory.open(protocol, { address: ip, port }, attempt.signal);
    } catch (error) {
      if (attempt.signal.aborted) {
        return this.abandonAttempt(null);
      }
      this.attempt = null;
      this.setState("disconnected");
      this.reportConfigurationError(
        error instanceof ConfigurationError
          ? error
          : ConfigurationError.connect(`${address}:${port}`, error),
      );
      return false;
    }

    if (attempt.signal.aborted) {
      return this.abandonAttempt(handle);
    }
    this.attempt = null;

    try {
      handle.configure({
        sendBufferSize: this.config.sendBufferSize,
        receiveBufferSize: this.config.receiveBufferSize,
        ioTimeoutMs: this.config.ioTimeoutMs,
      });
    } catch (error) {
      this.reportSocketError(SocketError.from(error));
    }

    this.setState("connected");
    this.startWorkers(handle);
    this.events.emit("connected");
    return true;
  }

  /**
   * Discard queued sends, stop both loops, then close the socket.
   *
   * Safe to call at any time and any number of times. While connecting, it
   * cancels the attempt instead.
   */
  stop(): Promise<void> {
    const dropped = this.queue.clear();
    if (dropped > 0) {
      this.diagnostics.debug("discarded queued buffers", { dropped });
    }

    if (this.attempt) {
      this.attempt.abort();
      this.attempt = null;
      this.setState("disconnected");
      this.diagnostics.debug("connect cancelled by stop()");
    }

    if (this.stopping) return this.stopping;

    const session = this.session;
    if (!session) return Promise.resolve();

    this.stopping = this.release(session);
    return this.stopping;
  }

  /**
   * Whether `buffer` may be queued: it must hold bytes and the socket must be
   * connected.
   */
  canSend(buffer: OutgoingBuffer | null | undefined): boolean {
    if (!buffer || buffer.length === 0) return false;
    if (!this.isConnected()) {
      this.diagnostics.error("cannot send: socket is disconnected", { bytes: buffer.length });
      return false;
    }
    return true;
  }

  /** Queue a buffer for the send loop. */
  send(buffer: OutgoingBuffer): boolean {
    if (!this.canSend(buffer)) return false;
    this.queue.push(buffer);
    return true;
  }

  /**
   * Apply a read/write timeout to the connected socket. 0 disables it.
   * An invalid `ms` is reported and ignored.
   */
  setTimeout(ms: number): void {
    if (!Number.isInteger(ms) || ms < 0) {
      this.reportConfigurationError(ConfigurationError.invalidTimeout(ms));
      return;
    }

    const session = this.session;
    if (!session) {
      this.diagnostics.debug("setTimeout ignored: no socket", { ms });
      return;
    }
    try {
      session.handle.configure({ ioTimeoutMs: ms });
    } catch (error) {
      this.reportSocketError(SocketError.from(error));
    }
  }

  private startWorkers(handle: SocketHandle): void {
    const controller = new AbortController();
    const session: Session = {
      handle,
      controller,
      sending: Promise.resolve(),
      receiving: Promise.resolve(),
    };

    const context: WorkerContext = {
      handle,
      config: this.config,
      queue: this.queue,
      pool: this.pool,
      diagnostics: this.diagnostics,
      signal: controller.signal,
      state: () => this.state,
      isConnected: () => this.session === session && this.isConnected(),
      reportError: (error) => this.reportSocketError(error),
      onBytes: (bytes) => this.events.emit("bytesReceived", bytes),
      onSendExit: () => this.handleSendExit(session),
      onReceiveExit: () => this.handleReceiveExit(session),
    };

    this.session = session;
    session.sending = runSendLoop(context);
    session.receiving = runReceiveLoop(context);
  }

  // A send loop that ends while the session is live (fatal write error)
  // ends the receive loop too, which then disconnects and releases.
  private handleSendExit(session: Session): void {
    if (this.session !== session || session.controller.signal.aborted) return;

    this.diagnostics.debug("send loop ended; closing connection");
    session.controller.abort();
  }

  private handleReceiveExit(session: Session): void {
    if (this.session !== session) return;

    this.setState("disconnected");
    this.events.emit("disconnected");

    // Ended without stop() (peer closed, fatal error): tear down the rest
    if (!this.stopping) {
      this.queue.clear();
      this.stopping = this.release(session);
    }
  }

  private async release(session: Session): Promise<void> {
    session.controller.abort();
    await Promise.all([session.sending, session.receiving]);
    await this.closeQuietly(session.handle);

    if (this.session === session) {
      this.session = null;
    }
    this.stopping = null;
    this.setState("disconnected");
    this.diagnostics.debug("socket released");
  }

  // stop() already moved the state on; a newer attempt may own it by now
  private async abandonAttempt(handle: SocketHandle | null): Promise<boolean> {
    if (handle) {
      await this.closeQuietly(handle);
    }
    return false;
  }

  private async closeQuietly(handle: SocketHandle): Promise<void> {
    try {
      await handle.close();
    } catch (error) {
      this.diagnostics.debug("close failed; socket already closed", describeError(error));
    }
  }

  private setState(state: ConnectionState): void {
    if (this.state !== state) {
      this.diagnostics.debug("state", { from: this.state, to: state });
      this.state = state;
    }
  }

  private reportConfigurationError(error: ConfigurationError): void {
    this.diagnostics.error(error.message, describeError(error));
  }

  private reportSocketError(error: SocketError): void {
    this.diagnostics.error(error.message, describeError(error));
    this.events.emit("socketError", error);
  }
}
