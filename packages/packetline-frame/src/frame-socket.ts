// Frame socket: command-framed packets over a connection manager.

import {
  ConnectionManager,
  EventHub,
  ProtocolType,
  createDiagnostics,
  describeError,
  type ConnectionManagerOptions,
  type ConnectionState,
  type Diagnostics,
  type Listener,
  type SocketClient,
  type SocketError,
  type SocketFactory,
} from "@packetline/core";
import { nodeSocketFactory } from "@packetline/net";
import { encodeFrame, isCommand, tryDecodeFrame, type Frame } from "./codec.ts";

/** Notifications from a frame socket. */
export interface FrameSocketEvents {
  connected: [];
  disconnected: [];
  socketError: [error: SocketError];
  /** One decoded frame. `payload` is only valid during the callback. */
  packetReceived: [command: number, payload: Uint8Array];
}

/** Configuration for a frame socket. */
export interface FrameSocketOptions extends Omit<ConnectionManagerOptions, "factory"> {
  /** Opens sockets. Default: node:net for TCP, node:dgram for UDP. */
  factory?: SocketFactory;
}

/**
 * Client sending and receiving `[int32 command][payload]` frames.
 *
 * @example
 * ```typescript
 * const socket = new FrameSocket();
 * socket.on("packetReceived", (command, payload) => {
 *   console.log(command, copyFrame({ command, payload }).payload);
 * });
 * if (await socket.connect("127.0.0.1", 9000, ProtocolType.Tcp)) {
 *   socket.sendMessage(42, new Uint8Array([0x01, 0x02]));
 * }
 * ```
 */
export class FrameSocket implements SocketClient<Frame> {
  private connection: ConnectionManager;
  private diagnostics: Diagnostics;
  private events: EventHub<FrameSocketEvents>;

  constructor(options: FrameSocketOptions = {}) {
    this.diagnostics = options.diagnostics ?? createDiagnostics({ namespace: "packetline:frame" });
    this.connection = new ConnectionManager({
      ...options,
      factory: options.factory ?? nodeSocketFactory,
      diagnostics: this.diagnostics,
    });
    this.events = new EventHub<FrameSocketEvents>((error, event) => {
      this.diagnostics.error(`${String(event)} listener threw`, describeError(error));
    });

    this.connection.on("connected", () => this.events.emit("connected"));
    this.connection.on("disconnected", () => this.events.emit("disconnected"));
    this.connection.on("socketError", (error) => this.events.emit("socketError", error));
    this.connection.on("bytesReceived", (raw) => this.handleBytes(raw));
  }

  getState(): ConnectionState {
    return this.connection.getState();
  }

  isConnected(): boolean {
    return this.connection.isConnected();
  }

  on<K extends keyof FrameSocketEvents>(event: K, listener: Listener<FrameSocketEvents[K]>): () => void {
    return this.events.on(event, listener);
  }

  off<K extends keyof FrameSocketEvents>(event: K, listener: Listener<FrameSocketEvents[K]>): void {
    this.events.off(event, listener);
  }

  connect(address: string, port: number, protocol: ProtocolType = ProtocolType.Tcp): Promise<boolean> {
    return this.connection.connect(address, port, protocol);
  }

  stop(): Promise<void> {
    return this.connection.stop();
  }

  /** Read/write timeout for the connected socket, in milliseconds. */
  setTimeout(ms: number): void {
    this.connection.setTimeout(ms);
  }

  send(frame: Frame): boolean {
    return this.sendMessage(frame.command, frame.payload);
  }

  /**
   * Queue one frame. Returns false when not connected or when the command
   * or payload cannot be encoded.
   */
  sendMessage(command: number, payload: Uint8Array): boolean {
    if (!isCommand(command) || !(payload instanceof Uint8Array)) {
      this.diagnostics.error("invalid frame; not sent", { command });
      return false;
    }
    return this.connection.send(encodeFrame(command, payload));
  }

  private handleBytes(raw: Uint8Array): void {
    if (raw.length === 0) return;

    const result = tryDecodeFrame(raw);
    if (!result.ok) {
      this.diagnostics.error(result.error.message, describeError(result.error));
      return;
    }
    this.events.emit("packetReceived", result.frame.command, result.frame.payload);
  }
}
