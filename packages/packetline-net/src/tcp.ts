// TCP socket handle over node:net.
//
// Delivery boundaries are whatever chunks Node hands to "data"; one read
// returns bytes from one chunk.

import net from "node:net";
import {
  DEFAULT_SOCKET_CONFIG,
  SocketError,
  type Endpoint,
  type SocketHandle,
  type SocketOptions,
} from "@packetline/core";
import { ReadQueue } from "./read-queue.ts";
import { settle } from "./settle.ts";

/**
 * Stream socket handle.
 *
 * Each write hands at most `sendBufferSize` bytes to the socket, so larger
 * buffers go out over several writes. Once more than `receiveBufferSize`
 * bytes are queued unread, the socket is paused until reads drain it.
 */
export class TcpSocketHandle implements SocketHandle {
  readonly protocol = "tcp";

  private inbox: ReadQueue;
  private options: SocketOptions = {
    sendBufferSize: DEFAULT_SOCKET_CONFIG.sendBufferSize,
    receiveBufferSize: DEFAULT_SOCKET_CONFIG.receiveBufferSize,
    ioTimeoutMs: DEFAULT_SOCKET_CONFIG.ioTimeoutMs,
  };
  private closed = false;

  constructor(private readonly socket: net.Socket) {
    this.inbox = new ReadQueue(() => this.resumeIfDrained());

    socket.on("data", (chunk: Buffer) => {
      this.inbox.push(chunk);
      if (this.inbox.size >= this.options.receiveBufferSize) {
        socket.pause();
      }
    });

    socket.on("end", () => {
      this.inbox.end();
    });

    socket.on("error", (err: Error) => {
      this.inbox.fail(SocketError.from(err));
    });

    socket.on("close", () => {
      this.closed = true;
      this.inbox.end();
    });
  }

  /** Get the underlying socket. */
  getSocket(): net.Socket {
    return this.socket;
  }

  get connected(): boolean {
    return !this.closed && !this.socket.destroyed && this.socket.readyState === "open";
  }

  write(bytes: Uint8Array, signal: AbortSignal): Promise<number> {
    if (!this.connected) {
      return Promise.reject(SocketError.closed());
    }

    const count = Math.min(bytes.length, this.options.sendBufferSize);
    return settle<number>("write", this.options.ioTimeoutMs, signal, (done) => {
      this.socket.write(bytes.subarray(0, count), (err) => done(err, count));
    });
  }

  read(into: Uint8Array, signal: AbortSignal): Promise<number> {
    return this.inbox.read(into, signal, this.options.ioTimeoutMs);
  }

  configure(options: Partial<SocketOptions>): void {
    this.options = { ...this.options, ...options };
    this.resumeIfDrained();
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();

    return new Promise((resolve) => {
      this.socket.once("close", () => resolve());
      this.socket.destroy();
    });
  }

  private resumeIfDrained(): void {
    if (this.socket.isPaused() && this.inbox.size < this.options.receiveBufferSize) {
      this.socket.resume();
    }
  }
}

/**
 * Open a TCP connection to an IPv4 endpoint.
 *
 * Rejects with a SocketError when the connection fails or `signal` aborts.
 */
export function connectTcp(endpoint: Endpoint, signal: AbortSignal): Promise<TcpSocketHandle> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(SocketError.cancelled("connect"));
      return;
    }

    const socket = net.createConnection({ host: endpoint.address, port: endpoint.port, family: 4 });

    const cleanup = () => {
      socket.off("connect", onConnect);
      socket.off("error", onError);
      signal.removeEventListener("abort", onAbort);
    };
    const onConnect = () => {
      cleanup();
      resolve(new TcpSocketHandle(socket));
    };
    const onError = (err: Error) => {
      cleanup();
      socket.destroy();
      reject(SocketError.from(err));
    };
    const onAbort = () => {
      cleanup();
      socket.destroy();
      reject(SocketError.cancelled("connect"));
    };

    socket.once("connect", onConnect);
    socket.once("error", onError);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
