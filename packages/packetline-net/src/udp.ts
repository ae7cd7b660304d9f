// UDP socket handle over node:dgram.
//
// The socket is connected to one endpoint, so each datagram is one delivery
// and each write is one datagram.

import dgram from "node:dgram";
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
 * Connected datagram socket handle.
 *
 * Datagrams arriving while `receiveBufferSize` bytes are already queued are
 * dropped, as the kernel would, and counted in `dropped`.
 */
export class UdpSocketHandle implements SocketHandle {
  readonly protocol = "udp";

  /** Datagrams discarded because the read queue was full. */
  dropped = 0;

  private inbox = new ReadQueue();
  private options: SocketOptions = {
    sendBufferSize: DEFAULT_SOCKET_CONFIG.sendBufferSize,
    receiveBufferSize: DEFAULT_SOCKET_CONFIG.receiveBufferSize,
    ioTimeoutMs: DEFAULT_SOCKET_CONFIG.ioTimeoutMs,
  };
  private closed = false;

  constructor(private readonly socket: dgram.Socket) {
    socket.on("message", (msg: Buffer) => {
      if (this.inbox.size + msg.length > this.options.receiveBufferSize) {
        this.dropped++;
        return;
      }
      this.inbox.push(msg);
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
  getSocket(): dgram.Socket {
    return this.socket;
  }

  get connected(): boolean {
    return !this.closed;
  }

  write(bytes: Uint8Array, signal: AbortSignal): Promise<number> {
    if (this.closed) {
      return Promise.reject(SocketError.closed());
    }

    return settle<number>("write", this.options.ioTimeoutMs, signal, (done) => {
      this.socket.send(bytes, (err) => done(err, bytes.length));
    });
  }

  read(into: Uint8Array, signal: AbortSignal): Promise<number> {
    return this.inbox.read(into, signal, this.options.ioTimeoutMs);
  }

  /**
   * Throws SocketError when the operating system refuses a buffer size.
   */
  configure(options: Partial<SocketOptions>): void {
    this.options = { ...this.options, ...options };

    try {
      if (options.sendBufferSize !== undefined) {
        this.socket.setSendBufferSize(options.sendBufferSize);
      }
      if (options.receiveBufferSize !== undefined) {
        this.socket.setRecvBufferSize(options.receiveBufferSize);
      }
    } catch (error) {
      throw SocketError.from(error);
    }
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();

    return new Promise((resolve) => {
      this.socket.close(() => resolve());
    });
  }
}

/**
 * Create a UDP socket connected to an IPv4 endpoint.
 *
 * Rejects with a SocketError when connecting fails or `signal` aborts.
 */
export function connectUdp(endpoint: Endpoint, signal: AbortSignal): Promise<UdpSocketHandle> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(SocketError.cancelled("connect"));
      return;
    }

    const socket = dgram.createSocket("udp4");

    const cleanup = () => {
      socket.off("error", onError);
      signal.removeEventListener("abort", onAbort);
    };
    const onError = (err: Error) => {
      cleanup();
      socket.close();
      reject(SocketError.from(err));
    };
    const onAbort = () => {
      cleanup();
      socket.close();
      reject(SocketError.cancelled("connect"));
    };

    socket.once("error", onError);
    signal.addEventListener("abort", onAbort, { once: true });

    socket.connect(endpoint.port, endpoint.address, () => {
      cleanup();
      resolve(new UdpSocketHandle(socket));
    });
  });
}
