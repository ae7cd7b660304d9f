/**
 * Socket handle abstraction.
 *
 * This module defines the seam between the connection manager and the
 * concrete transports, so the loops never touch Node sockets directly.
 *
 * Implementations:
 * - TcpSocketHandle (packetline-net) over node:net
 * - UdpSocketHandle (packetline-net) over node:dgram
 * - MockSocketHandle (packetline-core/testing) in memory
 */

/** Protocol names a caller may ask for. */
export const ProtocolType = {
  Tcp: "tcp",
  Udp: "udp",
  Icmp: "icmp",
  Raw: "raw",
  Sctp: "sctp",
} as const;

export type ProtocolType = (typeof ProtocolType)[keyof typeof ProtocolType];

/** Protocols a connection can actually be opened with. */
export type SupportedProtocol = typeof ProtocolType.Tcp | typeof ProtocolType.Udp;

export function isSupportedProtocol(protocol: string): protocol is SupportedProtocol {
  return protocol === ProtocolType.Tcp || protocol === ProtocolType.Udp;
}

/** Resolved remote address. */
export interface Endpoint {
  /** IPv4 address in dotted form. */
  address: string;
  port: number;
}

/** Options applied to a handle after it connects. */
export interface SocketOptions {
  sendBufferSize: number;
  receiveBufferSize: number;
  /** 0 disables the read/write timeout. */
  ioTimeoutMs: number;
}

/**
 * One connected socket.
 *
 * Reads and writes reject with SocketError. Both stop early when `signal`
 * aborts: a read resolves 0, a write rejects with a "cancelled" error.
 */
export interface SocketHandle {
  readonly protocol: SupportedProtocol;

  /** Whether the socket can still carry data in both directions. */
  readonly connected: boolean;

  /**
   * Hand bytes to the transport. Resolves with how many were accepted,
   * which may be fewer than offered.
   */
  write(bytes: Uint8Array, signal: AbortSignal): Promise<number>;

  /**
   * Wait for one delivery and copy up to `into.length` bytes of it.
   *
   * Resolves 0 for an empty delivery.
   */
  read(into: Uint8Array, signal: AbortSignal): Promise<number>;

  configure(options: Partial<SocketOptions>): void;

  /** Close the socket. Closing an already closed socket resolves. */
  close(): Promise<void>;
}

/** Opens connected socket handles. */
export interface SocketFactory {
  open(protocol: SupportedProtocol, endpoint: Endpoint, signal: AbortSignal): Promise<SocketHandle>;
}

/**
 * A single-connection client.
 *
 * `TMessage` is what `send` accepts: raw buffers for the connection manager,
 * frames for a framing client.
 */
export interface SocketClient<TMessage> {
  connect(address: string, port: number, protocol?: ProtocolType): Promise<boolean>;
  stop(): Promise<void>;
  isConnected(): boolean;
  send(message: TMessage): boolean;
}
