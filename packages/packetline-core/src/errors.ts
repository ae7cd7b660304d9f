// Error types for connection setup and socket I/O.
//
// Nothing here is thrown at callers of connect/stop: configuration errors go
// to diagnostics, socket errors go to diagnostics and the socketError event.

/** Transport-level failure classes. */
export type SocketErrorKind =
  | "timeout"
  | "refused"
  | "unreachable"
  | "io"
  | "reset"
  | "closed"
  | "cancelled";

const FATAL_KINDS: ReadonlySet<SocketErrorKind> = new Set(["reset", "closed"]);

const KIND_BY_CODE: Readonly<Record<string, SocketErrorKind>> = {
  ETIMEDOUT: "timeout",
  ECONNREFUSED: "refused",
  EHOSTUNREACH: "unreachable",
  ENETUNREACH: "unreachable",
  EHOSTDOWN: "unreachable",
  ENETDOWN: "unreachable",
  ECONNRESET: "reset",
  ECONNABORTED: "reset",
  EPIPE: "reset",
  ENOTCONN: "closed",
  EBADF: "closed",
  ERR_SOCKET_CLOSED: "closed",
  ERR_STREAM_DESTROYED: "closed",
  ERR_STREAM_WRITE_AFTER_END: "closed",
  ERR_SOCKET_DGRAM_NOT_RUNNING: "closed",
  ERR_SOCKET_DGRAM_NOT_CONNECTED: "closed",
  ABORT_ERR: "cancelled",
};

/** Error raised by a socket read or write. */
export class SocketError extends Error {
  constructor(
    public readonly kind: SocketErrorKind,
    message: string,
    public readonly code?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SocketError";
  }

  /** Whether the socket can no longer be used after this error. */
  get fatal(): boolean {
    return FATAL_KINDS.has(this.kind);
  }

  static timeout(operation: "read" | "write", timeoutMs: number): SocketError {
    return new SocketError("timeout", `${operation} timed out after ${timeoutMs}ms`, "ETIMEDOUT");
  }

  static closed(): SocketError {
    return new SocketError("closed", "socket is closed");
  }

  static cancelled(operation: string): SocketError {
    return new SocketError("cancelled", `${operation} cancelled`);
  }

  /** Classify anything thrown by a Node socket API. */
  static from(error: unknown): SocketError {
    if (error instanceof SocketError) return error;

    if (error instanceof Error) {
      const code = errorCode(error);
      const kind = (code !== undefined ? KIND_BY_CODE[code] : undefined) ?? "io";
      return new SocketError(kind, error.message, code, { cause: error });
    }

    return new SocketError("io", String(error));
  }
}

function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/** Failure classes for connect-time problems. */
export type ConfigurationErrorKind =
  | "unsupported-protocol"
  | "invalid-port"
  | "invalid-timeout"
  | "resolve"
  | "connect"
  | "busy";

/** Error reported when a connection cannot be set up. */
export class ConfigurationError extends Error {
  constructor(
    public readonly kind: ConfigurationErrorKind,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ConfigurationError";
  }

  static unsupportedProtocol(protocol: string): ConfigurationError {
    return new ConfigurationError(
      "unsupported-protocol",
      `${protocol} is an unsupported protocol; only tcp and udp can connect`,
    );
  }

  static invalidPort(port: number): ConfigurationError {
    return new ConfigurationError("invalid-port", `port must be an integer in 0-65535, got ${port}`);
  }

  static invalidTimeout(ms: number): ConfigurationError {
    return new ConfigurationError(
      "invalid-timeout",
      `timeout must be a non-negative integer, got ${ms}`,
    );
  }

  static resolve(address: string, cause?: unknown): ConfigurationError {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    return new ConfigurationError("resolve", `no IPv4 address for ${address}${reason}`, { cause });
  }

  static connect(target: string, cause: unknown): ConfigurationError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ConfigurationError("connect", `failed to connect to ${target}: ${reason}`, {
      cause,
    });
  }

  static busy(state: string): ConfigurationError {
    return new ConfigurationError("busy", `connect called while ${state}; call stop() first`);
  }
}
