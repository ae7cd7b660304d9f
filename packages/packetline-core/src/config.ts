// Socket configuration with defaults.

/** Tunables for one connection. Resolved once per client and frozen. */
export interface SocketConfig {
  /** Bytes handed to the transport per write call. Default: 8192 */
  sendBufferSize: number;
  /** Bytes the transport may hold unread before it stops taking more. Default: 65535 */
  receiveBufferSize: number;
  /** Size of each pooled read buffer. Default: 8192 */
  readChunkSize: number;
  /** Send loop idle time between queue drains, in milliseconds. Default: 10 */
  senderPollIntervalMs: number;
  /** Receive loop idle time between reads, in milliseconds. Default: 1 */
  listenerPollIntervalMs: number;
  /** Read and write timeout in milliseconds; 0 disables it. Default: 30000 */
  ioTimeoutMs: number;
}

export const DEFAULT_SOCKET_CONFIG: Readonly<SocketConfig> = Object.freeze({
  sendBufferSize: 8192,
  receiveBufferSize: 65535,
  readChunkSize: 8192,
  senderPollIntervalMs: 10,
  listenerPollIntervalMs: 1,
  ioTimeoutMs: 30000,
});

/**
 * Fill in defaults and validate.
 *
 * Throws RangeError for a size that is not a positive integer, or an
 * interval or timeout that is not a non-negative integer.
 */
export function resolveSocketConfig(overrides: Partial<SocketConfig> = {}): Readonly<SocketConfig> {
  const config: SocketConfig = {
    sendBufferSize: overrides.sendBufferSize ?? DEFAULT_SOCKET_CONFIG.sendBufferSize,
    receiveBufferSize: overrides.receiveBufferSize ?? DEFAULT_SOCKET_CONFIG.receiveBufferSize,
    readChunkSize: overrides.readChunkSize ?? DEFAULT_SOCKET_CONFIG.readChunkSize,
    senderPollIntervalMs:
      overrides.senderPollIntervalMs ?? DEFAULT_SOCKET_CONFIG.senderPollIntervalMs,
    listenerPollIntervalMs:
      overrides.listenerPollIntervalMs ?? DEFAULT_SOCKET_CONFIG.listenerPollIntervalMs,
    ioTimeoutMs: overrides.ioTimeoutMs ?? DEFAULT_SOCKET_CONFIG.ioTimeoutMs,
  };

  assertPositive("sendBufferSize", config.sendBufferSize);
  assertPositive("receiveBufferSize", config.receiveBufferSize);
  assertPositive("readChunkSize", config.readChunkSize);
  assertNonNegative("senderPollIntervalMs", config.senderPollIntervalMs);
  assertNonNegative("listenerPollIntervalMs", config.listenerPollIntervalMs);
  assertNonNegative("ioTimeoutMs", config.ioTimeoutMs);

  return Object.freeze(config);
}

function assertPositive(key: keyof SocketConfig, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${key} must be a positive integer, got ${value}`);
  }
}

function assertNonNegative(key: keyof SocketConfig, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${key} must be a non-negative integer, got ${value}`);
  }
}
