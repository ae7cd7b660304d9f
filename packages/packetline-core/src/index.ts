// @packetline/core - connection manager and worker loops for packetline
//
// Transport-agnostic: concrete sockets come from a SocketFactory
// (see @packetline/net).

export { OutgoingBuffer } from "./buffer.ts";
export { OutgoingQueue } from "./queue.ts";
export { BufferPool } from "./pool.ts";

export { type SocketConfig, DEFAULT_SOCKET_CONFIG, resolveSocketConfig } from "./config.ts";

export {
  SocketError,
  type SocketErrorKind,
  ConfigurationError,
  type ConfigurationErrorKind,
} from "./errors.ts";

export {
  type Diagnostics,
  type DiagnosticsOptions,
  createDiagnostics,
  describeError,
  isEnabled,
} from "./logging.ts";

export { EventHub, type EventMap, type Listener } from "./events.ts";

export {
  ProtocolType,
  type SupportedProtocol,
  isSupportedProtocol,
  type Endpoint,
  type SocketOptions,
  type SocketHandle,
  type SocketFactory,
  type SocketClient,
} from "./transport.ts";

export {
  type AddressCandidate,
  type Lookup,
  dnsLookup,
  selectIPv4,
  resolveIPv4,
} from "./resolve.ts";

export { type ConnectionState, type WorkerContext, idle } from "./worker.ts";
export { runSendLoop, writeFully } from "./send-loop.ts";
export { runReceiveLoop } from "./receive-loop.ts";

export {
  ConnectionManager,
  type ConnectionEvents,
  type ConnectionManagerOptions,
} from "./connection.ts";
