// @packetline/frame - command-framed packet client
//
// Frames are [int32 BE command][payload] with no length field; see codec.ts
// for the one-delivery-one-frame constraint.

export {
  type Frame,
  type FrameResult,
  type FrameErrorKind,
  FrameError,
  COMMAND_SIZE,
  isCommand,
  encodeFrame,
  decodeFrame,
  tryDecodeFrame,
  copyFrame,
} from "./codec.ts";
export { FrameSocket, type FrameSocketEvents, type FrameSocketOptions } from "./frame-socket.ts";

// Re-export what callers need from core for convenience
export {
  ProtocolType,
  SocketError,
  type ConnectionState,
  type SocketConfig,
  createDiagnostics,
} from "@packetline/core";
