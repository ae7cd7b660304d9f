/**
 * Frame codec.
 *
 * Wire format:
 * [4 bytes: command (int32 BE)] [payload bytes]
 *
 * There is no length field. The payload is everything after the command in
 * one raw delivery, so a delivery must carry exactly one frame. Datagram
 * transports guarantee that; over TCP it holds only while each frame
 * arrives as its own read.
 */

import { OutgoingBuffer } from "@packetline/core";

/** Size of the command header in bytes. */
export const COMMAND_SIZE = 4;

const INT32_MIN = -0x8000_0000;
const INT32_MAX = 0x7fff_ffff;

/** One command plus its opaque payload. */
export interface Frame {
  readonly command: number;
  readonly payload: Uint8Array;
}

export type FrameErrorKind = "truncated" | "invalid-command" | "invalid-payload";

export class FrameError extends Error {
  constructor(
    public readonly kind: FrameErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "FrameError";
  }

  static truncated(length: number): FrameError {
    return new FrameError(
      "truncated",
      `delivery of ${length} bytes is shorter than the ${COMMAND_SIZE}-byte command`,
    );
  }

  static invalidCommand(command: number): FrameError {
    return new FrameError("invalid-command", `command ${command} is not a 32-bit signed integer`);
  }

  static invalidPayload(): FrameError {
    return new FrameError("invalid-payload", "payload must be a Uint8Array");
  }
}

/** Whether `value` fits the int32 command field. */
export function isCommand(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

/**
 * Encode a frame into a buffer ready for the send loop.
 *
 * @throws FrameError for a command outside int32 or a non-Uint8Array payload
 */
export function encodeFrame(command: number, payload: Uint8Array): OutgoingBuffer {
  if (!isCommand(command)) throw FrameError.invalidCommand(command);
  if (!(payload instanceof Uint8Array)) throw FrameError.invalidPayload();

  const bytes = new Uint8Array(COMMAND_SIZE + payload.length);
  new DataView(bytes.buffer).setInt32(0, command, false);
  bytes.set(payload, COMMAND_SIZE);
  return new OutgoingBuffer(bytes);
}

/**
 * Decode one raw delivery.
 *
 * The payload is a view into `raw`, not a copy.
 *
 * @throws FrameError when `raw` is shorter than the command
 */
export function decodeFrame(raw: Uint8Array): Frame {
  if (raw.length < COMMAND_SIZE) throw FrameError.truncated(raw.length);

  const view = new DataView(raw.buffer, raw.byteOffset, raw.byteLength);
  return {
    command: view.getInt32(0, false),
    payload: raw.subarray(COMMAND_SIZE),
  };
}

export type FrameResult = { ok: true; frame: Frame } | { ok: false; error: FrameError };

/**
 * Decode one raw delivery without throwing.
 */
export function tryDecodeFrame(raw: Uint8Array): FrameResult {
  if (raw.length < COMMAND_SIZE) {
    return { ok: false, error: FrameError.truncated(raw.length) };
  }
  return { ok: true, frame: decodeFrame(raw) };
}

/** Copy a frame so it outlives the delivery it was decoded from. */
export function copyFrame(frame: Frame): Frame {
  return { command: frame.command, payload: frame.payload.slice() };
}
