// FrameSocket over the in-memory transport.

import { describe, it, expect, vi } from "vitest";
import { SocketError } from "@packetline/core";
import { MockSocketFactory, recordingDiagnostics } from "@packetline/core/testing";
import { FrameSocket } from "./frame-socket.ts";

function setup() {
  const factory = new MockSocketFactory();
  const diagnostics = recordingDiagnostics();
  const socket = new FrameSocket({
    factory,
    diagnostics,
    lookup: async () => [{ address: "127.0.0.1", family: 4 }],
    senderPollIntervalMs: 1,
    listenerPollIntervalMs: 1,
  });
  const packets: Array<[number, number[]]> = [];
  socket.on("packetReceived", (command, payload) => packets.push([command, [...payload]]));
  return { factory, diagnostics, socket, packets };
}

describe("FrameSocket", () => {
  it("frames outgoing messages", async () => {
    const { factory, socket } = setup();
    await socket.connect("localhost", 9000);

    expect(socket.sendMessage(42, new Uint8Array([1, 2]))).toBe(true);
    expect(socket.send({ command: -1, payload: new Uint8Array() })).toBe(true);
    await vi.waitFor(() => expect(factory.latest?.writes).toHaveLength(2));

    expect([...(factory.latest?.written() ?? [])]).toEqual([
      0, 0, 0, 42, 1, 2, 0xff, 0xff, 0xff, 0xff,
    ]);
    await socket.stop();
  });

  it("emits one packet per delivery", async () => {
    const { factory, socket, packets } = setup();
    await socket.connect("localhost", 9000);

    factory.latest?.deliver([0, 0, 0, 7, 5, 6]);
    factory.latest?.deliver([0xff, 0xff, 0xff, 0xfe]);
    await vi.waitFor(() => expect(packets).toHaveLength(2));

    expect(packets).toEqual([
      [7, [5, 6]],
      [-2, []],
    ]);
    await socket.stop();
  });

  it("drops a short delivery and keeps the connection", async () => {
    const { factory, diagnostics, socket, packets } = setup();
    await socket.connect("localhost", 9000);

    factory.latest?.deliver([1, 2]);
    factory.latest?.deliver([0, 0, 0, 1]);
    await vi.waitFor(() => expect(packets).toHaveLength(1));

    expect(packets).toEqual([[1, []]]);
    expect(diagnostics.errors).toEqual([
      {
        message: "delivery of 2 bytes is shorter than the 4-byte command",
        details: {
          name: "FrameError",
          message: "delivery of 2 bytes is shorter than the 4-byte command",
          kind: "truncated",
        },
      },
    ]);
    expect(socket.isConnected()).toBe(true);
    await socket.stop();
  });

  it("ignores a zero-length read", async () => {
    const { factory, diagnostics, socket, packets } = setup();
    await socket.connect("localhost", 9000);

    factory.latest?.deliver([]);
    factory.latest?.deliver([0, 0, 0, 2]);
    await vi.waitFor(() => expect(packets).toHaveLength(1));

    expect(packets).toEqual([[2, []]]);
    expect(diagnostics.errors).toEqual([]);
    await socket.stop();
  });

  it("refuses a command outside int32", async () => {
    const { factory, diagnostics, socket } = setup();
    await socket.connect("localhost", 9000);

    expect(socket.sendMessage(0x8000_0000, new Uint8Array([1]))).toBe(false);

    expect(diagnostics.errors).toEqual([
      { message: "invalid frame; not sent", details: { command: 2147483648 } },
    ]);
    expect(factory.latest?.writes).toEqual([]);
    await socket.stop();
  });

  it("refuses to send while disconnected", () => {
    const { diagnostics, socket } = setup();

    expect(socket.sendMessage(42, new Uint8Array([1, 2]))).toBe(false);

    expect(diagnostics.errors).toEqual([
      { message: "cannot send: socket is disconnected", details: { bytes: 6 } },
    ]);
  });

  it("forwards connection events", async () => {
    const { factory, socket } = setup();
    const events: string[] = [];
    socket.on("connected", () => events.push("connected"));
    socket.on("disconnected", () => events.push("disconnected"));

    await socket.connect("localhost", 9000);
    factory.latest?.disconnectRemote();
    await vi.waitFor(() => expect(events).toEqual(["connected", "disconnected"]));

    expect(socket.getState()).toBe("disconnected");
    await socket.stop();
  });

  it("forwards socket errors", async () => {
    const { factory, socket } = setup();
    const kinds: string[] = [];
    socket.on("socketError", (error) => kinds.push(error.kind));
    await socket.connect("localhost", 9000);

    factory.latest?.deliverError(new SocketError("io", "EIO"));
    await vi.waitFor(() => expect(kinds).toEqual(["io"]));

    await socket.stop();
  });

  it("stops listening after off", async () => {
    const { factory, socket, packets } = setup();
    const seen: number[] = [];
    const listener = (command: number) => seen.push(command);
    socket.on("packetReceived", listener);
    await socket.connect("localhost", 9000);

    socket.off("packetReceived", listener);
    factory.latest?.deliver([0, 0, 0, 3]);
    await vi.waitFor(() => expect(packets).toHaveLength(1));

    expect(seen).toEqual([]);
    await socket.stop();
  });
});
