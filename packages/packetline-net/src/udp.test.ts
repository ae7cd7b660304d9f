// UdpSocketHandle against an in-process node:dgram server on loopback.

import * as dgram from "node:dgram";
import { afterEach, describe, it, expect, vi } from "vitest";
import { connectUdp, UdpSocketHandle } from "./udp.ts";

const sockets: dgram.Socket[] = [];
const handles: UdpSocketHandle[] = [];
const never = new AbortController().signal;

/** Bind a loopback server; `onMessage` gets each datagram and a reply function. */
async function startServer(
  onMessage: (msg: Buffer, reply: (data: Uint8Array) => void) => void,
): Promise<number> {
  const server = dgram.createSocket("udp4");
  server.on("message", (msg, rinfo) => {
    onMessage(msg, (data) => server.send(data, rinfo.port, rinfo.address));
  });
  await new Promise<void>((resolve) => server.bind(0, "127.0.0.1", resolve));
  sockets.push(server);
  return server.address().port;
}

async function open(port: number): Promise<UdpSocketHandle> {
  const handle = await connectUdp({ address: "127.0.0.1", port }, never);
  handles.push(handle);
  return handle;
}

afterEach(async () => {
  await Promise.all(handles.splice(0).map((h) => h.close()));
  await Promise.all(
    sockets.splice(0).map((s) => new Promise<void>((resolve) => s.close(() => resolve()))),
  );
});

describe("connectUdp", () => {
  it("opens a handle connected to the endpoint", async () => {
    const port = await startServer(() => {});

    const handle = await open(port);

    expect(handle.protocol).toBe("udp");
    expect(handle.connected).toBe(true);
    expect(handle.getSocket().remoteAddress()).toEqual({
      address: "127.0.0.1",
      family: "IPv4",
      port,
    });
  });

  it("rejects with cancelled for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      connectUdp({ address: "127.0.0.1", port: 9 }, controller.signal),
    ).rejects.toMatchObject({ kind: "cancelled" });
  });
});

describe("UdpSocketHandle", () => {
  it("sends one datagram per write and reads one per delivery", async () => {
    const port = await startServer((msg, reply) => reply(msg));
    const handle = await open(port);

    await expect(handle.write(new Uint8Array([0, 0, 0, 42, 1, 2]), never)).resolves.toBe(6);
    await expect(handle.write(new Uint8Array([9]), never)).resolves.toBe(1);

    const into = new Uint8Array(64);
    const first = await handle.read(into, never);
    expect([...into.subarray(0, first)]).toEqual([0, 0, 0, 42, 1, 2]);
    const second = await handle.read(into, never);
    expect([...into.subarray(0, second)]).toEqual([9]);
  });

  it("drops datagrams past the receive queue limit", async () => {
    const port = await startServer((_msg, reply) => {
      reply(new Uint8Array(5000).fill(1));
      reply(new Uint8Array(5000).fill(2));
    });
    const handle = await open(port);
    handle.configure({ receiveBufferSize: 8192 });

    await handle.write(new Uint8Array([1]), never);
    await vi.waitFor(() => expect(handle.dropped).toBe(1));

    const into = new Uint8Array(8192);
    const count = await handle.read(into, never);
    expect(count).toBe(5000);
    expect(into[0]).toBe(1);
  });

  it("applies buffer sizes to the socket", async () => {
    const port = await startServer(() => {});
    const handle = await open(port);

    handle.configure({ sendBufferSize: 65536, receiveBufferSize: 65536 });

    expect(handle.getSocket().getSendBufferSize()).toBeGreaterThanOrEqual(65536);
    expect(handle.getSocket().getRecvBufferSize()).toBeGreaterThanOrEqual(65536);
  });

  it("times out a read after ioTimeoutMs", async () => {
    const port = await startServer(() => {});
    const handle = await open(port);
    handle.configure({ ioTimeoutMs: 20 });

    await expect(handle.read(new Uint8Array(8), never)).rejects.toMatchObject({
      kind: "timeout",
    });
  });

  it("reports a refused port once, then keeps waiting for data", async () => {
    const port = await startServer(() => {});
    await Promise.all(
      sockets.splice(0).map((s) => new Promise<void>((resolve) => s.close(() => resolve()))),
    );
    const handle = await open(port);
    handle.configure({ ioTimeoutMs: 100 });

    await handle.write(new Uint8Array([1]), never);

    await expect(handle.read(new Uint8Array(8), never)).rejects.toMatchObject({
      kind: "refused",
    });
    await expect(handle.read(new Uint8Array(8), never)).rejects.toMatchObject({
      kind: "timeout",
    });
    expect(handle.connected).toBe(true);
  });

  it("reports closed after close", async () => {
    const port = await startServer(() => {});
    const handle = await open(port);

    await handle.close();

    expect(handle.connected).toBe(false);
    await expect(handle.write(new Uint8Array([1]), never)).rejects.toMatchObject({
      kind: "closed",
    });
    await expect(handle.read(new Uint8Array(8), never)).rejects.toMatchObject({
      kind: "closed",
    });
  });
});
