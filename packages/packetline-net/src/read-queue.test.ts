import { describe, it, expect } from "vitest";
import { SocketError } from "@packetline/core";
import { ReadQueue } from "./read-queue.ts";

const never = new AbortController().signal;

function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

async function readAll(queue: ReadQueue, size: number): Promise<number[]> {
  const into = new Uint8Array(size);
  const count = await queue.read(into, never, 0);
  return [...into.subarray(0, count)];
}

describe("ReadQueue", () => {
  it("keeps chunk boundaries", async () => {
    const queue = new ReadQueue();
    queue.push(bytes(1, 2));
    queue.push(bytes(3));

    expect(await readAll(queue, 8)).toEqual([1, 2]);
    expect(await readAll(queue, 8)).toEqual([3]);
    expect(queue.size).toBe(0);
  });

  it("leaves the rest of a chunk for the next read", async () => {
    const queue = new ReadQueue();
    queue.push(bytes(1, 2, 3, 4, 5));

    expect(await readAll(queue, 2)).toEqual([1, 2]);
    expect(queue.size).toBe(3);
    expect(await readAll(queue, 8)).toEqual([3, 4, 5]);
  });

  it("calls onDrain after each read", async () => {
    let drained = 0;
    const queue = new ReadQueue(() => drained++);
    queue.push(bytes(1));
    queue.push(bytes(2));

    await readAll(queue, 8);
    await readAll(queue, 8);

    expect(drained).toBe(2);
  });

  it("wakes a waiting read on push", async () => {
    const queue = new ReadQueue();
    const pending = readAll(queue, 8);

    queue.push(bytes(9, 8));

    expect(await pending).toEqual([9, 8]);
  });

  it("returns 0 for an empty chunk", async () => {
    const queue = new ReadQueue();
    queue.push(bytes());

    expect(await queue.read(new Uint8Array(4), never, 0)).toBe(0);
  });

  it("returns 0 when the signal aborts", async () => {
    const queue = new ReadQueue();
    const controller = new AbortController();
    const pending = queue.read(new Uint8Array(4), controller.signal, 0);

    controller.abort();

    expect(await pending).toBe(0);
  });

  it("times out when nothing arrives", async () => {
    const queue = new ReadQueue();

    await expect(queue.read(new Uint8Array(4), never, 10)).rejects.toMatchObject({
      kind: "timeout",
      message: "read timed out after 10ms",
    });
  });

  it("drains queued chunks after end, then reports closed", async () => {
    const queue = new ReadQueue();
    queue.push(bytes(1));
    queue.end();
    queue.push(bytes(2));

    expect(await readAll(queue, 8)).toEqual([1]);
    await expect(queue.read(new Uint8Array(4), never, 0)).rejects.toMatchObject({
      kind: "closed",
    });
  });

  it("reports the first failure once drained", async () => {
    const queue = new ReadQueue();
    const reset = new SocketError("reset", "read ECONNRESET", "ECONNRESET");
    queue.push(bytes(1));
    queue.fail(reset);
    queue.fail(SocketError.closed());

    expect(await readAll(queue, 8)).toEqual([1]);
    await expect(queue.read(new Uint8Array(4), never, 0)).rejects.toBe(reset);
  });

  it("fails one read for a recoverable error, then waits again", async () => {
    const queue = new ReadQueue();
    const refused = new SocketError("refused", "recv ECONNREFUSED", "ECONNREFUSED");
    queue.fail(refused);

    await expect(queue.read(new Uint8Array(4), never, 0)).rejects.toBe(refused);
    await expect(queue.read(new Uint8Array(4), never, 10)).rejects.toMatchObject({
      kind: "timeout",
    });
  });

  it("keeps a fatal error over later ones", async () => {
    const queue = new ReadQueue();
    const reset = new SocketError("reset", "read ECONNRESET", "ECONNRESET");
    queue.fail(reset);
    queue.fail(new SocketError("refused", "recv ECONNREFUSED", "ECONNREFUSED"));

    await expect(queue.read(new Uint8Array(4), never, 0)).rejects.toBe(reset);
    await expect(queue.read(new Uint8Array(4), never, 0)).rejects.toBe(reset);
  });

  it("wakes a waiting read on end", async () => {
    const queue = new ReadQueue();
    const pending = queue.read(new Uint8Array(4), never, 0);

    queue.end();

    await expect(pending).rejects.toMatchObject({ kind: "closed" });
  });

  it("allows only one pending read", async () => {
    const queue = new ReadQueue();
    const controller = new AbortController();
    const first = queue.read(new Uint8Array(4), controller.signal, 0);

    await expect(queue.read(new Uint8Array(4), controller.signal, 0)).rejects.toThrow(
      "ReadQueue supports a single pending read",
    );

    controller.abort();
    expect(await first).toBe(0);
  });
});
