import { describe, it, expect } from "vitest";
import { DEFAULT_SOCKET_CONFIG, resolveSocketConfig } from "./config.ts";

describe("resolveSocketConfig", () => {
  it("uses the defaults when nothing is overridden", () => {
    expect(resolveSocketConfig()).toEqual({
      sendBufferSize: 8192,
      receiveBufferSize: 65535,
      readChunkSize: 8192,
      senderPollIntervalMs: 10,
      listenerPollIntervalMs: 1,
      ioTimeoutMs: 30000,
    });
  });

  it("applies overrides and keeps the rest", () => {
    const config = resolveSocketConfig({ readChunkSize: 512, ioTimeoutMs: 0 });
    expect(config.readChunkSize).toBe(512);
    expect(config.ioTimeoutMs).toBe(0);
    expect(config.sendBufferSize).toBe(DEFAULT_SOCKET_CONFIG.sendBufferSize);
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(resolveSocketConfig())).toBe(true);
    expect(Object.isFrozen(DEFAULT_SOCKET_CONFIG)).toBe(true);
  });

  it("rejects non-positive sizes", () => {
    expect(() => resolveSocketConfig({ readChunkSize: 0 })).toThrow(
      "readChunkSize must be a positive integer, got 0",
    );
    expect(() => resolveSocketConfig({ sendBufferSize: 1.5 })).toThrow(RangeError);
  });

  it("rejects negative intervals and timeouts", () => {
    expect(() => resolveSocketConfig({ senderPollIntervalMs: -1 })).toThrow(
      "senderPollIntervalMs must be a non-negative integer, got -1",
    );
    expect(() => resolveSocketConfig({ ioTimeoutMs: -5 })).toThrow(RangeError);
  });

  it("allows zero poll intervals", () => {
    const config = resolveSocketConfig({ senderPollIntervalMs: 0, listenerPollIntervalMs: 0 });
    expect(config.senderPollIntervalMs).toBe(0);
    expect(config.listenerPollIntervalMs).toBe(0);
  });
});
