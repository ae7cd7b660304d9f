// Default socket factory for Node.js.

import type { Endpoint, SocketFactory, SocketHandle, SupportedProtocol } from "@packetline/core";
import { connectTcp } from "./tcp.ts";
import { connectUdp } from "./udp.ts";

/** Opens TCP sockets with node:net and UDP sockets with node:dgram. */
export const nodeSocketFactory: SocketFactory = {
  open(protocol: SupportedProtocol, endpoint: Endpoint, signal: AbortSignal): Promise<SocketHandle> {
    return protocol === "tcp" ? connectTcp(endpoint, signal) : connectUdp(endpoint, signal);
  },
};
