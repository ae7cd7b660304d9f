// @packetline/net - Node.js socket handles for packetline (Node.js only)
//
// Provides TCP (node:net) and UDP (node:dgram) implementations of
// SocketHandle, and the factory that opens them.

export { TcpSocketHandle, connectTcp } from "./tcp.ts";
export { UdpSocketHandle, connectUdp } from "./udp.ts";
export { ReadQueue } from "./read-queue.ts";
export { settle } from "./settle.ts";
export { nodeSocketFactory } from "./factory.ts";
