// voxquery-tcp - TCP transport for query connections (Node.js only)
//
// Provides stream I/O: line framing, socket setup, connect.

export { LineFramed } from "./framing.ts";
export { openSocket } from "./socket.ts";
export { connectTcp, type TcpConnectOptions } from "./transport.ts";
export { createDuplexPair } from "./pair.ts";
