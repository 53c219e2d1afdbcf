// voxquery-ssh - SSH transport for query connections (Node.js only)

export { connectSsh, type SshConnectOptions } from "./transport.ts";
