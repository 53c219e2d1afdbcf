// TCP transport for query connections.

import {
  type Flavor,
  QueryConnection,
  type QueryConnectionOptions,
  profileFor,
} from "voxquery-core";

import { LineFramed } from "./framing.ts";
import { openSocket } from "./socket.ts";

/** Options for connecting to a query service over TCP. */
export interface TcpConnectOptions extends QueryConnectionOptions {
  host: string;
  /** Defaults to the flavor's query port. */
  port?: number;
  /** Which query service to expect. Default: "server". */
  flavor?: Flavor;
  /** Default: 10000. */
  connectTimeoutMs?: number;
  /** Restrict query()/exec() to the flavor's command set. Default: true. */
  validateCommands?: boolean;
}

/**
 * Connect to a query service and read its greeting.
 *
 * @example
 * ```typescript
 * const conn = await connectTcp({ host: "localhost" });
 * await conn.exec("login", { client_login_name: "serveradmin", client_login_password: pw });
 * await conn.exec("use", { sid: 1 });
 * ```
 */
export async function connectTcp(options: TcpConnectOptions): Promise<QueryConnection> {
  const { host, port, flavor, connectTimeoutMs, validateCommands, ...connectionOptions } = options;
  const profile = profileFor(flavor ?? "server");

  const socket = await openSocket(host, port ?? profile.port, connectTimeoutMs ?? 10000);
  socket.setNoDelay(true);

  return QueryConnection.open(new LineFramed(socket), {
    greetingLines: profile.greetingLines,
    commandSet: (validateCommands ?? true) ? profile.commandSet : undefined,
    host,
    ...connectionOptions,
  });
}
