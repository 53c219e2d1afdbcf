// SSH transport for query connections.
//
// The server's SSH query interface runs the query protocol inside a plain
// shell channel (no pty).

import createDebug from "debug";
import { Client, type ClientChannel, type ConnectConfig } from "ssh2";
import {
  ConnectionError,
  QueryConnection,
  type QueryConnectionOptions,
  SERVER_PROFILE,
} from "voxquery-core";
import { LineFramed } from "voxquery-tcp";

const log = createDebug("voxquery:ssh");

/** Options for connecting to the SSH query interface. */
export interface SshConnectOptions extends QueryConnectionOptions {
  host: string;
  /** Default: 10022. */
  port?: number;
  username: string;
  password?: string;
  privateKey?: string | Buffer;
  passphrase?: string;
  /** SSH handshake timeout. Default: 10000. */
  readyTimeout?: number;
  /** Restrict query()/exec() to the server command set. Default: true. */
  validateCommands?: boolean;
}

/** Line framing over a shell channel that also ends the SSH session. */
class SshLineFramed extends LineFramed {
  constructor(
    channel: ClientChannel,
    private readonly client: Client,
  ) {
    super(channel);
  }

  override close(): void {
    super.close();
    this.client.end();
  }
}

function openShell(config: ConnectConfig): Promise<{ client: Client; channel: ClientChannel }> {
  const target = `${config.host}:${config.port}`;

  return new Promise((resolve, reject) => {
    const client = new Client();
    let settled = false;

    const fail = (error: ConnectionError) => {
      if (settled) return;
      settled = true;
      client.end();
      reject(error);
    };

    client.on("ready", () => {
      client.shell(false, (error, channel) => {
        if (error) {
          fail(ConnectionError.connect(`ssh shell on ${target} failed: ${error.message}`, error));
          return;
        }
        if (settled) {
          channel.end();
          return;
        }
        settled = true;
        resolve({ client, channel });
      });
    });

    client.on("error", (error: Error) => {
      if (settled) {
        log("ssh error on %s: %s", target, error.message);
        return;
      }
      fail(ConnectionError.connect(`ssh connect to ${target} failed: ${error.message}`, error));
    });

    client.on("close", () => {
      fail(ConnectionError.connect(`ssh connection to ${target} closed before the shell opened`));
    });

    client.connect(config);
  });
}

/**
 * Connect to the SSH query interface and read its greeting.
 *
 * @example
 * ```typescript
 * const conn = await connectSsh({ host: "localhost", username: "serveradmin", password: pw });
 * await conn.exec("use", { sid: 1 });
 * ```
 */
export async function connectSsh(options: SshConnectOptions): Promise<QueryConnection> {
  const {
    host,
    port,
    username,
    password,
    privateKey,
    passphrase,
    readyTimeout,
    validateCommands,
    ...connectionOptions
  } = options;

  const config: ConnectConfig = {
    host,
    port: port ?? SERVER_PROFILE.sshPort ?? 10022,
    username,
    readyTimeout: readyTimeout ?? 10_000,
  };
  if (password !== undefined) config.password = password;
  if (privateKey !== undefined) {
    config.privateKey = privateKey;
    if (passphrase !== undefined) config.passphrase = passphrase;
  }

  const { client, channel } = await openShell(config);
  return QueryConnection.open(new SshLineFramed(channel, client), {
    greetingLines: SERVER_PROFILE.greetingLines,
    commandSet: (validateCommands ?? true) ? SERVER_PROFILE.commandSet : undefined,
    host,
    ...connectionOptions,
  });
}
