import type { Duplex } from "node:stream";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { connectSsh } from "./transport.ts";

interface MockState {
  configs: unknown[];
  servers: Duplex[];
  ended: number;
  failWith: Error | null;
}

const mock = vi.hoisted((): MockState => ({
  configs: [],
  servers: [],
  ended: 0,
  failWith: null,
}));

vi.mock("ssh2", async () => {
  const { EventEmitter } = await import("node:events");
  const { createDuplexPair } = await import("voxquery-tcp");

  class Client extends EventEmitter {
    connect(config: unknown): this {
      mock.configs.push(config);
      setImmediate(() => {
        if (mock.failWith) this.emit("error", mock.failWith);
        else this.emit("ready");
      });
      return this;
    }

    shell(_window: unknown, callback: (error: Error | undefined, channel: Duplex) => void): this {
      const [channel, server] = createDuplexPair();
      mock.servers.push(server);
      server.write("TS3\n\rWelcome to the query interface.\n\r");
      callback(undefined, channel);
      return this;
    }

    end(): this {
      mock.ended += 1;
      this.emit("close");
      return this;
    }
  }

  return { Client };
});

beforeEach(() => {
  mock.configs = [];
  mock.servers = [];
  mock.ended = 0;
  mock.failWith = null;
});

describe("connectSsh", () => {
  it("runs the query protocol over a shell channel", async () => {
    const conn = await connectSsh({
      host: "query.example.test",
      username: "serveradmin",
      password: "test-secret",
    });

    expect(mock.configs).toEqual([
      {
        host: "query.example.test",
        port: 10022,
        username: "serveradmin",
        password: "test-secret",
        readyTimeout: 10000,
      },
    ]);
    expect(conn.greeting).toEqual(["TS3", "Welcome to the query interface."]);
    expect(conn.host).toBe("query.example.test");

    const server = mock.servers[0];
    server.on("data", (chunk: Buffer) => {
      if (chunk.toString("utf8") === "whoami\n") {
        server.write("virtualserver_id=1 client_id=3\n\rerror id=0 msg=ok\n\r");
      }
    });
    expect(await conn.query("whoami").first()).toEqual({ virtualserver_id: "1", client_id: "3" });

    await conn.close();
    expect(mock.ended).toBe(1);
  });

  it("passes a private key instead of a password", async () => {
    const conn = await connectSsh({
      host: "query.example.test",
      port: 2222,
      username: "serveradmin",
      privateKey: "test-key",
      passphrase: "test-passphrase",
      readyTimeout: 500,
    });

    expect(mock.configs[0]).toEqual({
      host: "query.example.test",
      port: 2222,
      username: "serveradmin",
      privateKey: "test-key",
      passphrase: "test-passphrase",
      readyTimeout: 500,
    });
    await conn.close();
  });

  it("reports an SSH failure as a connect error", async () => {
    mock.failWith = new Error("All configured authentication methods failed");

    await expect(
      connectSsh({ host: "query.example.test", username: "serveradmin", password: "wrong" }),
    ).rejects.toMatchObject({
      name: "ConnectionError",
      kind: "connect",
      message:
        "ssh connect to query.example.test:10022 failed: All configured authentication methods failed",
    });
    expect(mock.ended).toBe(1);
  });
});
