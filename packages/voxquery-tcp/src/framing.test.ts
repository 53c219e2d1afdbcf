import { once } from "node:events";
import { describe, expect, it } from "vitest";

import { LineFramed } from "./framing.ts";
import { createDuplexPair } from "./pair.ts";

function framedPair() {
  const [client, server] = createDuplexPair();
  return { io: new LineFramed(client), client, server };
}

describe("LineFramed", () => {
  it("splits on newlines and drops carriage returns", async () => {
    const { io, server } = framedPair();
    server.write("TS3\n\rWelcome to the query interface.\n\r");

    expect(await io.recv()).toBe("TS3");
    expect(await io.recv()).toBe("Welcome to the query interface.");
  });

  it("joins lines split across chunks", async () => {
    const { io, server } = framedPair();
    server.write("clid=1 client_nick");
    server.write("name=Ben\n\r");

    expect(await io.recv()).toBe("clid=1 client_nickname=Ben");
  });

  it("decodes multi-byte characters split across chunks", async () => {
    const { io, server } = framedPair();
    const bytes = Buffer.from("msg=Grüße\n", "utf8");
    server.write(bytes.subarray(0, 7));
    server.write(bytes.subarray(7));

    expect(await io.recv()).toBe("msg=Grüße");
  });

  it("terminates written lines with a newline", async () => {
    const { io, server } = framedPair();
    const received = once(server, "data");

    await io.send("whoami");
    const [chunk] = await received;
    expect(String(chunk)).toBe("whoami\n");
  });

  it("keeps a line that arrives after a timeout for the next call", async () => {
    const { io, server } = framedPair();
    expect(await io.recvTimeout(10)).toBeNull();

    server.write("late\n");
    expect(await io.recvTimeout(1000)).toBe("late");
  });

  it("delivers an unterminated final line, then null", async () => {
    const { io, server } = framedPair();
    server.write("error id=0 msg=ok");
    server.end();

    expect(await io.recv()).toBe("error id=0 msg=ok");
    expect(await io.recv()).toBeNull();
  });

  it("rejects a pending receive on a stream error", async () => {
    const { io, client } = framedPair();
    const pending = expect(io.recv()).rejects.toThrow("connection reset");

    client.destroy(new Error("connection reset"));
    await pending;
    expect(await io.recv()).toBeNull();
  });

  it("refuses to send after close", async () => {
    const { io } = framedPair();
    io.close();
    await expect(io.send("whoami")).rejects.toThrow("stream is closed");
  });
});
