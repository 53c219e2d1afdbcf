import { describe, expect, it } from "vitest";
import { ParseError, decodeRecord } from "voxquery-wire";

import { intField, requireInt, requireString, stringField } from "./fields.ts";
import { CLIENT_PROFILE, SERVER_PROFILE, profileFor } from "./flavor.ts";

describe("record fields", () => {
  const record = decodeRecord("clid=5 client_nickname=Ben\\sJ client_away client_away_message=");

  it("reads strings, bare keys and empty values", () => {
    expect(stringField(record, "client_nickname")).toBe("Ben J");
    expect(stringField(record, "client_away")).toBe("");
    expect(stringField(record, "client_away_message")).toBe("");
    expect(stringField(record, "cid")).toBeUndefined();
    expect(stringField(undefined, "clid")).toBeUndefined();
  });

  it("reads integers", () => {
    expect(intField(record, "clid")).toBe(5);
    expect(intField(record, "cid")).toBeUndefined();
    expect(() => intField(record, "client_nickname")).toThrow(ParseError);
  });

  it("requires fields", () => {
    expect(requireString(record, "client_nickname")).toBe("Ben J");
    expect(requireInt(record, "clid")).toBe(5);
    expect(() => requireString(record, "cid")).toThrow("missing field cid");
    expect(() => requireInt(record, "cid")).toThrow("missing field cid");
  });
});

describe("flavor profiles", () => {
  it("carries ports, greeting length and command sets", () => {
    expect(profileFor("server")).toBe(SERVER_PROFILE);
    expect(SERVER_PROFILE.port).toBe(10011);
    expect(SERVER_PROFILE.sshPort).toBe(10022);
    expect(SERVER_PROFILE.greetingLines).toBe(2);
    expect(SERVER_PROFILE.commandSet.has("ftinitupload")).toBe(true);
    expect(SERVER_PROFILE.commandSet.has("quit")).toBe(true);

    expect(profileFor("client")).toBe(CLIENT_PROFILE);
    expect(CLIENT_PROFILE.port).toBe(25639);
    expect(CLIENT_PROFILE.greetingLines).toBe(4);
    expect(CLIENT_PROFILE.commandSet.has("clientmute")).toBe(true);
    expect(CLIENT_PROFILE.commandSet.has("serverstop")).toBe(false);
  });
});
