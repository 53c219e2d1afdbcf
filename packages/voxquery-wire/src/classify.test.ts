import { describe, expect, it } from "vitest";

import { classifyLine, decodeEvent, leadingToken } from "./classify.ts";
import { ParseError } from "./errors.ts";

describe("classifyLine", () => {
  it("recognizes status lines regardless of state", () => {
    expect(classifyLine("error id=0 msg=ok", { awaitingReply: true })).toBe("status");
    expect(classifyLine("error id=0 msg=ok", { awaitingReply: false })).toBe("status");
  });

  it("routes notify lines as events even while a reply is assembled", () => {
    const line = "notifycliententerview cfid=0 ctid=1 clid=5 client_nickname=Ben";
    expect(classifyLine(line, { awaitingReply: true })).toBe("event");
  });

  it("treats other lines as reply data only while a reply is awaited", () => {
    expect(classifyLine("clid=5 cid=1", { awaitingReply: true })).toBe("data");
    expect(classifyLine("selected schandlerid=1", { awaitingReply: false })).toBe("event");
  });

  it("accepts a custom event grammar", () => {
    const ctx = { awaitingReply: true, eventPattern: /^(notify\w*|selected)$/ };
    expect(classifyLine("selected schandlerid=2", ctx)).toBe("event");
    expect(classifyLine("schandlerid=2", ctx)).toBe("data");
  });
});

describe("leadingToken", () => {
  it("returns the text before the first space", () => {
    expect(leadingToken("notifytextmessage targetmode=1")).toBe("notifytextmessage");
    expect(leadingToken("notifyserveredited")).toBe("notifyserveredited");
  });
});

describe("decodeEvent", () => {
  it("splits the name from a record body", () => {
    const event = decodeEvent(
      "notifytextmessage targetmode=1 msg=Hi\\sthere invokerid=7 invokername=Ben",
    );
    expect(event.name).toBe("notifytextmessage");
    expect(event.data).toEqual({
      targetmode: "1",
      msg: "Hi there",
      invokerid: "7",
      invokername: "Ben",
    });
    expect(event.records).toHaveLength(1);
    expect(event.raw).toBe(
      "notifytextmessage targetmode=1 msg=Hi\\sthere invokerid=7 invokername=Ben",
    );
  });

  it("decodes multi-record bodies", () => {
    const event = decodeEvent("notifyclientmoved ctid=3 reasonid=0 clid=5|clid=6");
    expect(event.data).toEqual({ ctid: "3", reasonid: "0", clid: "5" });
    expect(event.records[1]).toEqual({ clid: "6" });
  });

  it("allows an empty body", () => {
    const event = decodeEvent("notifyserveredited");
    expect(event.data).toEqual({});
    expect(event.records).toEqual([]);
  });

  it("rejects lines without a name", () => {
    expect(() => decodeEvent("clid=5 cid=1")).toThrow(ParseError);
    expect(() => decodeEvent(" clid=5")).toThrow(/event line has no name/);
  });
});
