import { describe, expect, it } from "vitest";

import { createCommand, encodeCommand, segmentCount } from "./command.ts";

describe("createCommand", () => {
  it("keeps options in insertion order without duplicates", () => {
    const cmd = createCommand("clientlist", {}, ["uid", "away", "uid", "groups"]);
    expect(cmd.options).toEqual(["uid", "away", "groups"]);
  });

  it("omits null and undefined parameters", () => {
    const cmd = createCommand("channelinfo", { cid: 4, cpw: undefined, topic: null });
    expect([...cmd.params.keys()]).toEqual(["cid"]);
  });

  it("is frozen", () => {
    const cmd = createCommand("use", { sid: 1 });
    expect(Object.isFrozen(cmd)).toBe(true);
    expect(Object.isFrozen(cmd.options)).toBe(true);
  });

  it("copies pipelined sequences", () => {
    const clids = [1, 2];
    const cmd = createCommand("clientkick", { clid: clids });
    clids.push(3);
    expect(cmd.params.get("clid")).toEqual([1, 2]);
  });

  it("rejects verbs, options and keys outside the token grammar", () => {
    expect(() => createCommand("client kick")).toThrow(TypeError);
    expect(() => createCommand("clientlist", {}, ["-uid"])).toThrow(TypeError);
    expect(() => createCommand("use", { "s id": 1 })).toThrow(TypeError);
  });

  it("rejects empty sequences and non-finite numbers", () => {
    expect(() => createCommand("clientkick", { clid: [] })).toThrow(RangeError);
    expect(() => createCommand("use", { sid: Number.NaN })).toThrow(RangeError);
  });
});

describe("encodeCommand", () => {
  it("encodes a bare verb", () => {
    expect(encodeCommand(createCommand("whoami"))).toBe("whoami");
  });

  it("puts options after the verb and before parameters", () => {
    const cmd = createCommand("clientdbfind", { pattern: "Ben" }, ["uid"]);
    expect(encodeCommand(cmd)).toBe("clientdbfind -uid pattern=Ben");
  });

  it("escapes values but not keys", () => {
    const cmd = createCommand("sendtextmessage", { targetmode: 2, target: 12, msg: "Hello World!" });
    expect(encodeCommand(cmd)).toBe("sendtextmessage targetmode=2 target=12 msg=Hello\\sWorld!");
  });

  it("encodes booleans as 1/0 and bigints as digits", () => {
    const cmd = createCommand("clientupdate", {
      client_input_muted: true,
      client_output_muted: false,
      client_database_id: 12345678901234567890n,
    });
    expect(encodeCommand(cmd)).toBe(
      "clientupdate client_input_muted=1 client_output_muted=0 client_database_id=12345678901234567890",
    );
  });

  it("pipelines sequence parameters, repeating scalars in every segment", () => {
    const cmd = createCommand("clientkick", { reasonid: 5, clid: [1, 2, 3] });
    expect(encodeCommand(cmd)).toBe(
      "clientkick reasonid=5 clid=1|reasonid=5 clid=2|reasonid=5 clid=3",
    );
  });

  it("zips several sequences of the same length", () => {
    const cmd = createCommand("clientmove", { cid: 7, clid: [3, 4], cpw: ["a b", "c|d"] }, ["continueonerror"]);
    expect(encodeCommand(cmd)).toBe(
      "clientmove -continueonerror cid=7 clid=3 cpw=a\\sb|cid=7 clid=4 cpw=c\\pd",
    );
  });

  it("rejects sequences of different lengths", () => {
    const cmd = createCommand("clientmove", { clid: [3, 4], cpw: ["x"] });
    expect(() => segmentCount(cmd)).toThrow(RangeError);
    expect(() => encodeCommand(cmd)).toThrow(/cpw has 1 values, expected 2/);
  });

  it("is deterministic", () => {
    const cmd = createCommand("servergroupaddclient", { sgid: 6, cldbid: [10, 11] });
    expect(encodeCommand(cmd)).toBe(encodeCommand(cmd));
    expect(segmentCount(cmd)).toBe(2);
  });
});

describe("pipe segments", () => {
  it("gives each segment its own keys", () => {
    const cmd = createCommand("servergroupaddperm", { sgid: 1, permsid: "a", permvalue: 1 }, [], [
      { params: { permid: 5, permvalue: 2 } },
    ]);
    expect(encodeCommand(cmd)).toBe("servergroupaddperm sgid=1 permsid=a permvalue=1|permid=5 permvalue=2");
    expect(segmentCount(cmd)).toBe(2);
  });

  it("puts segment options before segment parameters", () => {
    const cmd = createCommand("clientkick", {}, ["foo"], [{ options: ["bar"] }, { params: { clid: 2 }, options: ["baz"] }]);
    expect(encodeCommand(cmd)).toBe("clientkick -foo|-bar|-baz clid=2");
  });

  it("follows the segments of sequence parameters", () => {
    const cmd = createCommand("clientkick", { reasonid: 5, clid: [1, 2] }, [], [
      { params: { clid: 9, reasonmsg: "bye now" } },
    ]);
    expect(encodeCommand(cmd)).toBe("clientkick reasonid=5 clid=1|reasonid=5 clid=2|clid=9 reasonmsg=bye\\snow");
    expect(segmentCount(cmd)).toBe(3);
  });

  it("omits null keys and rejects empty segments", () => {
    const cmd = createCommand("clientkick", { clid: 1 }, [], [{ params: { clid: 2, reasonmsg: null } }]);
    expect(encodeCommand(cmd)).toBe("clientkick clid=1|clid=2");
    expect(Object.isFrozen(cmd.pipes)).toBe(true);

    expect(() => createCommand("clientkick", { clid: 1 }, [], [{ params: { reasonmsg: undefined } }])).toThrow(RangeError);
    expect(() => createCommand("clientkick", {}, [], [{ params: { clid: 2 } }])).toThrow(
      "pipe segments follow an empty first segment",
    );
    expect(() => createCommand("clientkick", { clid: 1 }, [], [{ params: { "bad key": 2 } }])).toThrow(TypeError);
  });
});
