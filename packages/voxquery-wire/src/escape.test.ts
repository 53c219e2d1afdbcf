import { describe, expect, it } from "vitest";

import { escape, unescape } from "./escape.ts";

describe("escape", () => {
  it("encodes every reserved character with its mnemonic", () => {
    expect(escape("\\")).toBe("\\\\");
    expect(escape("/")).toBe("\\/");
    expect(escape(" ")).toBe("\\s");
    expect(escape("|")).toBe("\\p");
    expect(escape("\x07")).toBe("\\a");
    expect(escape("\b")).toBe("\\b");
    expect(escape("\f")).toBe("\\f");
    expect(escape("\n")).toBe("\\n");
    expect(escape("\r")).toBe("\\r");
    expect(escape("\t")).toBe("\\t");
    expect(escape("\v")).toBe("\\v");
  });

  it("leaves everything else untouched", () => {
    expect(escape("plain_value-1.2=ok")).toBe("plain_value-1.2=ok");
    expect(escape("Grüße ]|[ 🎉")).toBe("Grüße\\s]\\p[\\s🎉");
  });

  it("escapes a backslash before the letter that follows it", () => {
    expect(escape("\\s")).toBe("\\\\s");
  });
});

describe("unescape", () => {
  it("decodes known sequences", () => {
    expect(unescape("invalid\\sclientid")).toBe("invalid clientid");
    expect(unescape("a\\pb\\/c\\\\d")).toBe("a|b/c\\d");
    expect(unescape("line\\nbreak\\ttab")).toBe("line\nbreak\ttab");
  });

  it("decodes in one pass", () => {
    // "\\\\s" is an escaped backslash followed by a literal "s", not a space.
    expect(unescape("\\\\s")).toBe("\\s");
  });

  it("keeps unknown sequences and a trailing backslash verbatim", () => {
    expect(unescape("a\\xb")).toBe("a\\xb");
    expect(unescape("end\\")).toBe("end\\");
  });
});

describe("round trip", () => {
  const samples = [
    "",
    "Hello World",
    "TeamRoom ]|[ Server",
    "path/to/file.png",
    "\\s\\p\\\\",
    "tabs\tand\nnewlines\r\n",
    "\x07\b\f\v",
    "emoji 🎉 and ümlauts",
    "a\\xb\\",
  ];

  it.each(samples)("unescape(escape(%j)) is the identity", (raw) => {
    expect(unescape(escape(raw))).toBe(raw);
  });

  it("holds for every ASCII character", () => {
    let all = "";
    for (let code = 0; code < 128; code++) all += String.fromCharCode(code);
    expect(unescape(escape(all))).toBe(all);
  });
});
