// Escaping for query-protocol argument values.
//
// Each reserved character maps to a backslash followed by a mnemonic letter.
// Verbs and keys are never escaped; only values pass through here.

/** Reserved characters and the letter that follows the backslash on the wire. */
const ESCAPES: ReadonlyArray<readonly [string, string]> = [
  ["\\", "\\"],
  ["/", "/"],
  [" ", "s"],
  ["|", "p"],
  ["\x07", "a"],
  ["\b", "b"],
  ["\f", "f"],
  ["\n", "n"],
  ["\r", "r"],
  ["\t", "t"],
  ["\v", "v"],
];

const ESCAPE_BY_CHAR = new Map<string, string>(ESCAPES.map(([raw, letter]) => [raw, `\\${letter}`]));
const CHAR_BY_LETTER = new Map<string, string>(ESCAPES.map(([raw, letter]) => [letter, raw]));

const NEEDS_ESCAPE = /[\\/ |\x07\b\f\n\r\t\v]/;

/**
 * Escape a raw value for the wire.
 *
 * ```typescript
 * escape("Hello World"); // "Hello\\sWorld"
 * escape("a|b");         // "a\\pb"
 * ```
 */
export function escape(raw: string): string {
  if (!NEEDS_ESCAPE.test(raw)) return raw;

  let out = "";
  for (const ch of raw) {
    out += ESCAPE_BY_CHAR.get(ch) ?? ch;
  }
  return out;
}

/**
 * Undo wire escaping in a single left-to-right pass.
 *
 * Unknown sequences such as `\x`, and a trailing lone backslash, are kept
 * verbatim.
 */
export function unescape(wire: string): string {
  if (!wire.includes("\\")) return wire;

  let out = "";
  let i = 0;
  while (i < wire.length) {
    const ch = wire[i];
    if (ch !== "\\" || i + 1 >= wire.length) {
      out += ch;
      i += 1;
      continue;
    }

    const decoded = CHAR_BY_LETTER.get(wire[i + 1]);
    if (decoded === undefined) {
      out += ch;
      i += 1;
      continue;
    }

    out += decoded;
    i += 2;
  }
  return out;
}
