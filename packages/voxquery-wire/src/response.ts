// Response block decoding.
//
// A block is zero or more record lines followed by exactly one status line:
//
//   key=value key=value|key=value ...
//   error id=<int> msg=<escaped>

import { unescape } from "./escape.ts";
import { ParseError } from "./errors.ts";
import type { FieldValue, QueryRecord, Status } from "./types.ts";

/** Leading token of every status line. */
export const STATUS_KEYWORD = "error";

/** Check whether a line is a status line. */
export function isStatusLine(line: string): boolean {
  return line === STATUS_KEYWORD || line.startsWith(`${STATUS_KEYWORD} `);
}

/**
 * Decode one record: space-separated `key=value` or bare `key` tokens.
 *
 * Only the first `=` separates key from value, so values may contain `=`.
 */
export function decodeRecord(text: string): QueryRecord {
  // Null prototype: keys such as `__proto__` or `constructor` are plain fields.
  const record: Record<string, FieldValue> = Object.create(null);
  for (const token of text.split(" ")) {
    if (token.length === 0) continue;
    const eq = token.indexOf("=");
    if (eq < 0) {
      record[token] = true;
    } else {
      record[token.slice(0, eq)] = unescape(token.slice(eq + 1));
    }
  }
  return record;
}

/** Decode a `|`-separated list of records. */
export function decodeRecords(text: string): QueryRecord[] {
  return text.split("|").map(decodeRecord);
}

/** Decode a status line into its code, message and extra fields. */
export function decodeStatus(line: string): Status {
  if (!isStatusLine(line)) {
    throw ParseError.missingStatus(line);
  }

  const { id, msg, ...extra } = decodeRecord(line.slice(STATUS_KEYWORD.length));
  if (typeof id !== "string" || !/^\d+$/.test(id)) {
    throw ParseError.malformedStatus(line, "missing or non-numeric id");
  }

  return {
    code: Number(id),
    message: typeof msg === "string" ? msg : "",
    extra,
  };
}

/**
 * A decoded response: its records plus the terminating status.
 *
 * Iterating a response yields its records.
 */
export class Response implements Iterable<QueryRecord> {
  constructor(
    public readonly records: readonly QueryRecord[],
    public readonly status: Status,
    /** The raw lines of the block, status line last. */
    public readonly lines: readonly string[],
  ) {}

  /** Whether the server reported success (status code 0). */
  get ok(): boolean {
    return this.status.code === 0;
  }

  get length(): number {
    return this.records.length;
  }

  /** The first record, or undefined for an empty response. */
  first(): QueryRecord | undefined {
    return this.records[0];
  }

  /** All records in order. */
  all(): readonly QueryRecord[] {
    return this.records;
  }

  /** Record at an index (negative indexes count from the end). */
  at(index: number): QueryRecord | undefined {
    return this.records.at(index);
  }

  [Symbol.iterator](): Iterator<QueryRecord> {
    return this.records[Symbol.iterator]();
  }
}

/**
 * Decode the lines of one response block.
 *
 * @throws ParseError if the block is empty or its last line is not a valid
 * status line.
 */
export function decodeResponse(lines: readonly string[]): Response {
  if (lines.length === 0) {
    throw ParseError.missingStatus("");
  }

  const status = decodeStatus(lines[lines.length - 1]);
  const records: QueryRecord[] = [];
  for (const line of lines.slice(0, -1)) {
    if (line.length === 0) continue;
    records.push(...decodeRecords(line));
  }

  return new Response(records, status, [...lines]);
}
