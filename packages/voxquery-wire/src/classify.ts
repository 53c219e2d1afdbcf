// Line classification and event decoding.
//
// The protocol has no framing header: a line is told apart only by its
// leading token and by whether a command reply is being assembled.

import { ParseError } from "./errors.ts";
import { decodeRecords, isStatusLine } from "./response.ts";
import type { QueryEvent } from "./types.ts";

/** Default grammar for event names (matched against the leading token). */
export const DEFAULT_EVENT_PATTERN = /^notify\w*$/;

/** What a received line is. */
export type LineKind = "status" | "event" | "data";

export interface ClassifyContext {
  /** Whether at least one command is still waiting for its reply. */
  awaitingReply: boolean;
  /** Event-name grammar. Defaults to {@link DEFAULT_EVENT_PATTERN}. */
  eventPattern?: RegExp;
}

/** Leading token of a line (everything before the first space). */
export function leadingToken(line: string): string {
  const space = line.indexOf(" ");
  return space < 0 ? line : line.slice(0, space);
}

/**
 * Classify a received line.
 *
 * - a status line terminates the reply being assembled
 * - a line whose leading token matches the event grammar is an event, even
 *   in the middle of a reply
 * - any other line is an event when no reply is awaited, else reply data
 */
export function classifyLine(line: string, ctx: ClassifyContext): LineKind {
  if (isStatusLine(line)) return "status";
  const pattern = ctx.eventPattern ?? DEFAULT_EVENT_PATTERN;
  if (pattern.test(leadingToken(line))) return "event";
  return ctx.awaitingReply ? "data" : "event";
}

/**
 * Decode an event line: `<name> key=value ...|key=value ...`.
 *
 * @throws ParseError if the line has no name.
 */
export function decodeEvent(line: string): QueryEvent {
  const name = leadingToken(line);
  if (name.length === 0 || name.includes("=")) {
    throw ParseError.malformedEvent(line);
  }

  const body = line.slice(name.length).trim();
  const records = body.length > 0 ? decodeRecords(body) : [];
  return {
    name,
    data: records[0] ?? {},
    records,
    raw: line,
  };
}
