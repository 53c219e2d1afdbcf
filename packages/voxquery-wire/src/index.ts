// voxquery-wire - wire codec for the query protocol
//
// Escaping, command encoding, response decoding and line classification.
// Pure functions with no I/O.

export { escape, unescape } from "./escape.ts";

export {
  type ParamValue,
  type ParamInput,
  type Command,
  type CommandSegment,
  type SegmentInput,
  type SegmentParams,
  createCommand,
  encodeCommand,
  formatValue,
  segmentCount,
} from "./command.ts";

export {
  STATUS_KEYWORD,
  Response,
  isStatusLine,
  decodeRecord,
  decodeRecords,
  decodeStatus,
  decodeResponse,
} from "./response.ts";

export {
  DEFAULT_EVENT_PATTERN,
  type LineKind,
  type ClassifyContext,
  classifyLine,
  decodeEvent,
  leadingToken,
} from "./classify.ts";

export { ParseError } from "./errors.ts";

export type { FieldValue, QueryRecord, Status, QueryEvent } from "./types.ts";
