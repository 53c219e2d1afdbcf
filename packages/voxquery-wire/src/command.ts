// Command model and wire encoding.
//
// A command is one verb, a set of option flags and a set of parameters.
// A parameter whose value is a sequence pipelines the command: the server
// runs it once per element, with every scalar parameter repeated. Extra
// pipe segments with their own keys and options follow those.

import { escape } from "./escape.ts";

/** A scalar parameter value. Booleans encode as `1`/`0`. */
export type ParamValue = string | number | bigint | boolean;

/** A parameter as accepted by {@link createCommand}. `null`/`undefined` omit the key. */
export type ParamInput = ParamValue | readonly ParamValue[] | null | undefined;

/** Scalar parameters of one extra pipe segment. `null`/`undefined` omit the key. */
export type SegmentParams = Readonly<Record<string, ParamValue | null | undefined>>;

/** An extra pipe segment as accepted by {@link createCommand}. */
export interface SegmentInput {
  params?: SegmentParams;
  options?: Iterable<string>;
}

/** A pipe segment with its own keys and options. */
export interface CommandSegment {
  readonly options: readonly string[];
  readonly params: ReadonlyMap<string, ParamValue>;
}

/** An immutable, fully built command. */
export interface Command {
  readonly verb: string;
  /** Option flags without the leading `-`, in insertion order, no duplicates. */
  readonly options: readonly string[];
  /** Parameters in insertion order; array values are pipelined. */
  readonly params: ReadonlyMap<string, ParamValue | readonly ParamValue[]>;
  /** Segments sent after the ones `params` expands to. */
  readonly pipes: readonly CommandSegment[];
}

const TOKEN = /^[A-Za-z0-9_]+$/;

function checkToken(kind: "verb" | "option" | "parameter key", token: string): void {
  if (!TOKEN.test(token)) {
    throw new TypeError(`invalid ${kind}: ${JSON.stringify(token)}`);
  }
}

function checkScalar(key: string, value: ParamValue): void {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new RangeError(`parameter ${key} is not a finite number: ${value}`);
  }
}

function collectOptions(options: Iterable<string>): string[] {
  const opts: string[] = [];
  for (const option of options) {
    checkToken("option", option);
    if (!opts.includes(option)) opts.push(option);
  }
  return opts;
}

function createSegment(input: SegmentInput): CommandSegment {
  const options = collectOptions(input.options ?? []);
  const params = new Map<string, ParamValue>();
  for (const [key, value] of Object.entries(input.params ?? {})) {
    if (value === null || value === undefined) continue;
    checkToken("parameter key", key);
    checkScalar(key, value);
    params.set(key, value);
  }
  if (options.length === 0 && params.size === 0) {
    throw new RangeError("pipe segment has no parameters or options");
  }
  return Object.freeze({ options: Object.freeze(options), params });
}

/**
 * Build an immutable command.
 *
 * ```typescript
 * createCommand("clientkick", { reasonid: 5, clid: [1, 2, 3] });
 * createCommand("clientlist", {}, ["uid", "away"]);
 * createCommand("servergroupaddperm", { sgid: 1, permsid: "b_serverinstance_info_view", permvalue: 1 }, [], [
 *   { params: { permid: 5, permvalue: 2 } },
 * ]);
 * ```
 */
export function createCommand(
  verb: string,
  params: Readonly<Record<string, ParamInput>> = {},
  options: Iterable<string> = [],
  pipes: Iterable<SegmentInput> = [],
): Command {
  checkToken("verb", verb);
  const opts = collectOptions(options);

  const map = new Map<string, ParamValue | readonly ParamValue[]>();
  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) continue;
    checkToken("parameter key", key);
    if (isSequence(value)) {
      if (value.length === 0) {
        throw new RangeError(`pipelined parameter ${key} has no values`);
      }
      value.forEach((v) => checkScalar(key, v));
      map.set(key, Object.freeze([...value]));
    } else {
      checkScalar(key, value);
      map.set(key, value);
    }
  }

  const segments = Array.from(pipes, createSegment);
  if (segments.length > 0 && map.size === 0 && opts.length === 0) {
    throw new RangeError("pipe segments follow an empty first segment");
  }

  return Object.freeze({
    verb,
    options: Object.freeze(opts),
    params: map,
    pipes: Object.freeze(segments),
  });
}

function isSequence(value: ParamValue | readonly ParamValue[]): value is readonly ParamValue[] {
  return Array.isArray(value);
}

/** Format a scalar for the wire (escaped). */
export function formatValue(value: ParamValue): string {
  if (typeof value === "boolean") return value ? "1" : "0";
  return escape(String(value));
}

/** Length shared by every sequence parameter, 1 when there are none. */
function sequenceLength(command: Command): number {
  let count: number | null = null;
  for (const [key, value] of command.params) {
    if (!isSequence(value)) continue;
    if (count === null) {
      count = value.length;
    } else if (value.length !== count) {
      throw new RangeError(
        `pipelined parameter ${key} has ${value.length} values, expected ${count}`,
      );
    }
  }
  return count ?? 1;
}

/**
 * Number of pipe segments a command expands to.
 *
 * Every sequence parameter must have the same length.
 */
export function segmentCount(command: Command): number {
  return sequenceLength(command) + command.pipes.length;
}

/**
 * Encode a command as one wire line (without the line terminator).
 *
 * `verb -opt1 -opt2 k1=v1 k2=a|k1=v1 k2=b|-opt3 k3=v3|...`
 */
export function encodeCommand(command: Command): string {
  const head = [command.verb, ...command.options.map((o) => `-${o}`)].join(" ");
  const count = sequenceLength(command);

  const segments: string[] = [];
  for (let i = 0; i < count; i++) {
    const parts: string[] = [];
    for (const [key, value] of command.params) {
      const scalar = isSequence(value) ? value[i] : value;
      parts.push(`${key}=${formatValue(scalar)}`);
    }
    segments.push(parts.join(" "));
  }
  for (const pipe of command.pipes) {
    const parts = pipe.options.map((o) => `-${o}`);
    for (const [key, value] of pipe.params) {
      parts.push(`${key}=${formatValue(value)}`);
    }
    segments.push(parts.join(" "));
  }

  const [first, ...rest] = segments;
  const line = first.length > 0 ? `${head} ${first}` : head;
  return rest.length > 0 ? `${line}|${rest.join("|")}` : line;
}
