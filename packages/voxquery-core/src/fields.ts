// Typed access to decoded record fields.
//
// The decoder keeps every value a string; these helpers are for callers
// that need a number or want a missing field to be an error.

import { ParseError, type QueryRecord } from "voxquery-wire";

/** A field as a string, or undefined when absent. A bare key reads as "". */
export function stringField(record: QueryRecord | undefined, key: string): string | undefined {
  const value = record?.[key];
  if (value === undefined) return undefined;
  return value === true ? "" : value;
}

/** A field that must be present. */
export function requireString(record: QueryRecord | undefined, key: string): string {
  const value = stringField(record, key);
  if (value === undefined) {
    throw new ParseError(`missing field ${key}`, "");
  }
  return value;
}

/** A field as an integer, or undefined when absent. */
export function intField(record: QueryRecord | undefined, key: string): number | undefined {
  const value = stringField(record, key);
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value)) {
    throw new ParseError(`field ${key} is not an integer: ${value}`, "");
  }
  return Number(value);
}

/** An integer field that must be present. */
export function requireInt(record: QueryRecord | undefined, key: string): number {
  const value = intField(record, key);
  if (value === undefined) {
    throw new ParseError(`missing field ${key}`, "");
  }
  return value;
}
