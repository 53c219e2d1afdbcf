// Decoded shapes shared by responses and events.

/**
 * A decoded field value.
 *
 * `key=value` decodes to the unescaped string (`key=` to `""`), a bare `key`
 * to `true`. Numeric-looking values stay strings.
 */
export type FieldValue = string | true;

/** One key/value group of a response or event. Keys that were not sent are absent. */
export type QueryRecord = Readonly<Record<string, FieldValue>>;

/** The status line that terminates every response block. */
export interface Status {
  /** Server error id; 0 means success. */
  readonly code: number;
  /** Unescaped human-readable message. */
  readonly message: string;
  /** Any further fields, e.g. `failed_permid` or `extra_msg`. */
  readonly extra: QueryRecord;
}

/** An unsolicited notification. */
export interface QueryEvent {
  /** Event name, the leading token of the line (e.g. `notifycliententerview`). */
  readonly name: string;
  /** The first record of the body (empty when the body is empty). */
  readonly data: QueryRecord;
  /** Every record of the body, split on `|`. */
  readonly records: readonly QueryRecord[];
  /** The line as received. */
  readonly raw: string;
}
