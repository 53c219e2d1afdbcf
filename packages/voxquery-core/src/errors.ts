// Error taxonomy for query connections.
//
// Transport and parse failures end the connection. Timeouts and command
// errors are local to one call and leave the connection usable.

import type { Response, Status } from "voxquery-wire";

/** Transport-level failure. Fatal to the connection it occurs on. */
export class ConnectionError extends Error {
  constructor(
    public kind: "io" | "closed" | "connect",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  /** A read or write on the stream failed. */
  static io(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("io", message, { cause });
  }

  /** The connection was closed, locally or by the peer. */
  static closed(message = "connection closed"): ConnectionError {
    return new ConnectionError("closed", message);
  }

  /** A stream could not be established (connect, greeting, data connection). */
  static connect(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("connect", message, { cause });
  }
}

/** Which wait expired. */
export type TimeoutOperation = "receive" | "event" | "execute" | "greeting" | "transfer";

/** A wait expired. The caller may retry it. */
export class TimeoutError extends Error {
  constructor(
    public readonly operation: TimeoutOperation,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * The server answered with a nonzero status.
 *
 * Responses carry this as data; only convenience layers throw it.
 */
export class CommandError extends Error {
  readonly code: number;

  constructor(
    public readonly status: Status,
    public readonly response: Response | null = null,
  ) {
    super(`error id ${status.code}: ${status.message}`);
    this.name = "CommandError";
    this.code = status.code;
  }

  static fromResponse(response: Response): CommandError {
    return new CommandError(response.status, response);
  }
}

/** A verb outside the connection's command set. */
export class UnknownCommandError extends TypeError {
  constructor(public readonly verb: string) {
    super(`unknown command: ${verb}`);
    this.name = "UnknownCommandError";
  }
}
