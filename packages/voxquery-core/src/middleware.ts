// Query middleware types.
//
// Middleware intercepts commands run through QueryConnection.execute(),
// enabling patterns like logging, auditing, and refusing commands.

import type { Command, Response } from "voxquery-wire";

/**
 * Extensions provide type-safe, symbol-keyed storage for middleware state.
 *
 * Each middleware can define a unique symbol and store/retrieve typed data
 * without conflicts with other middleware.
 *
 * @example
 * ```typescript
 * const STARTED = Symbol("started");
 * ctx.extensions.set(STARTED, Date.now());
 * const started = ctx.extensions.get<number>(STARTED);
 * ```
 */
export class Extensions {
  private data = new Map<symbol, unknown>();

  set<T>(key: symbol, value: T): void {
    this.data.set(key, value);
  }

  get<T>(key: symbol): T | undefined {
    return this.data.get(key) as T | undefined;
  }

  has(key: symbol): boolean {
    return this.data.has(key);
  }

  delete(key: symbol): boolean {
    return this.data.delete(key);
  }
}

/**
 * Context passed to middleware hooks.
 *
 * Shared between the pre and post hooks of a single command.
 */
export interface QueryContext {
  extensions: Extensions;
}

/**
 * An outgoing command.
 *
 * Middleware may replace `command` before it is sent; `verb` stays the
 * verb the caller asked for.
 */
export interface QueryRequest {
  readonly verb: string;
  command: Command;
}

/**
 * The outcome of an executed command.
 *
 * A nonzero status still counts as `ok: true`: the server answered.
 */
export type QueryOutcome =
  | { ok: true; response: Response }
  | { ok: false; error: Error };

export type RejectionCode =
  | "permission-denied"
  | "rate-limited"
  | "invalid-request"
  | "internal"
  | string;

/** Returned by a pre hook to refuse a command before it is sent. */
export interface Rejection {
  code: RejectionCode;
  message: string;
}

/** Thrown by execute() when middleware rejects a command. */
export class RejectionError extends Error {
  public readonly code: RejectionCode;

  constructor(rejection: Rejection) {
    super(rejection.message);
    this.name = "RejectionError";
    this.code = rejection.code;
  }

  static from(rejection: Rejection): RejectionError {
    return new RejectionError(rejection);
  }
}

/**
 * Query middleware.
 *
 * @example
 * ```typescript
 * const readOnly: QueryMiddleware = {
 *   pre(ctx, request) {
 *     if (request.verb.startsWith("server")) {
 *       return { code: "permission-denied", message: "read-only session" };
 *     }
 *   },
 * };
 * connection.use(readOnly);
 * ```
 */
export interface QueryMiddleware {
  /**
   * Called before the command is sent.
   *
   * May replace `request.command`, or refuse the command by returning a
   * Rejection.
   */
  pre?(ctx: QueryContext, request: QueryRequest): Promise<Rejection | void> | Rejection | void;

  /**
   * Called after the response arrives or the command fails.
   *
   * Post hooks run in reverse registration order.
   */
  post?(ctx: QueryContext, request: QueryRequest, outcome: QueryOutcome): Promise<void> | void;
}
