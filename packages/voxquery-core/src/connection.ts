// Query connection state machine and receive loop.
//
// One background loop reads lines from the transport and routes each one:
// reply lines accumulate on the oldest outstanding command until its status
// line arrives, event lines go to the event queue. Replies are matched to
// commands strictly in the order the commands were sent.
//
// Generic over LineTransport:
// - LineFramed (voxquery-tcp) for TCP sockets and SSH channels
// - MemoryTransport for tests

import createDebug from "debug";
import {
  DEFAULT_EVENT_PATTERN,
  ParseError,
  type Command,
  type ParamInput,
  type QueryEvent,
  type Response,
  classifyLine,
  createCommand,
  decodeEvent,
  decodeResponse,
  encodeCommand,
} from "voxquery-wire";

import { TransferIdAllocator } from "./allocator.ts";
import { ConnectionError, TimeoutError, UnknownCommandError } from "./errors.ts";
import {
  Extensions,
  RejectionError,
  type QueryContext,
  type QueryMiddleware,
  type QueryOutcome,
  type QueryRequest,
} from "./middleware.ts";
import { QueryBuilder } from "./query_builder.ts";
import type { LineTransport } from "./transport.ts";
import { WaitQueue } from "./wait_queue.ts";

const log = createDebug("voxquery:connection");

export type ConnectionState = "disconnected" | "connected" | "closing";

export interface QueryConnectionOptions {
  /** Non-empty lines the service sends before accepting commands. Default: 2. */
  greetingLines?: number;
  /** How long to wait for the greeting. Default: 5000. */
  greetingTimeoutMs?: number;
  /** Timeout for receive() and execute() when none is given. Default: 30000. */
  defaultTimeoutMs?: number;
  /** Event-name grammar, matched against a line's leading token. */
  eventPattern?: RegExp;
  /** Command sent by sendKeepalive(). Default: "whoami". */
  keepaliveCommand?: string;
  /** Send a keepalive this often. Default: 0 (off). */
  keepaliveIntervalMs?: number;
  /** Verbs accepted by query()/exec(). Default: no validation. */
  commandSet?: ReadonlySet<string>;
  /** Host the transport is connected to, for callers that open more connections. */
  host?: string;
  /** Send `quit` before closing the transport. Default: true. */
  quitOnClose?: boolean;
}

export interface SendOptions {
  /**
   * Drop the reply instead of queueing it for receive().
   *
   * The command still counts as outstanding, so the stream stays in sync.
   */
  discardResponse?: boolean;
}

export interface ExecuteOptions {
  timeoutMs?: number;
}

type ReplyMode = "queued" | "discard" | "direct";

interface Outstanding {
  readonly verb: string;
  readonly lines: string[];
  mode: ReplyMode;
  /** Set for commands run through execute() until they settle or time out. */
  waiter: { resolve: (response: Response) => void; reject: (error: Error) => void } | null;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * A connection to a query service.
 *
 * Use {@link QueryConnection.open} to perform the greeting and start the
 * receive loop.
 *
 * Two ways to run commands:
 * - `send()` + `receive()`: commands may be pipelined; replies come back
 *   through receive() in the order the commands were sent.
 * - `execute()` / `query()` / `exec()`: one command at a time, resolving
 *   with that command's own reply. Runs middleware.
 */
export class QueryConnection {
  private io: LineTransport;
  private _state: ConnectionState = "disconnected";
  private _greeting: readonly string[] = [];
  private terminalError: Error | null = null;

  private readonly outstanding: Outstanding[] = [];
  private readonly responses = new WaitQueue<Response>("receive");
  private readonly eventQueue = new WaitQueue<QueryEvent>("event");

  private readonly transferIds = new TransferIdAllocator();
  private middlewares: QueryMiddleware[] = [];
  private lock: Promise<void> = Promise.resolve();

  private receiveLoop: Promise<void> | null = null;
  private keepaliveTimer: ReturnType<typeof setInterval> | null = null;
  private closePromise: Promise<void> | null = null;

  private readonly greetingLines: number;
  private readonly greetingTimeoutMs: number;
  private readonly defaultTimeoutMs: number;
  private readonly eventPattern: RegExp;
  private readonly keepaliveCommand: string;
  private readonly keepaliveIntervalMs: number;
  private readonly commandSet: ReadonlySet<string> | null;
  private readonly quitOnClose: boolean;

  /** Host the transport is connected to, if known. */
  readonly host: string | null;

  constructor(io: LineTransport, options: QueryConnectionOptions = {}) {
    this.io = io;
    this.greetingLines = options.greetingLines ?? 2;
    this.greetingTimeoutMs = options.greetingTimeoutMs ?? 5000;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 30000;
    this.eventPattern = options.eventPattern ?? DEFAULT_EVENT_PATTERN;
    this.keepaliveCommand = options.keepaliveCommand ?? "whoami";
    this.keepaliveIntervalMs = options.keepaliveIntervalMs ?? 0;
    this.commandSet = options.commandSet ?? null;
    this.quitOnClose = options.quitOnClose ?? true;
    this.host = options.host ?? null;
  }

  /**
   * Read the greeting and start the receive loop.
   *
   * Closes the transport and throws ConnectionError (kind "connect") if the
   * greeting does not arrive in time.
   */
  static async open(io: LineTransport, options: QueryConnectionOptions = {}): Promise<QueryConnection> {
    const conn = new QueryConnection(io, options);
    await conn.handshake();
    return conn;
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** Lines the service sent on connect. */
  get greeting(): readonly string[] {
    return this._greeting;
  }

  /** Get the underlying transport. */
  getIo(): LineTransport {
    return this.io;
  }

  /** Get the per-connection transfer id allocator. */
  getTransferIdAllocator(): TransferIdAllocator {
    return this.transferIds;
  }

  /** Number of commands still waiting for their status line. */
  get pendingReplies(): number {
    return this.outstanding.length;
  }

  /** Add middleware to every subsequent execute(). */
  use(middleware: QueryMiddleware): this {
    this.middlewares = [...this.middlewares, middleware];
    return this;
  }

  private async handshake(): Promise<void> {
    const deadline = Date.now() + this.greetingTimeoutMs;
    const greeting: string[] = [];

    while (greeting.length < this.greetingLines) {
      const remaining = deadline - Date.now();
      let line: string | null = null;
      if (remaining > 0) {
        try {
          line = await this.io.recvTimeout(remaining);
        } catch (e) {
          this.io.close();
          throw ConnectionError.connect("failed to read greeting", e);
        }
      }

      if (line === null) {
        this.io.close();
        const cause =
          Date.now() >= deadline ? new TimeoutError("greeting", this.greetingTimeoutMs) : undefined;
        throw ConnectionError.connect(
          `expected ${this.greetingLines} greeting lines, got ${greeting.length}`,
          cause,
        );
      }
      if (line.length === 0) continue;
      greeting.push(line);
    }

    this._greeting = greeting;
    this._state = "connected";
    log("connected (%s)", greeting[0] ?? "no greeting");

    this.receiveLoop = this.runReceiveLoop();
    if (this.keepaliveIntervalMs > 0) {
      this.keepaliveTimer = setInterval(() => {
        this.sendKeepalive().catch((error: unknown) => {
          log("keepalive failed: %O", error);
        });
      }, this.keepaliveIntervalMs);
      this.keepaliveTimer.unref();
    }
  }

  private async runReceiveLoop(): Promise<void> {
    while (this._state === "connected") {
      let line: string | null;
      try {
        line = await this.io.recv();
      } catch (e) {
        this.fail(ConnectionError.io("read failed", e));
        return;
      }

      if (line === null) {
        this.fail(ConnectionError.closed("connection closed by peer"));
        return;
      }

      try {
        this.handleLine(line);
      } catch (e) {
        this.fail(asError(e));
        return;
      }
    }
  }

  private handleLine(line: string): void {
    if (this._state !== "connected" || line.length === 0) return;

    const kind = classifyLine(line, {
      awaitingReply: this.outstanding.length > 0,
      eventPattern: this.eventPattern,
    });

    switch (kind) {
      case "event": {
        const event = decodeEvent(line);
        log("event %s", event.name);
        this.eventQueue.push(event);
        return;
      }
      case "data":
        this.outstanding[0].lines.push(line);
        return;
      case "status": {
        const entry = this.outstanding.shift();
        if (!entry) {
          throw ParseError.unexpectedStatus(line);
        }
        this.deliver(entry, decodeResponse([...entry.lines, line]));
        return;
      }
    }
  }

  private deliver(entry: Outstanding, response: Response): void {
    switch (entry.mode) {
      case "queued":
        this.responses.push(response);
        return;
      case "discard":
        log("discarded reply to %s (error id %d)", entry.verb, response.status.code);
        return;
      case "direct":
        entry.waiter?.resolve(response);
        entry.waiter = null;
        return;
    }
  }

  /**
   * Move to Closing and release every waiter with `error`.
   *
   * Called on transport and parse errors. Idempotent.
   */
  private fail(error: Error): void {
    if (this._state === "closing") return;
    this._state = "closing";
    this.terminalError = error;
    log("connection failed: %s", error.message);
    this.releaseWaiters(error);
    this.io.close();
  }

  private releaseWaiters(error: Error): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }

    this.responses.close(error);
    this.eventQueue.close(error);
    for (const entry of this.outstanding.splice(0)) {
      entry.waiter?.reject(error);
      entry.waiter = null;
    }
  }

  private ensureOpen(): void {
    if (this._state === "connected") return;
    throw this.terminalError ?? ConnectionError.closed();
  }

  private async write(line: string): Promise<void> {
    try {
      await this.io.send(line);
    } catch (e) {
      const error = ConnectionError.io("write failed", e);
      this.fail(error);
      throw error;
    }
  }

  /**
   * Send a command without waiting for its reply.
   *
   * The reply is queued for receive(), or dropped with `discardResponse`.
   * Commands may be pipelined: send A, send B, then receive twice.
   */
  async send(command: Command, options: SendOptions = {}): Promise<void> {
    this.ensureOpen();
    const line = encodeCommand(command);
    this.outstanding.push({
      verb: command.verb,
      lines: [],
      mode: options.discardResponse ? "discard" : "queued",
      waiter: null,
    });
    await this.write(line);
  }

  /**
   * Wait for the reply to the oldest command sent with send().
   *
   * On TimeoutError the command stays outstanding; a later receive() still
   * gets its reply. Fails with the terminal error once the connection is
   * closed and no reply is buffered.
   */
  receive(timeoutMs?: number): Promise<Response> {
    return this.responses.shift(timeoutMs ?? this.defaultTimeoutMs);
  }

  /**
   * Wait for the next event, in arrival order.
   *
   * Without a timeout, waits until an event arrives or the connection closes.
   */
  waitForEvent(timeoutMs?: number): Promise<QueryEvent> {
    return this.eventQueue.shift(timeoutMs);
  }

  /**
   * Iterate over events until the connection is closed.
   *
   * Ends quietly on close; rethrows transport and parse errors.
   */
  async *events(): AsyncGenerator<QueryEvent, void, undefined> {
    while (true) {
      let event: QueryEvent;
      try {
        event = await this.eventQueue.shift();
      } catch (e) {
        if (e instanceof ConnectionError && e.kind === "closed") return;
        throw e;
      }
      yield event;
    }
  }

  /**
   * Reset the server's idle timer.
   *
   * The reply is consumed and dropped by the connection.
   */
  async sendKeepalive(): Promise<void> {
    await this.send(createCommand(this.keepaliveCommand), { discardResponse: true });
  }

  /**
   * Run a command and resolve with its reply.
   *
   * Waits for earlier execute() calls to finish first. A nonzero status is
   * returned, not thrown. On timeout the command stays outstanding and its
   * late reply is dropped.
   */
  async execute(command: Command, options: ExecuteOptions = {}): Promise<Response> {
    const ctx: QueryContext = { extensions: new Extensions() };
    const request: QueryRequest = { verb: command.verb, command };

    for (const mw of this.middlewares) {
      if (mw.pre) {
        const rejection = await mw.pre(ctx, request);
        if (rejection) {
          const error = RejectionError.from(rejection);
          await this.runPostHooks(ctx, request, { ok: false, error });
          throw error;
        }
      }
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    let response: Response;
    try {
      response = await this.exclusive(() => this.roundTrip(request.command, timeoutMs));
    } catch (e) {
      const error = asError(e);
      await this.runPostHooks(ctx, request, { ok: false, error });
      throw error;
    }

    await this.runPostHooks(ctx, request, { ok: true, response });
    return response;
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private roundTrip(command: Command, timeoutMs: number): Promise<Response> {
    this.ensureOpen();
    const line = encodeCommand(command);

    return new Promise<Response>((resolve, reject) => {
      const entry: Outstanding = { verb: command.verb, lines: [], mode: "direct", waiter: null };
      const timer = setTimeout(() => {
        entry.mode = "discard";
        entry.waiter = null;
        reject(new TimeoutError("execute", timeoutMs));
      }, timeoutMs);

      entry.waiter = {
        resolve: (response) => {
          clearTimeout(timer);
          resolve(response);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
      this.outstanding.push(entry);

      this.write(line).catch((error: unknown) => {
        entry.waiter?.reject(asError(error));
        entry.waiter = null;
      });
    });
  }

  private async runPostHooks(
    ctx: QueryContext,
    request: QueryRequest,
    outcome: QueryOutcome,
  ): Promise<void> {
    // Post hooks run in reverse order (onion model)
    for (let i = this.middlewares.length - 1; i >= 0; i--) {
      const mw = this.middlewares[i];
      if (mw.post) {
        try {
          await mw.post(ctx, request, outcome);
        } catch (e) {
          log("post hook failed for %s: %O", request.verb, e);
        }
      }
    }
  }

  private checkVerb(verb: string): void {
    if (this.commandSet && !this.commandSet.has(verb)) {
      throw new UnknownCommandError(verb);
    }
  }

  /**
   * Start building a command.
   *
   * @example
   * ```typescript
   * const clients = await conn.query("clientlist").option("uid", "away").all();
   * await conn.query("clientkick", { reasonid: 5, clid: [1, 2, 3] }).exec();
   * ```
   */
  query(
    verb: string,
    params: Readonly<Record<string, ParamInput>> = {},
    options: Iterable<string> = [],
  ): QueryBuilder {
    this.checkVerb(verb);
    return new QueryBuilder(this, verb).params(params).option(...options);
  }

  /** Run a command; throws CommandError on a nonzero status. */
  async exec(
    verb: string,
    params: Readonly<Record<string, ParamInput>> = {},
    options: Iterable<string> = [],
  ): Promise<Response> {
    return this.query(verb, params, options).exec();
  }

  /**
   * Close the connection. Idempotent.
   *
   * Every pending receive()/waitForEvent()/execute() fails with
   * ConnectionError (kind "closed") right away. Replies and events that
   * arrived before the close can still be drained.
   */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.doClose();
    }
    return this.closePromise;
  }

  private async doClose(): Promise<void> {
    const wasConnected = this._state === "connected";
    if (this._state !== "closing") {
      this._state = "closing";
      this.terminalError = ConnectionError.closed();
      this.releaseWaiters(this.terminalError);
    }

    if (wasConnected && this.quitOnClose) {
      try {
        await this.io.send("quit");
      } catch (e) {
        log("quit failed: %O", e);
      }
    }

    this.io.close();
    await this.receiveLoop;
    log("closed");
  }
}
