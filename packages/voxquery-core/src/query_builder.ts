// QueryBuilder for fluent command construction.
//
//   const clients = await conn.query("clientlist").option("uid").all();
//   await conn.query("clientkick").params({ reasonid: 5 }).param("clid", [1, 2]).exec();
//   await conn.query("servergroupaddperm", { sgid: 1, permsid: "a", permvalue: 1 })
//     .pipe({ permid: 5, permvalue: 2 })
//     .exec();

import {
  type Command,
  type ParamInput,
  type ParamValue,
  type QueryRecord,
  type SegmentParams,
  type Response,
  createCommand,
  encodeCommand,
} from "voxquery-wire";

import type { QueryConnection } from "./connection.ts";
import { CommandError } from "./errors.ts";

interface Segment<V> {
  params: Map<string, V>;
  options: string[];
}

function isList(value: ParamInput): value is readonly ParamValue[] {
  return Array.isArray(value);
}

function isEmpty<V>(segment: Segment<V>): boolean {
  return segment.params.size === 0 && segment.options.length === 0;
}

/**
 * Fluent builder for one command on a connection.
 *
 * Nothing is sent until fetch(), exec(), first(), all() or `await`.
 * Awaiting the builder is the same as calling exec().
 *
 * option(), param() and params() apply to the segment started by the last
 * pipe(), or to the first segment before any pipe().
 */
export class QueryBuilder implements PromiseLike<Response> {
  private readonly base: Segment<ParamInput> = { params: new Map(), options: [] };
  private readonly pipes: Array<Segment<ParamValue | null | undefined>> = [];
  private timeoutMs: number | undefined;
  private result: Promise<Response> | null = null;

  constructor(
    private readonly connection: QueryConnection,
    readonly verb: string,
  ) {}

  /** Add option flags (without the leading `-`). */
  option(...names: string[]): this {
    (this.pipes.at(-1) ?? this.base).options.push(...names);
    return this;
  }

  /**
   * Set one parameter.
   *
   * In the first segment an array value pipelines the command; segments
   * started by pipe() take scalars only.
   */
  param(key: string, value: ParamInput): this {
    const last = this.pipes.at(-1);
    if (!last) {
      this.base.params.set(key, value);
    } else if (isList(value)) {
      throw new TypeError(`parameter ${key} of a pipe segment must be a single value`);
    } else {
      last.params.set(key, value);
    }
    return this;
  }

  /** Set several parameters. */
  params(params: Readonly<Record<string, ParamInput>>): this {
    for (const [key, value] of Object.entries(params)) {
      this.param(key, value);
    }
    return this;
  }

  /**
   * Start a new pipe segment with its own parameters and options.
   *
   * Fills the current segment instead while it is still empty, so
   * `query("clientkick").pipe({ clid: 1 }).pipe({ clid: 2 })` sends
   * `clientkick clid=1|clid=2`.
   */
  pipe(params: SegmentParams = {}, options: Iterable<string> = []): this {
    if (!isEmpty(this.pipes.at(-1) ?? this.base)) {
      this.pipes.push({ params: new Map(), options: [] });
    }
    this.params(params);
    return this.option(...options);
  }

  /** Override the connection's default reply timeout. */
  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  /** Build the immutable command. */
  build(): Command {
    const pipes = this.pipes
      .filter((segment) => !isEmpty(segment))
      .map((segment) => ({ params: Object.fromEntries(segment.params), options: segment.options }));
    return createCommand(this.verb, Object.fromEntries(this.base.params), this.base.options, pipes);
  }

  /** The wire line this builder would send. */
  toString(): string {
    return encodeCommand(this.build());
  }

  /** Run the command and return its reply, whatever the status. */
  fetch(): Promise<Response> {
    return this.connection.execute(this.build(), { timeoutMs: this.timeoutMs });
  }

  /** Run the command; throws CommandError on a nonzero status. */
  async exec(): Promise<Response> {
    const response = await this.fetch();
    if (!response.ok) {
      throw CommandError.fromResponse(response);
    }
    return response;
  }

  /** Run the command and return its first record, if any. */
  async first(): Promise<QueryRecord | undefined> {
    return (await this.exec()).first();
  }

  /** Run the command and return all records. */
  async all(): Promise<readonly QueryRecord[]> {
    return (await this.exec()).all();
  }

  then<TResult1 = Response, TResult2 = never>(
    onfulfilled?: ((value: Response) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    if (!this.result) {
      this.result = this.exec();
    }
    return this.result.then(onfulfilled, onrejected);
  }
}
