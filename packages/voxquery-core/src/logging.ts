// Logging middleware for query connections.
//
// Provides request/response logging with timing information, written
// through the `debug` package so output is switched on with DEBUG=voxquery:*.

import createDebug, { type Debugger } from "debug";
import type { ParamValue } from "voxquery-wire";

import { CommandError } from "./errors.ts";
import type { QueryContext, QueryMiddleware, QueryOutcome, QueryRequest } from "./middleware.ts";

const START_TIME = Symbol("logging:start-time");

/** Parameter keys whose values are never logged by default. */
export const DEFAULT_REDACTED_PARAMS: readonly string[] = [
  "client_login_password",
  "apikey",
  "cpw",
  "password",
];

export interface LoggingOptions {
  /**
   * Namespace for the `debug` logger. Defaults to "voxquery:query".
   */
  namespace?: string;

  /**
   * Log command parameters. Defaults to true.
   */
  logParams?: boolean;

  /**
   * Log response records. Defaults to false (lists can be large).
   */
  logRecords?: boolean;

  /**
   * Minimum duration (ms) to log. Faster commands are skipped.
   * Defaults to 0 (log all commands).
   */
  minDuration?: number;

  /**
   * Parameter keys whose values are replaced by "[redacted]".
   * Defaults to {@link DEFAULT_REDACTED_PARAMS}.
   */
  redact?: readonly string[];

  /**
   * Logger to write to instead of creating one for `namespace`.
   */
  logger?: Debugger;
}

function paramsForLog<V extends ParamValue | readonly ParamValue[]>(
  params: ReadonlyMap<string, V>,
  redact: ReadonlySet<string>,
): Record<string, V | "[redacted]"> {
  const out: Record<string, V | "[redacted]"> = {};
  for (const [key, value] of params) {
    out[key] = redact.has(key) ? "[redacted]" : value;
  }
  return out;
}

/**
 * Create a logging middleware that logs every executed command with timing.
 *
 * Logs structured objects:
 * - Request: { type: "request", verb, params?, options?, pipes? }
 * - Response: { type: "response", verb, duration, ok, status?, records?, error? }
 *
 * @example
 * ```typescript
 * connection.use(loggingMiddleware({ minDuration: 50 }));
 * // DEBUG=voxquery:query node app.js
 * ```
 */
export function loggingMiddleware(options: LoggingOptions = {}): QueryMiddleware {
  const log = options.logger ?? createDebug(options.namespace ?? "voxquery:query");
  const logParams = options.logParams ?? true;
  const logRecords = options.logRecords ?? false;
  const minDuration = options.minDuration ?? 0;
  const redact = new Set(options.redact ?? DEFAULT_REDACTED_PARAMS);

  return {
    pre(ctx: QueryContext, request: QueryRequest): void {
      ctx.extensions.set(START_TIME, performance.now());

      if (!log.enabled) return;

      const logObj: Record<string, unknown> = {
        type: "request",
        verb: request.verb,
      };

      if (logParams && request.command.params.size > 0) {
        logObj.params = paramsForLog(request.command.params, redact);
      }
      if (request.command.options.length > 0) {
        logObj.options = request.command.options;
      }
      if (request.command.pipes.length > 0) {
        logObj.pipes = request.command.pipes.map((segment) => ({
          options: segment.options,
          ...(logParams ? { params: paramsForLog(segment.params, redact) } : {}),
        }));
      }

      log(`→ ${request.verb}`, logObj);
    },

    post(ctx: QueryContext, request: QueryRequest, outcome: QueryOutcome): void {
      const startTime = ctx.extensions.get<number>(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;
      if (!log.enabled) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        verb: request.verb,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        const { response } = outcome;
        logObj.ok = response.ok;
        logObj.status = { code: response.status.code, message: response.status.message };
        if (logRecords) {
          logObj.records = response.records;
        }
        const mark = response.ok ? "✓" : "✗";
        log(`← ${request.verb}: ${mark} ${duration.toFixed(2)}ms`, logObj);
      } else {
        logObj.ok = false;
        const error = outcome.error;
        logObj.error =
          error instanceof CommandError
            ? { name: error.name, code: error.code, message: error.message }
            : { name: error.name, message: error.message };
        log(`← ${request.verb}: ✗ ${duration.toFixed(2)}ms`, logObj);
      }
    },
  };
}
