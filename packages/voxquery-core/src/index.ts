// voxquery-core - query connection engine
// Reply correlation, event delivery, middleware and logging over any line transport.

// Wire codec, re-exported for convenience
export {
  type Command,
  type CommandSegment,
  type SegmentInput,
  type SegmentParams,
  type ParamInput,
  type ParamValue,
  type QueryRecord,
  type QueryEvent,
  type FieldValue,
  type Status,
  Response,
  ParseError,
  createCommand,
  encodeCommand,
  decodeResponse,
  decodeRecord,
  escape,
  unescape,
} from "voxquery-wire";

// Connection
export {
  QueryConnection,
  type ConnectionState,
  type QueryConnectionOptions,
  type SendOptions,
  type ExecuteOptions,
} from "./connection.ts";
export { QueryBuilder } from "./query_builder.ts";

// Transport
export type { LineTransport } from "./transport.ts";
export { MemoryTransport } from "./memory_transport.ts";

// Errors
export {
  ConnectionError,
  TimeoutError,
  type TimeoutOperation,
  CommandError,
  UnknownCommandError,
} from "./errors.ts";

// Middleware
export {
  Extensions,
  RejectionError,
  type QueryContext,
  type QueryRequest,
  type QueryOutcome,
  type QueryMiddleware,
  type Rejection,
  type RejectionCode,
} from "./middleware.ts";

// Logging
export { loggingMiddleware, DEFAULT_REDACTED_PARAMS, type LoggingOptions } from "./logging.ts";

// Flavors
export {
  type Flavor,
  type FlavorProfile,
  SERVER_PROFILE,
  CLIENT_PROFILE,
  SERVER_IDLE_TIMEOUT_MS,
  profileFor,
} from "./flavor.ts";

// Support
export { TransferIdAllocator } from "./allocator.ts";
export { WaitQueue } from "./wait_queue.ts";
export { stringField, requireString, intField, requireInt } from "./fields.ts";
