// File transfer engine.
//
// A transfer is negotiated on the query connection (ftinitupload or
// ftinitdownload). Its bytes then move over a separate connection to the
// port from the reply: the client writes the transfer key first, after
// which the stream carries raw file content.

import { open } from "node:fs/promises";
import { type Duplex, Writable } from "node:stream";
import { finished } from "node:stream/promises";

import createDebug from "debug";
import {
  CommandError,
  ConnectionError,
  type ParamInput,
  ParseError,
  type QueryConnection,
  type QueryRecord,
  type Response,
  TimeoutError,
  intField,
  requireInt,
  requireString,
  stringField,
} from "voxquery-core";
import { openSocket } from "voxquery-tcp";

import { IntegrityError } from "./errors.ts";
import { type TransferProgress, type TransferResult, TransferSession } from "./session.ts";
import { type UploadSource, fileSource } from "./sources.ts";

const log = createDebug("voxquery:transfer");

/** Status the server uses for an empty listing. */
const EMPTY_RESULT_SET = 1281;

/** Opens a data connection. */
export type DataConnector = (host: string, port: number, timeoutMs: number) => Promise<Duplex>;

export interface FileTransferOptions {
  /** Opens data connections (default: a TCP socket). */
  connector?: DataConnector;
  /** Data connection timeout in milliseconds (default: 10000). */
  connectTimeoutMs?: number;
  /**
   * Milliseconds the data connection may go without moving a chunk before it
   * is destroyed (default: 30000). `0` disables the limit.
   */
  dataTimeoutMs?: number;
  /** Digest for the local checksum (default: "sha256"). */
  checksumAlgorithm?: string;
  /** Data host when the reply has none, or `0.0.0.0` (default: the connection's host). */
  host?: string;
}

interface TransferHooks {
  /** Called with the init reply, before the data connection opens. */
  onInit?: (response: Response) => void;
  /** Called after each chunk. */
  onProgress?: (progress: TransferProgress) => void;
  /** Hex digest the transferred bytes must have. Overrides a `checksum` field in the reply. */
  expectedChecksum?: string;
}

export interface UploadOptions extends TransferHooks {
  cid: number;
  /** Target path on the server, e.g. "/docs/report.txt". */
  name: string;
  cpw?: string;
  /** Replace an existing file (default: true). */
  overwrite?: boolean;
  /** Continue a partial upload at the offset the server returns (default: false). */
  resume?: boolean;
}

export interface DownloadOptions extends TransferHooks {
  cid: number;
  name: string;
  cpw?: string;
  /** Byte offset to start from (default: 0). */
  seekpos?: number;
}

export interface DownloadedFile extends TransferResult {
  data: Buffer;
}

/** The fields of an init reply that drive the data phase. */
export interface InitReply {
  host: string;
  port: number;
  key: string;
  seekpos: number;
  /** Declared file size. Download replies carry it; upload replies may not. */
  size: number | undefined;
  serverTransferId: number | null;
  checksum: string | undefined;
}

function statusLine(response: Response): string {
  return response.lines.at(-1) ?? "";
}

/** First address of a comma list; `0.0.0.0` or nothing means the fallback. */
function pickHost(ip: string | undefined, fallback: string): string {
  const first = ip?.split(",")[0].trim();
  if (!first || first === "0.0.0.0") return fallback;
  return first;
}

/**
 * Read an init reply.
 *
 * @throws CommandError if the record carries a nonzero inline status
 * @throws ParseError if the key or port is missing
 */
export function parseInitReply(response: Response, fallbackHost: string): InitReply {
  const record = response.first();
  if (!record) {
    throw new ParseError("transfer init reply has no record", statusLine(response));
  }

  const status = intField(record, "status");
  if (status !== undefined && status !== 0) {
    throw new CommandError(
      { code: status, message: stringField(record, "msg") ?? "", extra: record },
      response,
    );
  }

  return {
    host: pickHost(stringField(record, "ip"), fallbackHost),
    port: requireInt(record, "port"),
    key: requireString(record, "ftkey"),
    seekpos: intField(record, "seekpos") ?? 0,
    size: intField(record, "size"),
    serverTransferId: intField(record, "serverftfid") ?? null,
    checksum: stringField(record, "checksum"),
  };
}

function clip(chunk: Uint8Array, limit: number): Uint8Array {
  return chunk.length > limit ? chunk.subarray(0, limit) : chunk;
}

function toBytes(chunk: unknown): Uint8Array {
  return chunk instanceof Uint8Array ? chunk : Buffer.from(String(chunk));
}

/** Settles on the write callback, or when the stream closes first. */
function writeChunk(stream: Writable, chunk: Uint8Array): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onClose = () => reject(stream.errored ?? new Error("stream closed during write"));
    stream.once("close", onClose);
    stream.write(chunk, (err) => {
      stream.off("close", onClose);
      if (err) reject(err);
      else resolve();
    });
  });
}

interface IdleTimer {
  /** Restart the countdown. */
  touch(): void;
  stop(): void;
}

/** Destroys `socket` with a ConnectionError once `timeoutMs` pass without a touch(). */
function idleTimer(socket: Duplex, timeoutMs: number): IdleTimer {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const stop = () => clearTimeout(timer);
  const touch = () => {
    if (timeoutMs <= 0) return;
    stop();
    timer = setTimeout(() => {
      log("data connection idle for %dms", timeoutMs);
      socket.destroy(
        ConnectionError.io(
          `data connection idle for ${timeoutMs}ms`,
          new TimeoutError("transfer", timeoutMs),
        ),
      );
    }, timeoutMs);
  };
  touch();
  return { touch, stop };
}

/** The negotiated half of a download, before its data connection opens. */
interface PendingDownload {
  session: TransferSession;
  reply: InitReply;
}

/**
 * Uploads, downloads and the file-browser commands of one query connection.
 *
 * Each transfer gets its own id from the connection's allocator and its own
 * data connection, so several may run at once. Control commands go through
 * `execute()` and are serialized with everything else on the connection.
 *
 * @example
 * ```typescript
 * const files = new FileTransfer(conn);
 * await files.upload(bufferSource(bytes), { cid: 5, name: "/notes.txt" });
 * const { data } = await files.downloadToBuffer({ cid: 5, name: "/notes.txt" });
 * ```
 */
export class FileTransfer {
  private readonly connector: DataConnector;
  private readonly connectTimeoutMs: number;
  private readonly dataTimeoutMs: number;
  private readonly checksumAlgorithm: string;
  private readonly host: string;

  constructor(
    private readonly connection: QueryConnection,
    options: FileTransferOptions = {},
  ) {
    this.connector = options.connector ?? openSocket;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    this.dataTimeoutMs = options.dataTimeoutMs ?? 30000;
    this.checksumAlgorithm = options.checksumAlgorithm ?? "sha256";
    this.host = options.host ?? connection.host ?? "localhost";
  }

  /**
   * Upload `source` to `options.name` in channel `options.cid`.
   *
   * @throws CommandError if the server refuses the transfer (no data connection is made)
   * @throws ConnectionError if the data connection cannot be opened
   * @throws IntegrityError if fewer bytes than declared were sent, or the checksum differs
   */
  async upload(source: UploadSource, options: UploadOptions): Promise<TransferResult> {
    const transferId = this.connection.getTransferIdAllocator().next();
    const response = await this.connection.exec("ftinitupload", {
      clientftfid: transferId,
      name: options.name,
      cid: options.cid,
      cpw: options.cpw ?? "",
      size: source.size,
      overwrite: options.overwrite ?? true,
      resume: options.resume ?? false,
    });
    options.onInit?.(response);

    const reply = parseInitReply(response, this.host);
    if (reply.seekpos > source.size) {
      throw new ParseError(
        `resume offset ${reply.seekpos} is past the end of a ${source.size} byte file`,
        statusLine(response),
      );
    }

    const session = new TransferSession(
      transferId,
      "upload",
      reply.seekpos,
      source.size,
      this.checksumAlgorithm,
    );
    log("upload %d: %s to %s:%d from %d", transferId, options.name, reply.host, reply.port, reply.seekpos);

    const socket = await this.connector(reply.host, reply.port, this.connectTimeoutMs);
    let interruption: unknown = null;
    socket.on("error", (err: Error) => {
      interruption ??= err;
    });
    const idle = idleTimer(socket, this.dataTimeoutMs);

    try {
      await writeChunk(socket, Buffer.from(reply.key, "utf8"));
      idle.touch();
      if (session.remaining > 0) {
        for await (const chunk of source.open(reply.seekpos)) {
          const piece = clip(chunk, session.remaining);
          await writeChunk(socket, piece);
          idle.touch();
          session.update(piece);
          options.onProgress?.(session.progress);
          if (session.remaining <= 0) break;
        }
      }
      socket.end();
      await finished(socket, { readable: false });
    } catch (err) {
      interruption = err;
    } finally {
      idle.stop();
      socket.destroy();
    }

    return this.complete(session, reply, options, interruption);
  }

  /** Upload a local file. */
  async uploadFile(path: string, options: UploadOptions): Promise<TransferResult> {
    return this.upload(await fileSource(path), options);
  }

  /**
   * Download `options.name` into `output`, starting at `options.seekpos`.
   *
   * Reads until the peer closes or the declared size is reached; bytes past
   * the declared size are dropped. `output` is not ended.
   *
   * @throws CommandError if the server refuses the transfer (no data connection is made)
   * @throws ConnectionError if the data connection cannot be opened
   * @throws IntegrityError if the stream ended short, or the checksum differs
   */
  async download(output: Writable, options: DownloadOptions): Promise<TransferResult> {
    return this.receive(await this.negotiateDownload(options), output, options);
  }

  private async negotiateDownload(options: DownloadOptions): Promise<PendingDownload> {
    const transferId = this.connection.getTransferIdAllocator().next();
    const seekpos = options.seekpos ?? 0;
    const response = await this.connection.exec("ftinitdownload", {
      clientftfid: transferId,
      name: options.name,
      cid: options.cid,
      cpw: options.cpw ?? "",
      seekpos,
    });
    options.onInit?.(response);

    const reply = parseInitReply(response, this.host);
    if (reply.size === undefined) {
      throw new ParseError("missing field size", statusLine(response));
    }

    const session = new TransferSession(
      transferId,
      "download",
      seekpos,
      reply.size,
      this.checksumAlgorithm,
    );
    log("download %d: %s from %s:%d at %d", transferId, options.name, reply.host, reply.port, seekpos);
    return { session, reply };
  }

  private async receive(
    { session, reply }: PendingDownload,
    output: Writable,
    options: TransferHooks,
  ): Promise<TransferResult> {
    const socket = await this.connector(reply.host, reply.port, this.connectTimeoutMs);
    let interruption: unknown = null;
    socket.on("error", (err: Error) => {
      interruption ??= err;
    });
    const idle = idleTimer(socket, this.dataTimeoutMs);

    try {
      await writeChunk(socket, Buffer.from(reply.key, "utf8"));
      idle.touch();
      if (session.remaining > 0) {
        for await (const chunk of socket) {
          idle.touch();
          const piece = clip(toBytes(chunk), session.remaining);
          await writeChunk(output, piece);
          session.update(piece);
          options.onProgress?.(session.progress);
          if (session.remaining <= 0) break;
        }
      }
    } catch (err) {
      interruption = err;
    } finally {
      idle.stop();
      socket.destroy();
    }

    return this.complete(session, reply, options, interruption);
  }

  /** Download into memory. */
  async downloadToBuffer(options: DownloadOptions): Promise<DownloadedFile> {
    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });
    const result = await this.download(sink, options);
    return { ...result, data: Buffer.concat(chunks) };
  }

  /**
   * Download to a local file.
   *
   * The file is opened once the server has accepted the transfer, so a
   * refusal leaves it untouched. With a nonzero `seekpos` the file must
   * already exist; it is written from that offset on.
   */
  async downloadToFile(path: string, options: DownloadOptions): Promise<TransferResult> {
    const pending = await this.negotiateDownload(options);
    const handle = await open(path, pending.session.offset > 0 ? "r+" : "w");
    const output = handle.createWriteStream({ start: pending.session.offset });
    // finished() reports the error; this keeps it from going uncaught.
    output.on("error", (err: Error) => log("write to %s failed: %s", path, err.message));

    let result: TransferResult;
    try {
      result = await this.receive(pending, output, options);
    } catch (err) {
      output.destroy();
      await finished(output).catch((closeErr: unknown) =>
        log("closing %s after a failed download: %O", path, closeErr),
      );
      throw err;
    }
    output.end();
    await finished(output);
    return result;
  }

  private complete(
    session: TransferSession,
    reply: InitReply,
    options: TransferHooks,
    interruption: unknown,
  ): TransferResult {
    const expectedBytes = session.size - session.offset;
    if (session.remaining > 0) {
      log("%s %d interrupted after %d of %d bytes", session.direction, session.transferId, session.bytesTransferred, expectedBytes);
      throw IntegrityError.size(expectedBytes, session.bytesTransferred, interruption ?? undefined);
    }
    if (interruption !== null) {
      throw ConnectionError.io("data connection failed", interruption);
    }

    const result = session.finish(reply.serverTransferId);
    const expected = options.expectedChecksum ?? reply.checksum;
    if (expected !== undefined && expected.toLowerCase() !== result.checksum) {
      throw IntegrityError.checksum(expected, result.checksum, result.bytesTransferred);
    }

    log("%s %d done: %d bytes", session.direction, session.transferId, result.bytesTransferred);
    return result;
  }

  // ==========================================================================
  // File browser
  // ==========================================================================

  /** Entries of a channel directory. An empty directory yields []. */
  list(cid: number, path = "/", cpw = ""): Promise<readonly QueryRecord[]> {
    return this.records("ftgetfilelist", { cid, cpw, path });
  }

  /** Details of one file, or undefined if the server returned none. */
  async info(cid: number, name: string, cpw = ""): Promise<QueryRecord | undefined> {
    const response = await this.connection.exec("ftgetfileinfo", { cid, cpw, name });
    return response.first();
  }

  /** Delete one or more files; several names are sent as one pipelined command. */
  async remove(cid: number, names: string | readonly string[], cpw = ""): Promise<void> {
    await this.connection.exec("ftdeletefile", { cid, cpw, name: names });
  }

  async mkdir(cid: number, dirname: string, cpw = ""): Promise<void> {
    await this.connection.exec("ftcreatedir", { cid, cpw, dirname });
  }

  /** Rename or move a file; `tcid` moves it to another channel. */
  async rename(
    cid: number,
    oldName: string,
    newName: string,
    options: { cpw?: string; tcid?: number; tcpw?: string } = {},
  ): Promise<void> {
    await this.connection.exec("ftrenamefile", {
      cid,
      cpw: options.cpw ?? "",
      tcid: options.tcid,
      tcpw: options.tcid === undefined ? undefined : (options.tcpw ?? ""),
      oldname: oldName,
      newname: newName,
    });
  }

  /** Transfers the server is running. */
  activeTransfers(): Promise<readonly QueryRecord[]> {
    return this.records("ftlist");
  }

  /** Stop a server-side transfer, optionally deleting the partial file. */
  async stop(serverTransferId: number, deleteFile = false): Promise<void> {
    await this.connection.exec("ftstop", { serverftfid: serverTransferId, delete: deleteFile });
  }

  private async records(
    verb: string,
    params: Readonly<Record<string, ParamInput>> = {},
  ): Promise<readonly QueryRecord[]> {
    const response = await this.connection.query(verb, params).fetch();
    if (response.status.code === EMPTY_RESULT_SET) return [];
    if (!response.ok) throw CommandError.fromResponse(response);
    return response.all();
  }
}
