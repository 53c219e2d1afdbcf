// Per-transfer state.
//
// One session per upload or download. Sessions share nothing, so
// transfers on the same connection can run side by side.

import { type Hash, createHash } from "node:crypto";

export type TransferDirection = "upload" | "download";

/** Progress as reported to `onProgress`. Positions are absolute file offsets. */
export interface TransferProgress {
  transferred: number;
  total: number;
}

/** Outcome of a completed transfer. */
export interface TransferResult {
  /** Client-side transfer id (`clientftfid`). */
  transferId: number;
  /** Server-side transfer id, when the server reported one. */
  serverTransferId: number | null;
  direction: TransferDirection;
  /** Offset the data phase started at. */
  offset: number;
  /** Declared size of the whole file. */
  size: number;
  /** Bytes moved over the data connection. */
  bytesTransferred: number;
  /** Hex digest of the bytes moved in this session. */
  checksum: string;
}

export class TransferSession {
  private readonly hash: Hash;
  private transferred = 0;

  constructor(
    readonly transferId: number,
    readonly direction: TransferDirection,
    readonly offset: number,
    readonly size: number,
    algorithm: string,
  ) {
    this.hash = createHash(algorithm);
  }

  /** Bytes still owed by the data phase. */
  get remaining(): number {
    return this.size - this.offset - this.transferred;
  }

  get bytesTransferred(): number {
    return this.transferred;
  }

  get progress(): TransferProgress {
    return { transferred: this.offset + this.transferred, total: this.size };
  }

  update(chunk: Uint8Array): void {
    this.hash.update(chunk);
    this.transferred += chunk.length;
  }

  finish(serverTransferId: number | null): TransferResult {
    return {
      transferId: this.transferId,
      serverTransferId,
      direction: this.direction,
      offset: this.offset,
      size: this.size,
      bytesTransferred: this.transferred,
      checksum: this.hash.digest("hex"),
    };
  }
}
