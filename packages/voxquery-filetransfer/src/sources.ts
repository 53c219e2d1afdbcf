// Upload sources.

import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { Readable } from "node:stream";

/**
 * Bytes to upload.
 *
 * `open(offset)` yields the content from `offset` to the end; it is called
 * once per transfer, after the server has chosen the offset.
 */
export interface UploadSource {
  readonly size: number;
  open(offset: number): AsyncIterable<Uint8Array>;
}

/** Upload from memory. */
export function bufferSource(bytes: Uint8Array): UploadSource {
  return {
    size: bytes.length,
    open: (offset) => Readable.from([Buffer.from(bytes.subarray(offset))]),
  };
}

/** Upload a local file. The size is taken when the source is created. */
export async function fileSource(path: string): Promise<UploadSource> {
  const info = await stat(path);
  if (!info.isFile()) {
    throw new TypeError(`not a regular file: ${path}`);
  }
  return {
    size: info.size,
    open: (offset) => createReadStream(path, { start: offset }),
  };
}
