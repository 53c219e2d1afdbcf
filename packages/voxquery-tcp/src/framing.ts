// Line framing for byte streams.
//
// The query service terminates lines with "\n\r". Incoming bytes are split
// on "\n" and the stray "\r" on either side of a line is dropped. Outgoing
// commands end in "\n".

import type { Duplex } from "node:stream";
import type { LineTransport } from "voxquery-core";

const NEWLINE = 0x0a;

function trimCarriageReturns(line: string): string {
  return line.replace(/^\r+|\r+$/g, "");
}

/**
 * A line-framed duplex stream.
 *
 * Works over anything Node exposes as a Duplex: TCP sockets, SSH channels,
 * in-process pairs.
 *
 * Implements the LineTransport interface for use with QueryConnection.
 */
export class LineFramed implements LineTransport {
  protected stream: Duplex;
  private buf: Buffer = Buffer.alloc(0);
  private pendingLines: string[] = [];
  private waitingResolve: ((line: string | null) => void) | null = null;
  private waitingReject: ((error: Error) => void) | null = null;
  private ended = false;
  private error: Error | null = null;

  constructor(stream: Duplex) {
    this.stream = stream;

    stream.on("data", (chunk: Buffer) => {
      this.buf = this.buf.length === 0 ? chunk : Buffer.concat([this.buf, chunk]);
      this.processBuffer();
    });

    stream.on("error", (err: Error) => {
      if (this.ended) return;
      this.ended = true;
      if (this.waitingReject) {
        const reject = this.waitingReject;
        this.clearWaiter();
        reject(err);
      } else {
        this.error = err;
      }
    });

    stream.on("end", () => this.finish());
    stream.on("close", () => this.finish());
  }

  private processBuffer(): void {
    let start = 0;
    let index = this.buf.indexOf(NEWLINE, start);
    while (index >= 0) {
      this.deliver(trimCarriageReturns(this.buf.toString("utf8", start, index)));
      start = index + 1;
      index = this.buf.indexOf(NEWLINE, start);
    }
    this.buf = this.buf.subarray(start);
  }

  private deliver(line: string): void {
    if (this.waitingResolve) {
      const resolve = this.waitingResolve;
      this.clearWaiter();
      resolve(line);
    } else {
      this.pendingLines.push(line);
    }
  }

  private finish(): void {
    if (this.ended) return;

    // A final line without terminator still counts.
    const tail = trimCarriageReturns(this.buf.toString("utf8"));
    this.buf = Buffer.alloc(0);
    if (tail.length > 0) this.deliver(tail);

    this.ended = true;
    if (this.waitingResolve) {
      const resolve = this.waitingResolve;
      this.clearWaiter();
      resolve(null);
    }
  }

  private clearWaiter(): void {
    this.waitingResolve = null;
    this.waitingReject = null;
  }

  /** Get the underlying stream. */
  getStream(): Duplex {
    return this.stream;
  }

  /** Write one line, appending "\n". */
  send(line: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.ended || this.stream.destroyed) {
        reject(new Error("stream is closed"));
        return;
      }

      this.stream.write(`${line}\n`, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  recv(): Promise<string | null> {
    return this.wait(null);
  }

  /**
   * Receive the next line with a timeout.
   *
   * Returns `null` if no line arrived within the timeout or the stream ended.
   */
  recvTimeout(timeoutMs: number): Promise<string | null> {
    return this.wait(timeoutMs);
  }

  private wait(timeoutMs: number | null): Promise<string | null> {
    // Check for queued lines first
    if (this.pendingLines.length > 0) {
      const [line] = this.pendingLines.splice(0, 1);
      return Promise.resolve(line);
    }

    // Check for errors or ended stream
    if (this.error) {
      const err = this.error;
      this.error = null;
      return Promise.reject(err);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      const timer =
        timeoutMs === null
          ? null
          : setTimeout(() => {
              this.clearWaiter();
              resolve(null);
            }, timeoutMs);

      this.waitingResolve = (line) => {
        if (timer) clearTimeout(timer);
        resolve(line);
      };
      this.waitingReject = (err) => {
        if (timer) clearTimeout(timer);
        reject(err);
      };
    });
  }

  /** Close the stream. */
  close(): void {
    this.stream.destroy();
  }
}
