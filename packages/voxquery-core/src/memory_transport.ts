// In-memory line transport.
//
// Stands in for a server in tests: lines written by the connection are
// recorded in `sent` and handed to `onSend`, which can answer by pushing
// lines back.

import type { LineTransport } from "./transport.ts";

export class MemoryTransport implements LineTransport {
  /** Every line the connection wrote, in order. */
  readonly sent: string[] = [];

  /** Called for every written line, after it is recorded. */
  onSend: ((line: string, transport: MemoryTransport) => void) | null = null;

  private pendingLines: string[] = [];
  private waitingResolve: ((line: string | null) => void) | null = null;
  private waitingReject: ((error: Error) => void) | null = null;
  private ended = false;
  private error: Error | null = null;
  private closed = false;

  constructor(lines: readonly string[] = []) {
    this.pendingLines.push(...lines);
  }

  /** Whether close() has been called. */
  isClosed(): boolean {
    return this.closed;
  }

  /** Deliver lines from the "server". */
  push(...lines: string[]): void {
    for (const line of lines) {
      if (this.ended) return;
      if (this.waitingResolve) {
        const resolve = this.waitingResolve;
        this.clearWaiter();
        resolve(line);
      } else {
        this.pendingLines.push(line);
      }
    }
  }

  /** Simulate the peer closing the stream. */
  end(): void {
    this.ended = true;
    if (this.waitingResolve) {
      const resolve = this.waitingResolve;
      this.clearWaiter();
      resolve(null);
    }
  }

  /** Simulate a stream error. */
  fail(error: Error): void {
    this.error = error;
    this.ended = true;
    if (this.waitingReject) {
      const reject = this.waitingReject;
      this.clearWaiter();
      this.error = null;
      reject(error);
    }
  }

  async send(line: string): Promise<void> {
    if (this.closed || this.ended) {
      throw new Error("transport closed");
    }
    this.sent.push(line);
    this.onSend?.(line, this);
  }

  recv(): Promise<string | null> {
    return this.wait(null);
  }

  recvTimeout(timeoutMs: number): Promise<string | null> {
    return this.wait(timeoutMs);
  }

  close(): void {
    this.closed = true;
    this.end();
  }

  private wait(timeoutMs: number | null): Promise<string | null> {
    if (this.pendingLines.length > 0) {
      const [line] = this.pendingLines.splice(0, 1);
      return Promise.resolve(line);
    }
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
      this.waitingReject = (error) => {
        if (timer) clearTimeout(timer);
        reject(error);
      };
    });
  }

  private clearWaiter(): void {
    this.waitingResolve = null;
    this.waitingReject = null;
  }
}
