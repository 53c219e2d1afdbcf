/**
 * Line transport abstraction.
 *
 * The connection engine only needs a duplex stream of text lines. How that
 * stream is established (plain TCP, an SSH shell channel, an in-memory pair
 * for tests) is up to the transport.
 *
 * Implementations:
 * - LineFramed (voxquery-tcp) over any Node Duplex: TCP sockets, SSH channels
 * - MemoryTransport for tests
 */
export interface LineTransport {
  /**
   * Write one line. The transport appends the line terminator.
   *
   * Resolves once the line is handed to the underlying stream.
   */
  send(line: string): Promise<void>;

  /**
   * Receive the next line, waiting as long as needed.
   *
   * Returns null once the stream has ended. Rejects on a stream error.
   */
  recv(): Promise<string | null>;

  /**
   * Receive the next line with a timeout.
   *
   * Returns null if the timeout expires or the stream has ended. A line that
   * arrives after the timeout stays queued for the next call.
   */
  recvTimeout(timeoutMs: number): Promise<string | null>;

  /** Close the transport. Idempotent. */
  close(): void;
}
