// In-process duplex pair.
//
// Bytes written to one end are readable from the other. Ending or
// destroying one end ends the other's readable side; writing to a
// destroyed peer fails like a reset socket.

import { Duplex } from "node:stream";

class PairedDuplex extends Duplex {
  peer: PairedDuplex | null = null;

  override _read(): void {}

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    if (!this.peer || this.peer.destroyed) {
      callback(new Error("write after peer closed"));
      return;
    }
    this.peer.push(chunk);
    callback();
  }

  override _final(callback: (error?: Error | null) => void): void {
    if (this.peer && !this.peer.destroyed) this.peer.push(null);
    callback();
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    if (this.peer && !this.peer.destroyed) this.peer.push(null);
    callback(error);
  }
}

/** Create two connected duplex streams. */
export function createDuplexPair(): [Duplex, Duplex] {
  const a = new PairedDuplex();
  const b = new PairedDuplex();
  a.peer = b;
  b.peer = a;
  return [a, b];
}
