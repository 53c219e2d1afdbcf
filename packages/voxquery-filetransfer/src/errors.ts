// Data-integrity failures of a file transfer.

/** What did not match. */
export type IntegrityKind = "size" | "checksum";

/**
 * The data phase finished but the bytes do not add up.
 *
 * Raised for a short or interrupted stream (`size`) and for a digest that
 * differs from the one expected (`checksum`).
 */
export class IntegrityError extends Error {
  constructor(
    public readonly kind: IntegrityKind,
    public readonly expected: number | string,
    public readonly actual: number | string,
    public readonly bytesTransferred: number,
    options?: { cause?: unknown },
  ) {
    super(
      kind === "size"
        ? `transfer incomplete: expected ${expected} bytes, got ${actual}`
        : `checksum mismatch: expected ${expected}, got ${actual}`,
      options,
    );
    this.name = "IntegrityError";
  }

  static size(expected: number, actual: number, cause?: unknown): IntegrityError {
    return new IntegrityError("size", expected, actual, actual, { cause });
  }

  static checksum(expected: string, actual: string, bytesTransferred: number): IntegrityError {
    return new IntegrityError("checksum", expected, actual, bytesTransferred);
  }
}
