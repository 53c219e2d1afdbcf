// Transfer id allocator.

/**
 * Allocates `clientftfid` values for file transfers.
 *
 * Ids are unique for the lifetime of the connection that owns the allocator,
 * so concurrent transfers never share one.
 */
export class TransferIdAllocator {
  private nextId = 1;

  /** Allocate the next transfer id. */
  next(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }
}
