/**
 * Bounded set of message ids already handled by this process.
 * Overflow evicts the least recently added ids.
 */
export class ProcessedIdSet {
  private readonly ids = new Set<string>();

  constructor(
    readonly highWaterMark = 1000,
    readonly lowWaterMark = 500
  ) {
    if (lowWaterMark > highWaterMark) {
      throw new RangeError('lowWaterMark must not exceed highWaterMark');
    }
  }

  get size(): number {
    return this.ids.size;
  }

  has(id: string): boolean {
    return id !== '' && this.ids.has(id);
  }

  /** Empty ids are ignored; messages without one rely on the seen flag. */
  add(id: string): void {
    if (!id) return;
    this.ids.add(id);
  }

  /**
   * Shrink to the low-water mark once the high-water mark is exceeded.
   * Returns the number of evicted ids.
   */
  enforceLimit(): number {
    if (this.ids.size <= this.highWaterMark) return 0;

    let excess = this.ids.size - this.lowWaterMark;
    const evicted = excess;
    for (const id of this.ids) {
      if (excess === 0) break;
      this.ids.delete(id);
      excess--;
    }
    return evicted;
  }

  clear(): void {
    this.ids.clear();
  }
}
