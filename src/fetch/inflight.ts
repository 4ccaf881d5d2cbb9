/**
 * Process-wide set of item IDs currently being downloaded or delivered, keyed by
 * item ID only: the same media is never fetched twice at once, whichever
 * destination asked.
 */
export class InFlightGuard {
  private readonly held = new Set<string>();

  /** Non-blocking. Returns false if another caller already holds the item. */
  tryAcquire(itemId: string): boolean {
    if (this.held.has(itemId)) return false;
    this.held.add(itemId);
    return true;
  }

  release(itemId: string): void {
    this.held.delete(itemId);
  }

  isHeld(itemId: string): boolean {
    return this.held.has(itemId);
  }

  get size(): number {
    return this.held.size;
  }
}
