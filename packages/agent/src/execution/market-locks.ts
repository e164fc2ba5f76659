/**
 * Per-market exclusive locks shared by both executors. Acquisition is
 * all-or-nothing and never waits: a held market means the spread is already
 * being worked on.
 */
export class MarketLocks {
  private held = new Map<string, string>();

  /** Returns a release function, or null when any key is already held. */
  tryAcquire(keys: string[], owner: string): (() => void) | null {
    const sorted = [...new Set(keys)].sort();
    if (sorted.some((key) => this.held.has(key))) return null;
    for (const key of sorted) this.held.set(key, owner);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      for (const key of sorted) {
        if (this.held.get(key) === owner) this.held.delete(key);
      }
    };
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  holder(key: string): string | undefined {
    return this.held.get(key);
  }

  size(): number {
    return this.held.size;
  }
}
