/**
 * Insert-only set of URL strings. `claim` checks and inserts in one
 * synchronous step, so concurrent tasks on the event loop cannot both win.
 */
export class DedupSet {
  private readonly entries = new Set<string>();

  claim(key: string): boolean {
    if (this.entries.has(key)) {
      return false;
    }

    this.entries.add(key);
    return true;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  values(): string[] {
    return [...this.entries];
  }
}
