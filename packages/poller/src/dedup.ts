interface DedupEntry {
  text: string;
  occurredAt: number;
}

/**
 * Fingerprints already reported. Entries are kept in least-recently-recorded
 * order so the oldest goes first once `maxEntries` is exceeded.
 */
export class DedupIndex {
  private readonly seen = new Map<string, DedupEntry>();

  constructor(private readonly maxEntries: number) {}

  get size(): number {
    return this.seen.size;
  }

  isNew(fingerprint: string): boolean {
    return !this.seen.has(fingerprint);
  }

  get(fingerprint: string): DedupEntry | undefined {
    return this.seen.get(fingerprint);
  }

  record(fingerprint: string, text: string, occurredAt: number): void {
    // Move to most recent
    this.seen.delete(fingerprint);
    this.seen.set(fingerprint, { text, occurredAt });

    while (this.seen.size > this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
  }

  /** Drops entries for events that occurred before `cutoffMs`. */
  evictOlderThan(cutoffMs: number): number {
    let evicted = 0;
    for (const [fingerprint, entry] of this.seen) {
      if (entry.occurredAt < cutoffMs) {
        this.seen.delete(fingerprint);
        evicted++;
      }
    }
    return evicted;
  }
}
