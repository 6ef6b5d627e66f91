export type Entries = Record<string, string>;

export type StoreStats = {
  requests: number;
  size: number;
};

/**
 * In-memory string map plus the request counter that tracks traffic against it.
 *
 * Every public method is one critical section: it runs synchronously to
 * completion on the event loop and never awaits, so no other request handler,
 * timer or reporter tick can observe the map and the counter mid-update.
 * Reads count as requests too.
 */
export class KeyValueStore {
  private readonly entries = new Map<string, string>();
  private requestCount = 0;

  /** Merges `updates` over the current entries. One call counts as one request. */
  put(updates: Readonly<Entries>): void {
    for (const [key, value] of Object.entries(updates)) {
      this.entries.set(key, value);
    }
    this.requestCount += 1;
  }

  /** Returns a detached copy of every entry. */
  getAll(): Entries {
    this.requestCount += 1;
    return Object.fromEntries(this.entries);
  }

  /** Removes `key` and reports whether it was present. Counts either way. */
  delete(key: string): boolean {
    this.requestCount += 1;
    return this.entries.delete(key);
  }

  /** Counts the call, then reads count and size together, so the result includes this call. */
  stats(): StoreStats {
    this.requestCount += 1;
    return { requests: this.requestCount, size: this.entries.size };
  }

  /** Same pair as {@link stats} without counting as a request. */
  sample(): StoreStats {
    return { requests: this.requestCount, size: this.entries.size };
  }
}
