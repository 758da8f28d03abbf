/**
 * Mapping from collection to its buffer, populated on first use.
 *
 * `getOrCreate` runs the factory at most once per key: the lookup and
 * the insert happen in one synchronous turn, so concurrent callers on
 * the event loop cannot interleave between them. Entries are never
 * removed.
 */
export class BufferRegistry<V> {
  private readonly entries: Map<string, V> = new Map();

  getOrCreate(key: string, create: (key: string) => V): V {
    const existing = this.entries.get(key);
    if (existing !== undefined) return existing;

    const created = create(key);
    this.entries.set(key, created);
    return created;
  }

  /** Point-in-time copy; keys added afterwards are not included. */
  snapshot(): Array<[string, V]> {
    return [...this.entries.entries()];
  }

  get size(): number {
    return this.entries.size;
  }
}
