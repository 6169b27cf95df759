/**
 * Result types returned by prefix queries.
 *
 * A query emits one `ResultEntry` per stored value, labelled with the key it
 * was found under, and gathers them into a `ResultCollection` in emission order.
 */

// ─── ResultEntry ────────────────────────────────────────────────────

export class ResultEntry<V> {
  readonly value: V;
  /** The key that produced this value. Can be relabelled after construction. */
  key: string | undefined;

  constructor(value: V, key?: string) {
    this.value = value;
    this.key = key;
  }
}

// ─── ResultCollection ───────────────────────────────────────────────

export class ResultCollection<V> implements Iterable<ResultEntry<V>> {
  private entries: ResultEntry<V>[] = [];

  /** Append one entry. */
  add(entry: ResultEntry<V>): void {
    this.entries.push(entry);
  }

  /** Append every entry of `other`, keeping its order. No deduplication. */
  merge(other: ResultCollection<V>): void {
    // Snapshot first: `other` may be this collection
    for (const entry of other.toArray()) this.entries.push(entry);
  }

  get size(): number {
    return this.entries.length;
  }

  toArray(): ResultEntry<V>[] {
    return [...this.entries];
  }

  keys(): Array<string | undefined> {
    return this.entries.map((e) => e.key);
  }

  values(): V[] {
    return this.entries.map((e) => e.value);
  }

  [Symbol.iterator](): Iterator<ResultEntry<V>> {
    return this.entries[Symbol.iterator]();
  }
}
