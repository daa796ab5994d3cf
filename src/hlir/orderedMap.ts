/**
 * Read-only, insertion-ordered key to entry container.
 *
 * Iteration order is the order in which the snapshot declared the entries,
 * which every analysis relies on for deterministic output.
 */
export class OrderedMap<V> implements Iterable<[string, V]> {
  private readonly entries: Map<string, V>;

  constructor(entries: Iterable<[string, V]> = []) {
    this.entries = new Map();
    for (const [key, value] of entries) {
      if (this.entries.has(key)) {
        throw new Error(`Duplicate entry "${key}"`);
      }
      this.entries.set(key, value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  require(key: string, what = 'entry'): V {
    const value = this.entries.get(key);
    if (value === undefined) {
      throw new Error(`Unknown ${what} "${key}"`);
    }
    return value;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  values(): V[] {
    return Array.from(this.entries.values());
  }

  [Symbol.iterator](): Iterator<[string, V]> {
    return this.entries.entries();
  }
}
