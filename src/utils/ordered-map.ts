/**
 * Insertion-ordered mapping with unique keys.
 *
 * Entries live in a dense sequence; a separate key index gives O(1) lookup and the
 * uniqueness check. Iteration follows the sequence, never the key index, so the order
 * is the order of first insertion regardless of how keys compare.
 */
export class OrderedMap<K, V> implements Iterable<[K, V]> {
  private readonly items: [K, V][] = [];
  private readonly positions = new Map<K, number>();

  get size(): number {
    return this.items.length;
  }

  has(key: K): boolean {
    return this.positions.has(key);
  }

  get(key: K): V | undefined {
    const position = this.positions.get(key);
    return position === undefined ? undefined : this.items[position][1];
  }

  /** Position of the key in insertion order, or -1. */
  indexOf(key: K): number {
    return this.positions.get(key) ?? -1;
  }

  /** Key/value pair at a position, or undefined when out of range. */
  at(index: number): readonly [K, V] | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      return undefined;
    }
    return this.items[index];
  }

  /**
   * Appends a new key. Existing keys are left untouched.
   * @returns false when the key is already present
   */
  insert(key: K, value: V): boolean {
    if (this.positions.has(key)) {
      return false;
    }
    this.positions.set(key, this.items.length);
    this.items.push([key, value]);
    return true;
  }

  /**
   * Replaces the value of an existing key in place, or appends a new key.
   */
  set(key: K, value: V): this {
    const position = this.positions.get(key);
    if (position === undefined) {
      this.insert(key, value);
    } else {
      this.items[position] = [key, value];
    }
    return this;
  }

  /**
   * Removes a key and closes the gap; later entries keep their relative order.
   */
  delete(key: K): boolean {
    const position = this.positions.get(key);
    if (position === undefined) {
      return false;
    }
    this.items.splice(position, 1);
    this.positions.delete(key);
    for (let i = position; i < this.items.length; i += 1) {
      this.positions.set(this.items[i][0], i);
    }
    return true;
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.items) {
      yield key;
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.items) {
      yield value;
    }
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, value] of this.items) {
      yield [key, value];
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
}
