/**
 * Read access to an insertion-ordered string-keyed map
 */
export interface ReadonlyOrderedMap<V> extends Iterable<[string, V]> {
  readonly size: number;
  get(key: string): V | undefined;
  has(key: string): boolean;
  /** Position of a key in insertion order, or -1 */
  indexOf(key: string): number;
  keys(): IterableIterator<string>;
  values(): IterableIterator<V>;
  entries(): IterableIterator<[string, V]>;
}

/**
 * String-keyed map whose iteration order is the order keys were first
 * inserted. Keys and values live in parallel arrays; a hash index maps each
 * key to its slot.
 */
export class OrderedMap<V> implements ReadonlyOrderedMap<V> {
  private readonly keyList: string[] = [];
  private readonly valueList: V[] = [];
  private readonly index = new Map<string, number>();

  constructor(entries?: Iterable<readonly [string, V]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.keyList.length;
  }

  get(key: string): V | undefined {
    const slot = this.index.get(key);
    return slot === undefined ? undefined : this.valueList[slot];
  }

  has(key: string): boolean {
    return this.index.has(key);
  }

  indexOf(key: string): number {
    return this.index.get(key) ?? -1;
  }

  /**
   * Append a new key, or replace the value of an existing key in place.
   * An existing key keeps its original position.
   */
  set(key: string, value: V): this {
    const slot = this.index.get(key);
    if (slot === undefined) {
      this.index.set(key, this.keyList.length);
      this.keyList.push(key);
      this.valueList.push(value);
    } else {
      this.valueList[slot] = value;
    }
    return this;
  }

  *keys(): IterableIterator<string> {
    yield* this.keyList;
  }

  *values(): IterableIterator<V> {
    yield* this.valueList;
  }

  *entries(): IterableIterator<[string, V]> {
    for (let i = 0; i < this.keyList.length; i++) {
      yield [this.keyList[i], this.valueList[i]];
    }
  }

  [Symbol.iterator](): IterableIterator<[string, V]> {
    return this.entries();
  }
}
