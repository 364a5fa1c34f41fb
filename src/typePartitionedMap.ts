import { KeyNotFoundError, describeKey } from "./errors";
import { typeOfKey, type KeyType } from "./internal/map/keyType";

export { typeOfKey, type KeyType } from "./internal/map/keyType";

interface Slot<V> {
  value: V;
}

export type PartitionSource<K, V> =
  | Iterable<readonly [K, V]>
  | TypePartitionedMap<K, V>;

/**
 * A map that never compares keys of different runtime types.
 *
 * Entries live in one inner `Map` per key type, so `1`, `"1"` and `true`
 * (or two enum-like classes wrapping the same number) are distinct keys and
 * are never handed to the same equality check.
 *
 * `size` counts partitions, not entries. Use `count_entries()` for the
 * number of stored keys.
 */
export class TypePartitionedMap<K = unknown, V = unknown> implements Iterable<K> {
  private readonly partitions = new Map<KeyType, Map<K, Slot<V>>>();

  constructor(...sources: PartitionSource<K, V>[]) {
    this.update(...sources);
  }

  get size(): number {
    return this.partitions.size;
  }

  count_entries(): number {
    let count = 0;
    for (const partition of this.partitions.values()) {
      count += partition.size;
    }
    return count;
  }

  has(key: K): boolean {
    const partition = this.partitions.get(typeOfKey(key));
    return partition !== undefined && partition.has(key);
  }

  get(key: K): V {
    const slot = this.partitions.get(typeOfKey(key))?.get(key);
    if (!slot) {
      throw new KeyNotFoundError(key);
    }
    return slot.value;
  }

  get_or<D>(key: K, fallback: D): V | D {
    return this.has(key) ? this.get(key) : fallback;
  }

  set(key: K, value: V): this {
    const type = typeOfKey(key);
    let partition = this.partitions.get(type);
    if (!partition) {
      partition = new Map();
      this.partitions.set(type, partition);
    }
    partition.set(key, { value });
    return this;
  }

  set_default(key: K, fallback: V): V {
    if (!this.has(key)) {
      this.set(key, fallback);
      return fallback;
    }
    return this.get(key);
  }

  update(...sources: PartitionSource<K, V>[]): this {
    for (const source of sources) {
      const pairs = source instanceof TypePartitionedMap ? source.items() : source;
      for (const [key, value] of pairs) {
        this.set(key, value);
      }
    }
    return this;
  }

  delete(key: K): void {
    const type = typeOfKey(key);
    const partition = this.partitions.get(type);
    if (!partition || !partition.delete(key)) {
      throw new KeyNotFoundError(key);
    }
    if (partition.size === 0) {
      this.partitions.delete(type);
    }
  }

  pop(key: K): V;
  pop<D>(key: K, fallback: D): V | D;
  pop<D>(key: K, ...fallback: [D] | []): V | D {
    if (!this.has(key)) {
      if (fallback.length === 1) {
        return fallback[0];
      }
      throw new KeyNotFoundError(key);
    }
    const value = this.get(key);
    this.delete(key);
    return value;
  }

  clear(): void {
    this.partitions.clear();
  }

  keys(): K[] {
    return [...this];
  }

  values(): V[] {
    return this.items().map(([, value]) => value);
  }

  items(): [K, V][] {
    const items: [K, V][] = [];
    for (const partition of this.partitions.values()) {
      for (const [key, slot] of partition) {
        items.push([key, slot.value]);
      }
    }
    return items;
  }

  *[Symbol.iterator](): Iterator<K> {
    for (const partition of this.partitions.values()) {
      yield* partition.keys();
    }
  }

  toString(): string {
    const groups = [...this.partitions.values()].map((partition) => {
      const pairs = [...partition].map(
        ([key, slot]) => `${describeKey(key)}: ${describeKey(slot.value)}`
      );
      return `{${pairs.join(", ")}}`;
    });
    return `TypePartitionedMap(${groups.join(", ")})`;
  }
}
