import {
  Comparator,
  EntrySource,
  KeyMissingError,
  MapLike,
  MutableMapLike,
  bisectLeft,
  bisectRight,
  defaultCompare,
  entriesOf,
  getPresent,
  recursiveRepr,
  repr,
} from "@holdall/common";

import { equal } from "@wry/equality";

import {
  DeepCopier,
  DeepCopyable,
  deepCopy,
} from "@holdall/copy";

import {
  SortedDictItemsView,
  SortedDictKeysView,
  SortedDictValuesView,
} from "./views";

/**
 * A mapping whose keys are always kept in ascending order by its comparator.
 * Iteration, forEach and every view follow that order, and reversed() walks
 * it backwards.
 *
 * Identity of keys follows Map (SameValueZero); the comparator only decides
 * their position. New keys are placed by binary search, so a key that cannot
 * be ordered against the existing ones fails at insertion time, leaving the
 * dictionary untouched.
 */
export class SortedDict<K, V>
  implements MutableMapLike<K, V>, Iterable<[K, V]>, DeepCopyable<SortedDict<K, V>> {

  private map = new Map<K, V>();
  private order: K[] = [];

  constructor(
    entries?: EntrySource<K, V> | null,
    public readonly compare: Comparator<K> = defaultCompare,
  ) {
    if (entries) this.update(entries);
  }

  /**
   * Builds a dictionary mapping every key to the same value, sorting the
   * keys once rather than placing them one at a time.
   */
  public static fromKeys<K>(keys: Iterable<K>): SortedDict<K, undefined>;
  public static fromKeys<K, V>(keys: Iterable<K>, value: V, compare?: Comparator<K>): SortedDict<K, V>;
  public static fromKeys<K, V>(
    keys: Iterable<K>,
    value?: V,
    compare?: Comparator<K>,
  ): SortedDict<K, V | undefined> {
    return new SortedDict(
      Array.from(keys, (key): [K, V | undefined] => [key, value]),
      compare,
    );
  }

  public static fromObject<V>(
    record: Record<string, V>,
    compare?: Comparator<string>,
  ): SortedDict<string, V> {
    return new SortedDict(Object.entries(record), compare);
  }

  public get size(): number {
    return this.order.length;
  }

  public isEmpty(): boolean {
    return this.order.length === 0;
  }

  public has(key: K): boolean {
    return this.map.has(key);
  }

  public get(key: K): V | undefined {
    return this.map.get(key);
  }

  public lookup(key: K): V {
    if (!this.map.has(key)) {
      throw new KeyMissingError(key);
    }
    return getPresent(this.map, key);
  }

  public set(key: K, value: V): this {
    if (!this.map.has(key)) {
      // Throws before anything is stored if key has no place in the order.
      this.assertOrderable(key);
      const position = bisectRight(this.order, key, this.compare);
      this.order.splice(position, 0, key);
    }
    this.map.set(key, value);
    return this;
  }

  public delete(key: K): boolean {
    if (!this.map.has(key)) return false;
    this.order.splice(this.positionOf(key), 1);
    this.map.delete(key);
    return true;
  }

  public clear(): void {
    this.map.clear();
    this.order = [];
  }

  public pop(key: K): V;
  public pop<D>(key: K, fallback: D): V | D;
  public pop<D>(key: K, ...fallback: [] | [D]): V | D {
    if (this.map.has(key)) {
      const value = getPresent(this.map, key);
      this.delete(key);
      return value;
    }
    if (fallback.length === 1) {
      return fallback[0];
    }
    throw new KeyMissingError(key);
  }

  /**
   * Removes and returns the entry with the largest key.
   */
  public popItem(): [K, V] {
    const last = this.order.length - 1;
    if (last < 0) {
      throw new KeyMissingError(undefined, "popItem(): dictionary is empty");
    }
    const key = this.order[last];
    const value = getPresent(this.map, key);
    this.order.length = last;
    this.map.delete(key);
    return [key, value];
  }

  public setDefault(key: K, value: V): V {
    if (this.map.has(key)) {
      return getPresent(this.map, key);
    }
    this.set(key, value);
    return value;
  }

  /**
   * Stores every entry of source. Either all of them are stored or, when
   * some key cannot be ordered, none are.
   */
  public update(source: EntrySource<K, V>): this {
    const payload = new Map(this.map);
    const added: K[] = [];
    for (const [key, value] of entriesOf(source)) {
      if (!payload.has(key)) {
        this.assertOrderable(key);
        added.push(key);
      }
      payload.set(key, value);
    }
    const order = this.order.concat(added).sort(this.compare);
    this.map = payload;
    this.order = order;
    return this;
  }

  /**
   * A new dictionary holding the entries of this one followed by those of
   * other, so other's values win for keys both hold.
   */
  public merge(other: EntrySource<K, V>): SortedDict<K, V> {
    return this.copy().update(other);
  }

  public keys(): SortedDictKeysView<K, V> {
    return new SortedDictKeysView(this);
  }

  public values(): SortedDictValuesView<K, V> {
    return new SortedDictValuesView(this);
  }

  public entries(): SortedDictItemsView<K, V> {
    return new SortedDictItemsView(this);
  }

  public items(): SortedDictItemsView<K, V> {
    return this.entries();
  }

  public *[Symbol.iterator](): IterableIterator<[K, V]> {
    // Walking a snapshot of the order lets callers delete as they go.
    for (const key of this.order.slice()) {
      if (this.map.has(key)) {
        yield [key, getPresent(this.map, key)];
      }
    }
  }

  public *reversed(): IterableIterator<[K, V]> {
    const keys = this.order.slice();
    for (let i = keys.length - 1; i >= 0; --i) {
      const key = keys[i];
      if (this.map.has(key)) {
        yield [key, getPresent(this.map, key)];
      }
    }
  }

  public forEach(callback: (value: V, key: K, dict: this) => void): void {
    for (const [key, value] of this) {
      callback(value, key, this);
    }
  }

  public equals(other: MapLike<K, V>): boolean {
    if (other === this) return true;
    let count = 0;
    for (const key of other.keys()) {
      if (!this.map.has(key) || !equal(this.map.get(key), other.get(key))) {
        return false;
      }
      ++count;
    }
    return count === this.size;
  }

  public copy(): SortedDict<K, V> {
    const clone = new SortedDict<K, V>(null, this.compare);
    clone.map = new Map(this.map);
    clone.order = this.order.slice();
    return clone;
  }

  public [deepCopy](copier: DeepCopier): SortedDict<K, V> {
    const clone = copier.remember(this, new SortedDict<K, V>(null, this.compare));
    // Copies of keys sort the way their originals do, so the order can be
    // carried over as it is.
    this.order.forEach(key => {
      const keyCopy = copier.copy(key);
      clone.order.push(keyCopy);
      clone.map.set(keyCopy, copier.copy(getPresent(this.map, key)));
    });
    return clone;
  }

  public toString(): string {
    return recursiveRepr(this, () => {
      const entries: string[] = [];
      this.forEach((value, key) => entries.push(`${repr(key)}: ${repr(value)}`));
      return `${this.constructor.name}({${entries.join(", ")}})`;
    });
  }

  ///////////////////////////////////
  // Private API below this point. //
  ///////////////////////////////////

  // A lone key is never compared against anything else, so it has to be
  // checked against itself before it can be stored.
  private assertOrderable(key: K): void {
    this.compare(key, key);
  }

  // Finds key in this.order. Keys that compare equal to it without being it
  // sit next to it, so the scan starts at the first of those.
  private positionOf(key: K): number {
    const { order } = this;
    for (let i = bisectLeft(order, key, this.compare); i < order.length; ++i) {
      if (sameValueZero(order[i], key)) return i;
      if (this.compare(order[i], key) !== 0) break;
    }
    // Only a comparator inconsistent with itself ends up here.
    return order.findIndex(candidate => sameValueZero(candidate, key));
  }
}

function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}
