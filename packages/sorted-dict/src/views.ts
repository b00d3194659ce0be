import { equal } from "@wry/equality";
import { recursiveRepr, repr } from "@holdall/common";
import type { SortedDict } from "./dict";

// Views hold no state of their own beyond the dictionary they look at, so
// they always reflect its current contents and order.
abstract class SortedDictView<K, V, T> implements Iterable<T> {
  constructor(protected readonly dict: SortedDict<K, V>) {}

  public get size(): number {
    return this.dict.size;
  }

  public abstract has(item: T): boolean;

  protected abstract project(key: K, value: V): T;

  public *[Symbol.iterator](): IterableIterator<T> {
    for (const [key, value] of this.dict) {
      yield this.project(key, value);
    }
  }

  public *reversed(): IterableIterator<T> {
    for (const [key, value] of this.dict.reversed()) {
      yield this.project(key, value);
    }
  }

  public toArray(): T[] {
    return Array.from(this);
  }

  public toString(): string {
    return recursiveRepr(this, () =>
      `${this.constructor.name}([${this.toArray().map(repr).join(", ")}])`);
  }
}

export class SortedDictKeysView<K, V> extends SortedDictView<K, V, K> {
  public has(key: K): boolean {
    return this.dict.has(key);
  }

  protected project(key: K): K {
    return key;
  }
}

export class SortedDictValuesView<K, V> extends SortedDictView<K, V, V> {
  public has(value: V): boolean {
    for (const [, candidate] of this.dict) {
      if (equal(candidate, value)) return true;
    }
    return false;
  }

  protected project(_key: K, value: V): V {
    return value;
  }
}

export class SortedDictItemsView<K, V> extends SortedDictView<K, V, [K, V]> {
  public has([key, value]: readonly [K, V]): boolean {
    return this.dict.has(key) && equal(this.dict.get(key), value);
  }

  protected project(key: K, value: V): [K, V] {
    return [key, value];
  }
}
