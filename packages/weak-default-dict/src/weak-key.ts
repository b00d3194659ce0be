import {
  EntrySource,
  KeyMissingError,
  Ref,
  assertObjRef,
  entriesOf,
  makeRef,
  makeRegistry,
} from "@holdall/common";

import { DefaultFactory, reprEntries } from "./helpers";

interface Slot<K extends object, V> {
  // Handle on the key itself, which is also its place in the insertion order.
  ref: Ref<K>;
  value: V;
}

/**
 * A mapping from objects to values that does not keep its keys alive. Once a
 * key is reclaimed its entry disappears, along with the value stored under
 * it, and no later read can tell it was ever there.
 *
 * Given a default factory, lookup() fills in missing keys: the factory runs
 * once, its result is stored under the key and returned.
 */
export class WeakKeyDefaultDictionary<K extends object, V> implements Iterable<[K, V]> {
  constructor(
    private readonly factory: DefaultFactory<V> | null = null,
    entries?: EntrySource<K, V> | null,
    // For diagnostic purposes, or in cases where usage of WeakMap, WeakRef and
    // FinalizationRegistry is not desired, this usually-true parameter makes
    // the dictionary hold its keys strongly. Its logical behavior is the same
    // either way.
    private weakness = true,
  ) {
    if (entries) this.update(entries);
  }

  private slots: WeakMap<K, Slot<K, V>> = this.weakness ? new WeakMap : new Map;

  // Key handles in insertion order.
  private order = new Set<Ref<K>>();

  private registry = makeRegistry<Ref<K>>(
    this.weakness,
    ref => this.order.delete(ref),
  );

  public get defaultFactory(): DefaultFactory<V> | null {
    return this.factory;
  }

  public get size(): number {
    return this.prune().size;
  }

  public isEmpty(): boolean {
    return this.size === 0;
  }

  public has(key: K): boolean {
    return this.slots.has(key);
  }

  // Never consults the default factory.
  public get(key: K): V | undefined {
    return this.slots.get(key)?.value;
  }

  public lookup(key: K): V {
    const slot = this.slots.get(key);
    if (slot) return slot.value;
    if (!this.factory) {
      throw new KeyMissingError(key);
    }
    const value = this.factory();
    this.set(key, value);
    return value;
  }

  public set(key: K, value: V): this {
    assertObjRef(key);
    const slot = this.slots.get(key);
    if (slot) {
      slot.value = value;
    } else {
      const ref = makeRef(key, this.weakness);
      this.slots.set(key, { ref, value });
      this.order.add(ref);
      this.registry?.register(key, ref, ref);
    }
    return this;
  }

  public delete(key: K): boolean {
    const slot = this.slots.get(key);
    if (!slot) return false;
    this.slots.delete(key);
    this.order.delete(slot.ref);
    this.registry?.unregister(slot.ref);
    return true;
  }

  public pop(key: K): V;
  public pop<D>(key: K, fallback: D): V | D;
  public pop<D>(key: K, ...fallback: [] | [D]): V | D {
    const slot = this.slots.get(key);
    if (slot) {
      this.delete(key);
      return slot.value;
    }
    if (fallback.length === 1) {
      return fallback[0];
    }
    throw new KeyMissingError(key);
  }

  public clear(): void {
    this.order.forEach(ref => this.registry?.unregister(ref));
    this.order.clear();
    this.slots = this.weakness ? new WeakMap : new Map;
  }

  public update(source: EntrySource<K, V>): this {
    for (const [key, value] of entriesOf(source)) {
      this.set(key, value);
    }
    return this;
  }

  public *keys(): IterableIterator<K> {
    for (const ref of Array.from(this.prune())) {
      const key = ref.deref();
      if (key && this.slots.has(key)) yield key;
    }
  }

  public *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) yield value;
  }

  public *entries(): IterableIterator<[K, V]> {
    for (const key of this.keys()) {
      const slot = this.slots.get(key);
      if (slot) yield [key, slot.value];
    }
  }

  public [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  public forEach(callback: (value: V, key: K, dict: this) => void): void {
    for (const [key, value] of this.entries()) {
      callback(value, key, this);
    }
  }

  public copy(): WeakKeyDefaultDictionary<K, V> {
    return new WeakKeyDefaultDictionary(this.factory, this.entries(), this.weakness);
  }

  public toString(): string {
    return reprEntries(this, "WeakKeyDefaultDictionary", this.entries());
  }

  ///////////////////////////////////
  // Private API below this point. //
  ///////////////////////////////////

  // Forgets the handles of reclaimed keys and returns the ones left.
  private prune(): Set<Ref<K>> {
    this.order.forEach(ref => {
      if (!ref.deref()) this.order.delete(ref);
    });
    return this.order;
  }
}
