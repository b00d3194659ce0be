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

interface Reclaimable<K, V extends object> {
  key: K;
  ref: Ref<V>;
}

/**
 * A mapping whose values are objects it does not keep alive. Once a value
 * is reclaimed, the entry holding it disappears.
 *
 * Given a default factory, lookup() fills in missing keys: the factory runs
 * once, its result is stored under the key and returned. The dictionary does
 * not own what the factory makes, so callers must hold on to it themselves
 * for the entry to last.
 */
export class WeakValueDefaultDictionary<K, V extends object> implements Iterable<[K, V]> {
  constructor(
    private readonly factory: DefaultFactory<V> | null = null,
    entries?: EntrySource<K, V> | null,
    // See the parameter of the same name in WeakKeyDefaultDictionary.
    private weakness = true,
  ) {
    if (entries) this.update(entries);
  }

  private slots = new Map<K, Ref<V>>();

  // A key may have been given a new value by the time the old one is
  // reclaimed, so the entry only goes if it still holds the reclaimed handle.
  private registry = makeRegistry<Reclaimable<K, V>>(
    this.weakness,
    ({ key, ref }) => {
      if (this.slots.get(key) === ref) {
        this.slots.delete(key);
      }
    },
  );

  public get defaultFactory(): DefaultFactory<V> | null {
    return this.factory;
  }

  public get size(): number {
    this.prune();
    return this.slots.size;
  }

  public isEmpty(): boolean {
    return this.size === 0;
  }

  public has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  // Never consults the default factory.
  public get(key: K): V | undefined {
    const ref = this.slots.get(key);
    if (!ref) return undefined;
    const value = ref.deref();
    if (!value) this.forget(key, ref);
    return value;
  }

  public lookup(key: K): V {
    const existing = this.get(key);
    if (existing) return existing;
    if (!this.factory) {
      throw new KeyMissingError(key);
    }
    const value = this.factory();
    this.set(key, value);
    return value;
  }

  public set(key: K, value: V): this {
    assertObjRef(value);
    const previous = this.slots.get(key);
    if (previous) this.registry?.unregister(previous);
    const ref = makeRef(value, this.weakness);
    this.slots.set(key, ref);
    this.registry?.register(value, { key, ref }, ref);
    return this;
  }

  /**
   * Removes the entry for key, returning whether it held a live value.
   */
  public delete(key: K): boolean {
    const ref = this.slots.get(key);
    if (!ref) return false;
    this.forget(key, ref);
    return ref.deref() !== undefined;
  }

  public pop(key: K): V;
  public pop<D>(key: K, fallback: D): V | D;
  public pop<D>(key: K, ...fallback: [] | [D]): V | D {
    const value = this.get(key);
    if (value) {
      this.delete(key);
      return value;
    }
    if (fallback.length === 1) {
      return fallback[0];
    }
    throw new KeyMissingError(key);
  }

  public clear(): void {
    this.slots.forEach(ref => this.registry?.unregister(ref));
    this.slots.clear();
  }

  public update(source: EntrySource<K, V>): this {
    for (const [key, value] of entriesOf(source)) {
      this.set(key, value);
    }
    return this;
  }

  public *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) yield key;
  }

  public *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) yield value;
  }

  public *entries(): IterableIterator<[K, V]> {
    this.prune();
    for (const [key, ref] of Array.from(this.slots)) {
      const value = ref.deref();
      if (value && this.slots.get(key) === ref) yield [key, value];
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

  public copy(): WeakValueDefaultDictionary<K, V> {
    return new WeakValueDefaultDictionary(this.factory, this.entries(), this.weakness);
  }

  public toString(): string {
    return reprEntries(this, "WeakValueDefaultDictionary", this.entries());
  }

  ///////////////////////////////////
  // Private API below this point. //
  ///////////////////////////////////

  private forget(key: K, ref: Ref<V>): void {
    this.slots.delete(key);
    this.registry?.unregister(ref);
  }

  private prune(): void {
    this.slots.forEach((ref, key) => {
      if (!ref.deref()) this.forget(key, ref);
    });
  }
}
