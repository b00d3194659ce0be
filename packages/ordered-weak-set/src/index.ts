import {
  ElementNotFoundError,
  IndexOutOfRangeError,
  KeyMissingError,
  Ref,
  assertObjRef,
  makeRef,
  makeRegistry,
  recursiveRepr,
  repr,
} from "@holdall/common";

import {
  DeepCopier,
  DeepCopyable,
  deepCopy,
} from "@holdall/copy";

import { OrderedSet } from "@holdall/ordered-set";

/**
 * An insertion-ordered set of objects that does not keep its elements alive.
 * Once an element is reclaimed it silently drops out: no read ever observes
 * it again, and the surviving elements keep their relative order.
 *
 * Dead entries are pruned eagerly, at the start of every operation that
 * reports a size or a position or that iterates. Where FinalizationRegistry
 * is available, dead entries are also removed in the background.
 */
export class OrderedWeakSet<T extends object> implements Iterable<T>, DeepCopyable<OrderedWeakSet<T>> {
  constructor(
    data?: Iterable<T> | null,
    // For diagnostic purposes, or in cases where usage of WeakRef and
    // FinalizationRegistry is not desired, this usually-true parameter makes
    // the set hold its elements strongly. The logical behavior of the set is
    // the same either way.
    private weakness = true,
  ) {
    if (data) this.update(data);
  }

  // The order of elements lives here, as one handle per element.
  private refs = new OrderedSet<Ref<T>>();

  // Finds the handle of a live element. Entries vanish together with their
  // element, so this never answers for anything reclaimed.
  private known: WeakMap<T, Ref<T>> = this.weakness ? new WeakMap : new Map;

  private registry = makeRegistry<Ref<T>>(
    this.weakness,
    ref => this.refs.discard(ref),
  );

  public get size(): number {
    return this.prune().size;
  }

  public isEmpty(): boolean {
    return this.size === 0;
  }

  public has(value: T): boolean {
    return this.known.has(value);
  }

  public count(value: T): number {
    return this.has(value) ? 1 : 0;
  }

  public add(value: T): this {
    assertObjRef(value);
    if (!this.known.has(value)) {
      const ref = makeRef(value, this.weakness);
      this.known.set(value, ref);
      this.refs.add(ref);
      this.registry?.register(value, ref, ref);
    }
    return this;
  }

  public update(...iterables: Iterable<T>[]): this {
    iterables.forEach(iterable => {
      for (const value of iterable) this.add(value);
    });
    return this;
  }

  public discard(value: T): boolean {
    const ref = this.known.get(value);
    if (!ref) return false;
    this.known.delete(value);
    this.refs.discard(ref);
    this.registry?.unregister(ref);
    return true;
  }

  public remove(value: T): void {
    if (!this.discard(value)) {
      throw new KeyMissingError(value);
    }
  }

  public at(index: number): T {
    const value = this.prune().at(index).deref();
    // Pruning just dereferenced every survivor, which keeps each of them
    // alive until the current job ends.
    if (!value) throw new IndexOutOfRangeError(index);
    return value;
  }

  public pop(index = -1): T {
    if (this.isEmpty()) {
      throw new IndexOutOfRangeError(index, "pop from an empty set");
    }
    const value = this.at(index);
    this.discard(value);
    return value;
  }

  public deleteAt(index: number): void {
    this.pop(index);
  }

  public index(value: T, start?: number, end?: number): number {
    const ref = this.known.get(value);
    if (ref) {
      try {
        return this.prune().index(ref, start, end);
      } catch (error) {
        // Report the element rather than its handle.
        if (!(error instanceof ElementNotFoundError)) throw error;
      }
    }
    throw new ElementNotFoundError(value, `${repr(value)} is not in the set`);
  }

  public slice(start?: number, end?: number): OrderedWeakSet<T> {
    return new OrderedWeakSet(this.toArray().slice(start, end), this.weakness);
  }

  public clear(): void {
    this.refs.forEach(ref => this.registry?.unregister(ref));
    this.refs.clear();
    this.known = this.weakness ? new WeakMap : new Map;
  }

  public [Symbol.iterator](): IterableIterator<T> {
    return this.toArray()[Symbol.iterator]();
  }

  public values(): IterableIterator<T> {
    return this[Symbol.iterator]();
  }

  public *reversed(): IterableIterator<T> {
    const values = this.toArray();
    for (let i = values.length - 1; i >= 0; --i) {
      yield values[i];
    }
  }

  public forEach(callback: (value: T, index: number, set: this) => void): void {
    this.toArray().forEach((value, index) => callback(value, index, this));
  }

  // A strong snapshot of the live elements, in order. Callers should not hold
  // on to it for longer than they need it.
  public toArray(): T[] {
    const values: T[] = [];
    this.prune().forEach(ref => {
      const value = ref.deref();
      if (value) values.push(value);
    });
    return values;
  }

  public union(...others: Iterable<T>[]): OrderedWeakSet<T> {
    return this.copy().update(...others);
  }

  public intersection(...others: Iterable<T>[]): OrderedWeakSet<T> {
    const memberships = others.map(other => new Set(other));
    return this.filter(value => memberships.every(members => members.has(value)));
  }

  public difference(...others: Iterable<T>[]): OrderedWeakSet<T> {
    const memberships = others.map(other => new Set(other));
    return this.filter(value => !memberships.some(members => members.has(value)));
  }

  public symmetricDifference(other: Iterable<T>): OrderedWeakSet<T> {
    const members = new Set(other);
    const result = this.filter(value => !members.has(value));
    members.forEach(value => {
      if (!this.has(value)) result.add(value);
    });
    return result;
  }

  public isDisjointFrom(other: Iterable<T>): boolean {
    for (const value of other) {
      if (this.has(value)) return false;
    }
    return true;
  }

  public equals(other: Iterable<T>): boolean {
    if (other === this) return true;
    const members = new Set(other);
    const values = this.toArray();
    return values.length === members.size && values.every(value => members.has(value));
  }

  public isSubsetOf(other: Iterable<T>): boolean {
    const members = new Set(other);
    return this.toArray().every(value => members.has(value));
  }

  public isSupersetOf(other: Iterable<T>): boolean {
    for (const value of other) {
      if (!this.has(value)) return false;
    }
    return true;
  }

  public copy(): OrderedWeakSet<T> {
    return new OrderedWeakSet(this.toArray(), this.weakness);
  }

  // The elements are owned elsewhere, so even a deep copy shares them.
  public [deepCopy](copier: DeepCopier): OrderedWeakSet<T> {
    return copier.remember(this, this.copy());
  }

  public toString(): string {
    return recursiveRepr(this, () => {
      const values = this.toArray();
      return values.length
        ? `OrderedWeakSet([${values.map(repr).join(", ")}])`
        : "OrderedWeakSet()";
    });
  }

  ///////////////////////////////////
  // Private API below this point. //
  ///////////////////////////////////

  private filter(test: (value: T) => boolean): OrderedWeakSet<T> {
    return new OrderedWeakSet(this.toArray().filter(test), this.weakness);
  }

  // Drops the handles of reclaimed elements, keeping the survivors in order,
  // and returns the handles that remain.
  private prune(): OrderedSet<Ref<T>> {
    const dead: Ref<T>[] = [];
    this.refs.forEach(ref => {
      if (!ref.deref()) dead.push(ref);
    });
    if (dead.length > 0) {
      this.refs.differenceUpdate(dead);
    }
    return this.refs;
  }
}
