import {
  Comparator,
  ElementNotFoundError,
  IndexOutOfRangeError,
  OrderedSetIndexError,
  defaultCompare,
  recursiveRepr,
  repr,
} from "@holdall/common";

import {
  DeepCopier,
  DeepCopyable,
  deepCopy,
} from "@holdall/copy";

// Anything that can answer membership questions, report how many distinct
// members it has and enumerate them. Set and OrderedSet qualify directly;
// other iterables are collected into a Set first (see membershipOf below).
interface Membership<T> extends Iterable<T> {
  has(value: T): boolean;
  readonly size: number;
}

export interface SortOptions<R> {
  compare?: Comparator<R>;
  reverse?: boolean;
}

/**
 * A set that remembers insertion order, so that every element also has a
 * position. Uniqueness follows the same SameValueZero equality as the native
 * Set. Set comparisons (equals, isSubsetOf, ...) ignore positions entirely;
 * only iteration, indexing and slicing observe them.
 */
export class OrderedSet<T> implements Iterable<T>, DeepCopyable<OrderedSet<T>> {
  private items: T[] = [];
  private indices = new Map<T, number>();

  constructor(data?: Iterable<T> | null) {
    if (data) this.update(data);
  }

  public static from<T>(data: Iterable<T>): OrderedSet<T> {
    return new OrderedSet(data);
  }

  // Every method returning a new container builds it here, so subclasses
  // that override fromIterable get results of their own type.
  protected fromIterable(data: Iterable<T>): OrderedSet<T> {
    return new OrderedSet(data);
  }

  public get size(): number {
    return this.items.length;
  }

  public isEmpty(): boolean {
    return this.items.length === 0;
  }

  public has(value: T): boolean {
    return this.indices.has(value);
  }

  public count(value: T): number {
    return this.indices.has(value) ? 1 : 0;
  }

  public at(index: number): T {
    const position = this.resolveIndex(index);
    if (position < 0) {
      throw new IndexOutOfRangeError(index);
    }
    return this.items[position];
  }

  public slice(start?: number, end?: number): OrderedSet<T> {
    return this.fromIterable(this.items.slice(start, end));
  }

  /**
   * Returns the position of value, optionally requiring it to lie within the
   * window [start, end). Negative bounds count from the end.
   */
  public index(value: T, start?: number, end?: number): number {
    const position = this.indices.get(value);
    if (position === undefined) {
      throw new ElementNotFoundError(value, `${repr(value)} is not in the set`);
    }

    if (start !== undefined || end !== undefined) {
      const length = this.items.length;
      let lo = start ?? 0;
      if (lo < 0) lo = Math.max(length + lo, 0);
      let hi = end ?? length;
      if (hi < 0) hi += length;
      if (position < lo || position >= hi) {
        throw new ElementNotFoundError(value, `${repr(value)} is not in the set`);
      }
    }

    return position;
  }

  public add(value: T): this {
    if (!this.indices.has(value)) {
      this.indices.set(value, this.items.length);
      this.items.push(value);
    }
    return this;
  }

  public update(...iterables: Iterable<T>[]): this {
    iterables.forEach(iterable => {
      for (const value of iterable) this.add(value);
    });
    return this;
  }

  /**
   * Removes value if present, returning whether anything was removed.
   */
  public discard(value: T): boolean {
    const position = this.indices.get(value);
    if (position === undefined) return false;
    this.removeAt(position);
    return true;
  }

  public remove(value: T): void {
    if (!this.discard(value)) {
      throw new OrderedSetIndexError(value, repr(value));
    }
  }

  public pop(index = -1): T {
    if (this.items.length === 0) {
      throw new OrderedSetIndexError(index, "pop from an empty set");
    }
    const position = this.resolveIndex(index);
    if (position < 0) {
      throw new OrderedSetIndexError(index, "pop index out of range");
    }
    return this.removeAt(position);
  }

  public deleteAt(index: number): void {
    this.pop(index);
  }

  public clear(): void {
    this.items = [];
    this.indices.clear();
  }

  public reverse(): this {
    this.items.reverse();
    this.reindex();
    return this;
  }

  /**
   * Sorts in place. The sort is stable, and so is `reverse: true`: elements
   * that compare equal keep their current relative order either way.
   */
  public sort(options: SortOptions<T> = {}): this {
    return this.sortRanked(value => value, options);
  }

  /**
   * Sorts in place by a key computed once per element.
   */
  public sortBy<R>(key: (value: T) => R, options: SortOptions<R> = {}): this {
    return this.sortRanked(key, options);
  }

  public isDisjointFrom(other: Iterable<T>): boolean {
    for (const value of other) {
      if (this.indices.has(value)) return false;
    }
    return true;
  }

  public equals(other: Iterable<T>): boolean {
    if (other === this) return true;
    const members = membershipOf(other);
    return members.size === this.size && this.items.every(item => members.has(item));
  }

  public isSubsetOf(other: Iterable<T>): boolean {
    const members = membershipOf(other);
    // Fast check for obvious cases.
    if (this.size > members.size) return false;
    return this.items.every(item => members.has(item));
  }

  public isProperSubsetOf(other: Iterable<T>): boolean {
    const members = membershipOf(other);
    return this.size < members.size && this.items.every(item => members.has(item));
  }

  public isSupersetOf(other: Iterable<T>): boolean {
    const members = membershipOf(other);
    if (this.size < members.size) return false;
    return this.hasAll(members);
  }

  public isProperSupersetOf(other: Iterable<T>): boolean {
    const members = membershipOf(other);
    return this.size > members.size && this.hasAll(members);
  }

  /**
   * Every element of this set followed by the new elements of each argument,
   * in the order they are first seen.
   */
  public union(...others: Iterable<T>[]): OrderedSet<T> {
    return this.fromIterable(this).update(...others);
  }

  /**
   * The elements common to this set and every argument, in this set's order.
   */
  public intersection(...others: Iterable<T>[]): OrderedSet<T> {
    const memberships = others.map(membershipOf);
    return this.fromIterable(this.items.filter(
      item => memberships.every(members => members.has(item)),
    ));
  }

  public intersectionUpdate(...others: Iterable<T>[]): this {
    if (others.length > 0) {
      const memberships = others.map(membershipOf);
      this.replaceItems(this.items.filter(
        item => memberships.every(members => members.has(item)),
      ));
    }
    return this;
  }

  /**
   * The elements of this set found in none of the arguments, in this set's
   * order.
   */
  public difference(...others: Iterable<T>[]): OrderedSet<T> {
    const memberships = others.map(membershipOf);
    return this.fromIterable(this.items.filter(
      item => !memberships.some(members => members.has(item)),
    ));
  }

  public differenceUpdate(...others: Iterable<T>[]): this {
    if (others.length > 0) {
      const memberships = others.map(membershipOf);
      this.replaceItems(this.items.filter(
        item => !memberships.some(members => members.has(item)),
      ));
    }
    return this;
  }

  /**
   * The elements found in exactly one of this set and other: first those of
   * this set, in its order, then those of other, in its order.
   */
  public symmetricDifference(other: Iterable<T>): OrderedSet<T> {
    const members = membershipOf(other);
    const result = this.fromIterable(this.items.filter(item => !members.has(item)));
    // Walk members rather than other, which may only be iterable once.
    for (const value of members) {
      if (!this.indices.has(value)) result.add(value);
    }
    return result;
  }

  public symmetricDifferenceUpdate(other: Iterable<T>): this {
    const members = membershipOf(other);
    const added: T[] = [];
    for (const value of members) {
      if (!this.indices.has(value)) added.push(value);
    }
    this.replaceItems(this.items.filter(item => !members.has(item)).concat(added));
    return this;
  }

  public copy(): OrderedSet<T> {
    return this.fromIterable(this.items);
  }

  public [deepCopy](copier: DeepCopier): OrderedSet<T> {
    const clone = copier.remember(this, this.fromIterable([]));
    this.items.forEach(item => clone.add(copier.copy(item)));
    return clone;
  }

  public [Symbol.iterator](): IterableIterator<T> {
    return this.items[Symbol.iterator]();
  }

  public values(): IterableIterator<T> {
    return this.items.values();
  }

  public *reversed(): IterableIterator<T> {
    const { items } = this;
    for (let i = items.length - 1; i >= 0; --i) {
      yield items[i];
    }
  }

  public forEach(callback: (value: T, index: number, set: this) => void): void {
    this.items.forEach((value, index) => callback(value, index, this));
  }

  public toArray(): T[] {
    return this.items.slice();
  }

  public toString(): string {
    const name = this.constructor.name;
    return recursiveRepr(this, () => this.items.length
      ? `${name}([${this.items.map(repr).join(", ")}])`
      : `${name}()`);
  }

  ///////////////////////////////////
  // Private API below this point. //
  ///////////////////////////////////

  // Turns a possibly negative index into a position within items, or -1 if
  // the index falls outside the set.
  private resolveIndex(index: number): number {
    if (!Number.isInteger(index)) {
      throw new TypeError(`indices must be integers, not ${repr(index)}`);
    }
    const length = this.items.length;
    const position = index < 0 ? index + length : index;
    return position >= 0 && position < length ? position : -1;
  }

  private hasAll(members: Iterable<T>): boolean {
    for (const value of members) {
      if (!this.indices.has(value)) return false;
    }
    return true;
  }

  private removeAt(position: number): T {
    const { items, indices } = this;
    const [item] = items.splice(position, 1);
    indices.delete(item);
    for (let i = position; i < items.length; ++i) {
      indices.set(items[i], i);
    }
    return item;
  }

  private reindex(): void {
    const { indices } = this;
    indices.clear();
    this.items.forEach((item, i) => indices.set(item, i));
  }

  private replaceItems(items: readonly T[]): void {
    // Callers compute items from the current contents, so they have already
    // been fully read by the time we clear them here.
    this.clear();
    items.forEach(item => this.add(item));
  }

  private sortRanked<R>(rank: (value: T) => R, options: SortOptions<R>): this {
    const { compare = defaultCompare, reverse = false } = options;
    // Rank every element once up front, rather than once per comparison.
    const ranked = this.items.map(item => ({ item, rank: rank(item) }));
    ranked.sort(reverse
      ? (a, b) => compare(b.rank, a.rank)
      : (a, b) => compare(a.rank, b.rank));
    this.items = ranked.map(({ item }) => item);
    this.reindex();
    return this;
  }
}

function membershipOf<T>(other: Iterable<T>): Membership<T> {
  if (other instanceof OrderedSet || other instanceof Set) {
    return other;
  }
  return new Set(other);
}
