import {
  EntrySource,
  KeyMissingError,
  MapLike,
  entriesOf,
  getPresent,
  hasLookup,
  isKeyError,
  isMutableMapLike,
  recursiveRepr,
  repr,
} from "@holdall/common";

import { equal } from "@wry/equality";

/**
 * Decides what lookup() does for a key no layer holds: return a value to
 * stand in for it, or throw.
 */
export type MissingHook<K, V> = (key: K) => V;

function throwMissing(key: unknown): never {
  throw new KeyMissingError(key);
}

/**
 * A read-only view over an ordered list of mappings (layers) owned by
 * someone else. Lookups scan the layers in order and the first one holding
 * the key wins, so earlier layers shadow later ones.
 *
 * The proxy never copies or mutates its layers: changes their owners make
 * are visible through every proxy that includes them, immediately.
 */
export class ChainMapProxy<K, V> implements MapLike<K, V>, Iterable<[K, V]> {
  public readonly layers: readonly MapLike<K, V>[];

  constructor(
    layers?: Iterable<MapLike<K, V>> | null,
    private readonly missing: MissingHook<K, V> = throwMissing,
  ) {
    const list = layers ? Array.from(layers) : [];
    // There is always at least one layer.
    this.layers = list.length > 0 ? list : [new Map<K, V>()];
  }

  public static of<K, V>(...layers: MapLike<K, V>[]): ChainMapProxy<K, V> {
    return new ChainMapProxy(layers);
  }

  /**
   * A proxy over a single new Map holding every key with the same value.
   */
  public static fromKeys<K>(keys: Iterable<K>): ChainMapProxy<K, undefined>;
  public static fromKeys<K, V>(keys: Iterable<K>, value: V): ChainMapProxy<K, V>;
  public static fromKeys<K, V>(keys: Iterable<K>, value?: V): ChainMapProxy<K, V | undefined> {
    const layer = new Map<K, V | undefined>();
    for (const key of keys) layer.set(key, value);
    return new ChainMapProxy([layer]);
  }

  /**
   * Returns the value of the first layer holding key, or whatever the
   * missing hook makes of it when none does.
   *
   * Layers with a lookup method are read through it, so a layer with a
   * default factory answers for keys it does not hold yet. Only a
   * KeyMissingError from such a layer moves the scan on to the next one.
   */
  public lookup(key: K): V {
    for (const layer of this.layers) {
      if (hasLookup(layer)) {
        try {
          return layer.lookup(key);
        } catch (error) {
          if (!isKeyError(error)) throw error;
        }
      } else if (layer.has(key)) {
        return getPresent(layer, key);
      }
    }
    return this.missing(key);
  }

  // Unlike lookup, get never consults the missing hook.
  public get(key: K): V | undefined;
  public get<D>(key: K, fallback: D): V | D;
  public get<D>(key: K, fallback?: D): V | D | undefined {
    for (const layer of this.layers) {
      if (layer.has(key)) return getPresent(layer, key);
    }
    return fallback;
  }

  public has(key: K): boolean {
    return this.layers.some(layer => layer.has(key));
  }

  public get size(): number {
    let count = 0;
    for (const _key of this.keys()) ++count;
    return count;
  }

  public isEmpty(): boolean {
    return this.keys().next().done === true;
  }

  /**
   * Every key held by any layer, once, in the order the layers are scanned.
   */
  public *keys(): IterableIterator<K> {
    const seen = new Set<K>();
    for (const layer of this.layers) {
      for (const key of layer.keys()) {
        if (!seen.has(key)) {
          seen.add(key);
          yield key;
        }
      }
    }
  }

  public *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) yield value;
  }

  public *entries(): IterableIterator<[K, V]> {
    for (const key of this.keys()) {
      yield [key, this.lookup(key)];
    }
  }

  public [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  public forEach(callback: (value: V, key: K, proxy: this) => void): void {
    for (const [key, value] of this.entries()) {
      callback(value, key, this);
    }
  }

  /**
   * A proxy with layer (a new Map by default) in front of the current ones.
   * The entries of extra are first stored into that layer, which must then
   * accept writes.
   */
  public newChild(
    layer?: MapLike<K, V> | null,
    extra?: EntrySource<K, V>,
  ): ChainMapProxy<K, V> {
    const child = layer ?? new Map<K, V>();
    if (extra) {
      if (!isMutableMapLike(child)) {
        throw new TypeError("cannot store entries into a read-only layer");
      }
      for (const [key, value] of entriesOf(extra)) {
        child.set(key, value);
      }
    }
    return new ChainMapProxy([child, ...this.layers], this.missing);
  }

  // Every layer but the first.
  public get parents(): ChainMapProxy<K, V> {
    return new ChainMapProxy(this.layers.slice(1), this.missing);
  }

  // Shares the layers, and the missing hook.
  public copy(): ChainMapProxy<K, V> {
    return new ChainMapProxy(this.layers, this.missing);
  }

  /**
   * A new Map holding the entries of this view, then those of other, so
   * other wins for keys both hold.
   */
  public merge(other: EntrySource<K, V>): Map<K, V> {
    const result = new Map(this.entries());
    for (const [key, value] of entriesOf(other)) {
      result.set(key, value);
    }
    return result;
  }

  /**
   * A new Map holding the entries of other, then those of this view, so
   * this view wins for keys both hold.
   */
  public mergeInto(other: EntrySource<K, V>): Map<K, V> {
    const result = new Map(entriesOf(other));
    for (const [key, value] of this.entries()) {
      result.set(key, value);
    }
    return result;
  }

  public equals(other: MapLike<K, V>): boolean {
    if (other === this) return true;
    let count = 0;
    for (const key of other.keys()) {
      if (!this.has(key) || !equal(this.get(key), other.get(key))) {
        return false;
      }
      ++count;
    }
    return count === this.size;
  }

  public toString(): string {
    return recursiveRepr(this, () =>
      `ChainMapProxy(${this.layers.map(repr).join(", ")})`);
  }
}
