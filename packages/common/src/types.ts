// Capability interfaces for the mapping arguments the containers accept.
// A native Map satisfies both, as do SortedDict, ChainMapProxy and the weak
// default dictionaries.

export interface MapLike<K, V> {
  has(key: K): boolean;
  get(key: K): V | undefined;
  keys(): Iterable<K>;
}

export interface MutableMapLike<K, V> extends MapLike<K, V> {
  set(key: K, value: V): unknown;
}

// Mappings that can fill in or compute a missing key when asked for it, as
// the default-factory dictionaries do.
export interface LookupMapLike<K, V> extends MapLike<K, V> {
  lookup(key: K): V;
}

export function hasLookup<K, V>(
  map: MapLike<K, V>,
): map is LookupMapLike<K, V> {
  return "lookup" in map && typeof map.lookup === "function";
}

// What the containers accept wherever they take a batch of entries.
export type EntrySource<K, V> = MapLike<K, V> | Iterable<readonly [K, V]>;

export function isMutableMapLike<K, V>(
  map: MapLike<K, V>,
): map is MutableMapLike<K, V> {
  return "set" in map && typeof map.set === "function";
}

export function isMapLike<K, V>(
  value: EntrySource<K, V>,
): value is MapLike<K, V> {
  return (
    "has" in value && typeof value.has === "function" &&
    "get" in value && typeof value.get === "function" &&
    "keys" in value && typeof value.keys === "function"
  );
}

/**
 * Reads a key that has() already reported present. get() returns undefined
 * for absent keys, but it may also return undefined for present ones when V
 * includes it, so the result is a V either way.
 */
export function getPresent<K, V>(map: MapLike<K, V>, key: K): V {
  return map.get(key) as V;
}

/**
 * Yields the entries of a MapLike, or passes an iterable of pairs through.
 */
export function* entriesOf<K, V>(
  source: EntrySource<K, V>,
): Generator<[K, V]> {
  if (isMapLike(source)) {
    for (const key of source.keys()) {
      yield [key, getPresent(source, key)];
    }
  } else {
    for (const [key, value] of source) {
      yield [key, value];
    }
  }
}
