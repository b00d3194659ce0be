import { repr } from "./repr";

// A single error value sometimes has to answer to more than one class:
// OrderedSet.pop fails both as a positional lookup and as a key lookup, and
// callers catching either kind should see it. Since classes only have one
// superclass, each error carries a set of kinds under this symbol, and the
// kind-defining classes consult it from Symbol.hasInstance.
const KINDS: unique symbol = Symbol("holdall.errors.KINDS");

export type ErrorKind = "key" | "index";

function hasKind(value: unknown, kind: ErrorKind): boolean {
  if (typeof value !== "object" || value === null || !(KINDS in value)) {
    return false;
  }
  const kinds = value[KINDS];
  return kinds instanceof Set && kinds.has(kind);
}

const { [Symbol.hasInstance]: ordinaryHasInstance } = Function.prototype;

export class KeyMissingError extends Error {
  readonly [KINDS]: ReadonlySet<ErrorKind> = new Set<ErrorKind>(["key"]);

  // Subclasses fall back to the ordinary prototype-chain check, so only
  // `instanceof KeyMissingError` itself is widened to every key-kind error.
  static [Symbol.hasInstance](value: unknown): boolean {
    return this === KeyMissingError
      ? hasKind(value, "key")
      : ordinaryHasInstance.call(this, value);
  }

  constructor(
    public readonly key: unknown,
    message = repr(key),
  ) {
    super(message);
    this.name = "KeyMissingError";
  }
}

export class IndexOutOfRangeError extends RangeError {
  readonly [KINDS]: ReadonlySet<ErrorKind> = new Set<ErrorKind>(["index"]);

  static [Symbol.hasInstance](value: unknown): boolean {
    return this === IndexOutOfRangeError
      ? hasKind(value, "index")
      : ordinaryHasInstance.call(this, value);
  }

  constructor(
    public readonly index: number,
    message = `index ${index} out of range`,
  ) {
    super(message);
    this.name = "IndexOutOfRangeError";
  }
}

/**
 * Raised where a failure is equally a missing key and an index out of range,
 * as when popping from an empty OrderedSet. Instances pass both
 * `instanceof KeyMissingError` and `instanceof IndexOutOfRangeError`.
 */
export class OrderedSetIndexError extends IndexOutOfRangeError {
  override readonly [KINDS]: ReadonlySet<ErrorKind> =
    new Set<ErrorKind>(["key", "index"]);

  public readonly key: unknown;

  constructor(keyOrIndex: unknown, message: string) {
    super(typeof keyOrIndex === "number" ? keyOrIndex : -1, message);
    this.key = keyOrIndex;
    this.name = "OrderedSetIndexError";
  }
}

export class ElementNotFoundError extends Error {
  constructor(
    public readonly value: unknown,
    message = `${repr(value)} is not in the container`,
  ) {
    super(message);
    this.name = "ElementNotFoundError";
  }
}

export class OrderingError extends TypeError {
  constructor(
    public readonly left: unknown,
    public readonly right: unknown,
    message = `ordering not supported between instances of ${describeType(left)} and ${describeType(right)}`,
  ) {
    super(message);
    this.name = "OrderingError";
  }
}

export function isKeyError(value: unknown): value is KeyMissingError {
  return hasKind(value, "key");
}

export function isIndexError(value: unknown): value is IndexOutOfRangeError {
  return hasKind(value, "index");
}

export function describeType(value: unknown): string {
  if (value === null) return "'null'";
  if (typeof value === "object") {
    const ctor: unknown = value.constructor;
    if (typeof ctor === "function" && ctor.name) {
      return `'${ctor.name}'`;
    }
    return "'Object'";
  }
  return `'${typeof value}'`;
}
