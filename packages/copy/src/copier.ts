import {
  deepCopy,
  getPrototypeOf,
  isDeepCopyable,
  isNonNullObject,
  isSharedByIdentity,
  objToStr,
} from "./helpers";

// Binary data and the boxed/builtin value types below carry no references to
// other values we would need to preserve, so the platform's structured clone
// copies them exactly.
const STRUCTURED_TAGS = new Set([
  "[object Date]",
  "[object RegExp]",
  "[object Error]",
  "[object Boolean]",
  "[object Number]",
  "[object String]",
  "[object ArrayBuffer]",
  "[object DataView]",
]);

const copierPool: DeepCopier[] = [];
const COPIER_POOL_TARGET_SIZE = 5;

export class DeepCopier {
  // Maps every original object already visited to its copy, which is what
  // keeps shared references shared and cycles finite.
  private memo = new Map<object, object>();

  // Use DeepCopier.acquire() instead of new DeepCopier.
  protected constructor() {}

  static acquire() {
    return copierPool.pop() || new DeepCopier();
  }

  public release() {
    this.memo.clear();
    if (copierPool.length < COPIER_POOL_TARGET_SIZE) {
      copierPool.push(this);
    }
  }

  /**
   * Records clone as the copy of original, so later references to original
   * (including ones reached while clone is still being filled in) resolve to
   * clone. Returns clone for convenience.
   */
  public remember<T extends object>(original: object, clone: T): T {
    this.memo.set(original, clone);
    return clone;
  }

  public copy<T>(value: T): T;
  public copy(value: unknown): unknown {
    // Primitives are immutable, and functions are shared rather than copied.
    if (!isNonNullObject(value)) {
      return value;
    }

    const known = this.memo.get(value);
    if (known) {
      return known;
    }

    if (isDeepCopyable(value)) {
      return value[deepCopy](this);
    }

    const tag = objToStr.call(value);

    if (isSharedByIdentity(tag)) {
      return value;
    }

    if (STRUCTURED_TAGS.has(tag) || ArrayBuffer.isView(value)) {
      return this.remember(value, structuredClone(value));
    }

    if (Array.isArray(value)) {
      const clone: unknown[] = this.remember(value, new Array(value.length));
      for (let i = 0; i < value.length; ++i) {
        if (i in value) clone[i] = this.copy(value[i]);
      }
      return clone;
    }

    if (value instanceof Map) {
      const clone = this.remember(value, new Map<unknown, unknown>());
      value.forEach((v, k) => clone.set(this.copy(k), this.copy(v)));
      return clone;
    }

    if (value instanceof Set) {
      const clone = this.remember(value, new Set<unknown>());
      value.forEach(v => clone.add(this.copy(v)));
      return clone;
    }

    return this.copyObject(value);
  }

  // Plain objects and class instances alike: the copy shares the prototype
  // and receives deep copies of every own enumerable property. Accessor
  // properties are carried over as accessors.
  private copyObject(value: object): object {
    const clone: object = this.remember(value, Object.create(getPrototypeOf(value)));
    for (const key of Reflect.ownKeys(value)) {
      const desc = Object.getOwnPropertyDescriptor(value, key);
      if (desc && desc.enumerable) {
        if ("value" in desc) {
          desc.value = this.copy(desc.value);
        }
        Object.defineProperty(clone, key, desc);
      }
    }
    return clone;
  }
}
