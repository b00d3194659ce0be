import type { DeepCopier } from "./copier";

export const deepCopy: unique symbol = Symbol.for("@holdall/copy:deepCopy");

/**
 * Objects that know how to deep-copy themselves. Implementations should call
 * `copier.remember(this, clone)` as soon as the empty clone exists, before
 * copying anything reachable from `this`, so that cycles leading back to
 * `this` resolve to the clone.
 */
export interface DeepCopyable<T = unknown> {
  [deepCopy](copier: DeepCopier): T;
}

export function isDeepCopyable(obj: unknown): obj is DeepCopyable {
  return (
    isNonNullObject(obj) &&
    // Using `in` instead of `hasOwn` because the method could be inherited from
    // the prototype chain.
    deepCopy in obj &&
    typeof obj[deepCopy] === "function"
  );
}

export const {
  getPrototypeOf,
  prototype: {
    toString: objToStr,
  },
} = Object;

export function isNonNullObject(obj: unknown): obj is object {
  return obj !== null && typeof obj === "object";
}

// Objects whose identity is the whole point (weak collections and handles,
// promises) are shared rather than copied.
const SHARED_TAGS = new Set([
  "[object WeakMap]",
  "[object WeakSet]",
  "[object WeakRef]",
  "[object FinalizationRegistry]",
  "[object Promise]",
]);

export function isSharedByIdentity(tag: string): boolean {
  return SHARED_TAGS.has(tag);
}
