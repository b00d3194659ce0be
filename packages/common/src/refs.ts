import { describeType } from "./errors";

// The weak containers store every referent behind one of these handles. With
// weakness enabled (the default) the handle is a native WeakRef; with it
// disabled, or where WeakRef does not exist, it is a StrongRef that keeps its
// target alive forever. Either way callers only ever use deref(), so the
// logical behavior of a container does not depend on which kind it holds.
export interface Ref<T extends object> {
  deref(): T | undefined;
}

export class StrongRef<T extends object> implements Ref<T> {
  constructor(private readonly target: T) {}

  public deref(): T {
    return this.target;
  }
}

export const canUseWeakRefs = typeof WeakRef === "function";

export const canUseFinalizationRegistry =
  typeof FinalizationRegistry === "function";

export function makeRef<T extends object>(target: T, weakness = true): Ref<T> {
  return weakness && canUseWeakRefs
    ? new WeakRef(target)
    : new StrongRef(target);
}

/**
 * Returns a FinalizationRegistry invoking cleanup for every registered target
 * that gets collected, or null when weakness is disabled or the environment
 * has no FinalizationRegistry. Containers must stay correct without one: the
 * registry only speeds up the removal of entries that deref() already hides.
 */
export function makeRegistry<THeld>(
  weakness: boolean,
  cleanup: (held: THeld) => void,
): FinalizationRegistry<THeld> | null {
  return weakness && canUseWeakRefs && canUseFinalizationRegistry
    ? new FinalizationRegistry<THeld>(cleanup)
    : null;
}

export function isObjRef(value: unknown): value is object {
  switch (typeof value) {
  case "object":
    if (value === null) break;
    // Fall through to return true...
  case "function":
    return true;
  }
  return false;
}

export function assertObjRef(value: unknown): asserts value is object {
  if (!isObjRef(value)) {
    throw new TypeError(`cannot hold a ${describeType(value)} value weakly`);
  }
}
