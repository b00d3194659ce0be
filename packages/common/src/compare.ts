import { OrderingError } from "./errors";

export type Comparator<T> = (a: T, b: T) => number;

export const compareTo: unique symbol = Symbol.for("@holdall/common:compareTo");

/**
 * Objects that define their own position relative to other values of the
 * same kind. `a[compareTo](b)` is negative when `a` sorts first, positive
 * when `b` does and zero when neither does.
 */
export interface Comparable<T = unknown> {
  [compareTo](that: T): number;
}

export function isComparable(value: unknown): value is Comparable {
  return (
    typeof value === "object" &&
    value !== null &&
    // Using `in` rather than an own-property check, since the method is
    // normally inherited from a class prototype.
    compareTo in value &&
    typeof value[compareTo] === "function"
  );
}

function isNumeric(value: unknown): value is number | bigint {
  return typeof value === "number" || typeof value === "bigint";
}

function sign(a: number | bigint | string, b: number | bigint | string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * The total order used when no comparator is supplied. Numbers and bigints
 * compare with each other, strings by UTF-16 code unit, booleans with
 * booleans, dates by time, arrays element by element and then by length,
 * and Comparable objects by their own method. Anything else (including NaN)
 * has no position and raises an OrderingError at the point of comparison.
 */
export function defaultCompare(a: unknown, b: unknown): number {
  if (isNumeric(a) && isNumeric(b)) {
    if (Number.isNaN(a) || Number.isNaN(b)) {
      throw new OrderingError(a, b, "NaN cannot be ordered");
    }
    return sign(a, b);
  }

  if (typeof a === "string" && typeof b === "string") {
    return sign(a, b);
  }

  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }

  if (a instanceof Date && b instanceof Date) {
    const aTime = a.getTime();
    const bTime = b.getTime();
    if (Number.isNaN(aTime) || Number.isNaN(bTime)) {
      throw new OrderingError(a, b, "invalid dates cannot be ordered");
    }
    return sign(aTime, bTime);
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    return compareArrays(a, b);
  }

  if (isComparable(a)) {
    return a[compareTo](b);
  }

  if (isComparable(b)) {
    return -b[compareTo](a);
  }

  throw new OrderingError(a, b);
}

function compareArrays(a: readonly unknown[], b: readonly unknown[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; ++i) {
    const diff = defaultCompare(a[i], b[i]);
    if (diff !== 0) return diff;
  }
  return a.length - b.length;
}

export function reverseComparator<T>(compare: Comparator<T>): Comparator<T> {
  return (a, b) => compare(b, a);
}

export function keyComparator<T, R>(
  key: (value: T) => R,
  compare: Comparator<R> = defaultCompare,
): Comparator<T> {
  return (a, b) => compare(key(a), key(b));
}

// Both bisection functions assume array is already sorted by compare. Only
// the value being placed is ever passed as an operand, so an incomparable
// value fails on the first probe, before any caller has mutated anything.

/**
 * Returns the index at which value would be inserted to keep array sorted,
 * after any elements that compare equal to it.
 */
export function bisectRight<T>(
  array: readonly T[],
  value: T,
  compare: Comparator<T> = defaultCompare,
  lo = 0,
  hi = array.length,
): number {
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compare(value, array[mid]) < 0) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return lo;
}

/**
 * Like bisectRight, but returns the position before any elements that
 * compare equal to value.
 */
export function bisectLeft<T>(
  array: readonly T[],
  value: T,
  compare: Comparator<T> = defaultCompare,
  lo = 0,
  hi = array.length,
): number {
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compare(array[mid], value) < 0) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
