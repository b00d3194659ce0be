import { DeepCopier } from "./copier";
import { isNonNullObject } from "./helpers";

export {
  type DeepCopyable,
  deepCopy,
  isDeepCopyable,
} from "./helpers";

export { DeepCopier } from "./copier";

/**
 * Deep-copies a JavaScript value, preserving cycles and shared references.
 */
export function copyDeep<T>(value: T): T;
export function copyDeep(value: unknown): unknown {
  if (!isNonNullObject(value)) return value;
  const copier = DeepCopier.acquire();
  try {
    return copier.copy(value);
  } finally {
    copier.release();
  }
}

// Allow default imports as well.
export default copyDeep;
