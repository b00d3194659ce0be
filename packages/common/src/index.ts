export {
  type ErrorKind,
  KeyMissingError,
  IndexOutOfRangeError,
  OrderedSetIndexError,
  ElementNotFoundError,
  OrderingError,
  isKeyError,
  isIndexError,
  describeType,
} from "./errors";

export {
  type Comparator,
  type Comparable,
  compareTo,
  isComparable,
  defaultCompare,
  reverseComparator,
  keyComparator,
  bisectLeft,
  bisectRight,
} from "./compare";

export {
  type Ref,
  StrongRef,
  canUseWeakRefs,
  canUseFinalizationRegistry,
  makeRef,
  makeRegistry,
  isObjRef,
  assertObjRef,
} from "./refs";

export {
  type MapLike,
  type MutableMapLike,
  type LookupMapLike,
  type EntrySource,
  hasLookup,
  isMutableMapLike,
  isMapLike,
  getPresent,
  entriesOf,
} from "./types";

export { repr, recursiveRepr } from "./repr";
