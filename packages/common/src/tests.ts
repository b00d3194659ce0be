import * as assert from "assert";
import {
  KeyMissingError,
  IndexOutOfRangeError,
  OrderedSetIndexError,
  ElementNotFoundError,
  OrderingError,
  isKeyError,
  isIndexError,
  compareTo,
  defaultCompare,
  keyComparator,
  reverseComparator,
  bisectLeft,
  bisectRight,
  StrongRef,
  makeRef,
  isObjRef,
  isMutableMapLike,
  entriesOf,
  repr,
  recursiveRepr,
} from "./index";

class Version {
  constructor(public readonly rank: number) {}

  [compareTo](that: Version): number {
    return this.rank - that.rank;
  }
}

describe("errors", function () {
  it("KeyMissingError carries its key", function () {
    const error = new KeyMissingError("sprite");
    assert.strictEqual(error.key, "sprite");
    assert.strictEqual(error.message, '"sprite"');
    assert.strictEqual(error.name, "KeyMissingError");
    assert.ok(error instanceof Error);
    assert.strictEqual(error instanceof IndexOutOfRangeError, false);
    assert.strictEqual(error instanceof OrderedSetIndexError, false);
  });

  it("IndexOutOfRangeError is a RangeError", function () {
    const error = new IndexOutOfRangeError(3);
    assert.strictEqual(error.message, "index 3 out of range");
    assert.ok(error instanceof RangeError);
    assert.strictEqual(error instanceof KeyMissingError, false);
    assert.strictEqual(error instanceof OrderedSetIndexError, false);
  });

  it("OrderedSetIndexError answers to both kinds", function () {
    const error = new OrderedSetIndexError(5, "pop index out of range");
    assert.ok(error instanceof OrderedSetIndexError);
    assert.ok(error instanceof IndexOutOfRangeError);
    assert.ok(error instanceof KeyMissingError);
    assert.ok(error instanceof RangeError);
    assert.strictEqual(isKeyError(error), true);
    assert.strictEqual(isIndexError(error), true);
    assert.strictEqual(error.index, 5);
    assert.strictEqual(error.key, 5);
    assert.strictEqual(error.message, "pop index out of range");
  });

  it("OrderedSetIndexError keeps non-numeric keys", function () {
    const error = new OrderedSetIndexError("ghost", "\"ghost\"");
    assert.strictEqual(error.key, "ghost");
    assert.strictEqual(error.index, -1);
  });

  it("can be caught by either kind", function () {
    function fail(): never {
      throw new OrderedSetIndexError(0, "pop from an empty set");
    }
    assert.throws(fail, KeyMissingError);
    assert.throws(fail, IndexOutOfRangeError);
  });

  it("isKeyError and isIndexError reject plain errors", function () {
    assert.strictEqual(isKeyError(new Error("x")), false);
    assert.strictEqual(isIndexError(new RangeError("x")), false);
    assert.strictEqual(isKeyError(null), false);
    assert.strictEqual(isKeyError(new KeyMissingError(1)), true);
    assert.strictEqual(isIndexError(new KeyMissingError(1)), false);
  });

  it("ElementNotFoundError describes the value", function () {
    const error = new ElementNotFoundError(42);
    assert.strictEqual(error.value, 42);
    assert.strictEqual(error.message, "42 is not in the container");
  });

  it("OrderingError names both types", function () {
    assert.strictEqual(
      new OrderingError(1, "a").message,
      "ordering not supported between instances of 'number' and 'string'",
    );
    assert.strictEqual(
      new OrderingError(new Version(1), {}).message,
      "ordering not supported between instances of 'Version' and 'Object'",
    );
    assert.ok(new OrderingError(null, null) instanceof TypeError);
  });
});

describe("defaultCompare", function () {
  it("orders numbers and bigints together", function () {
    assert.strictEqual(defaultCompare(1, 2), -1);
    assert.strictEqual(defaultCompare(2, 1), 1);
    assert.strictEqual(defaultCompare(2, 2), 0);
    assert.strictEqual(defaultCompare(2n, 1), 1);
    assert.strictEqual(defaultCompare(1.5, 2n), -1);
  });

  it("orders strings by code unit", function () {
    assert.strictEqual(defaultCompare("a", "b"), -1);
    assert.strictEqual(defaultCompare("b", "a"), 1);
    assert.strictEqual(defaultCompare("B", "a"), -1);
    assert.strictEqual(defaultCompare("a", "a"), 0);
  });

  it("orders booleans and dates", function () {
    assert.strictEqual(defaultCompare(true, false), 1);
    assert.strictEqual(defaultCompare(false, true), -1);
    assert.strictEqual(defaultCompare(new Date(10), new Date(20)), -1);
    assert.strictEqual(defaultCompare(new Date(20), new Date(20)), 0);
  });

  it("orders arrays lexicographically", function () {
    assert.strictEqual(defaultCompare([1, 2], [1, 3]), -1);
    assert.strictEqual(defaultCompare([1, 2], [1, 2, 0]), -1);
    assert.strictEqual(defaultCompare([2], [1, 9]), 1);
    assert.strictEqual(defaultCompare(["a", 1], ["a", 1]), 0);
  });

  it("uses Comparable objects from either side", function () {
    assert.ok(defaultCompare(new Version(1), new Version(3)) < 0);
    assert.ok(defaultCompare(new Version(3), new Version(1)) > 0);
    assert.strictEqual(defaultCompare(new Version(2), new Version(2)), 0);
  });

  it("rejects values with no mutual order", function () {
    assert.throws(() => defaultCompare(1, "a"), OrderingError);
    assert.throws(() => defaultCompare({}, {}), OrderingError);
    assert.throws(() => defaultCompare(NaN, 1), OrderingError);
    assert.throws(() => defaultCompare(new Date(NaN), new Date(0)), OrderingError);
    assert.throws(() => defaultCompare([1], ["a"]), OrderingError);
  });

  it("composes with keyComparator and reverseComparator", function () {
    const byLength = keyComparator((word: string) => word.length);
    assert.deepStrictEqual(["ccc", "a", "bb"].sort(byLength), ["a", "bb", "ccc"]);
    assert.deepStrictEqual(
      ["ccc", "a", "bb"].sort(reverseComparator(byLength)),
      ["ccc", "bb", "a"],
    );
  });
});

describe("bisection", function () {
  const sorted = [1, 2, 2, 2, 5];

  it("bisectRight places after equal elements", function () {
    assert.strictEqual(bisectRight(sorted, 2), 4);
    assert.strictEqual(bisectRight(sorted, 0), 0);
    assert.strictEqual(bisectRight(sorted, 9), 5);
    assert.strictEqual(bisectRight(sorted, 3), 4);
  });

  it("bisectLeft places before equal elements", function () {
    assert.strictEqual(bisectLeft(sorted, 2), 1);
    assert.strictEqual(bisectLeft(sorted, 0), 0);
    assert.strictEqual(bisectLeft(sorted, 9), 5);
    assert.strictEqual(bisectLeft(sorted, 5), 4);
  });

  it("honors lo and hi", function () {
    assert.strictEqual(bisectLeft(sorted, 2, defaultCompare, 2), 2);
    assert.strictEqual(bisectRight(sorted, 2, defaultCompare, 0, 2), 2);
  });

  it("fails on the first probe for an incomparable value", function () {
    assert.throws(() => bisectRight<unknown>([1, 2, 3], "x"), OrderingError);
  });
});

describe("refs", function () {
  it("makes WeakRefs by default", function () {
    const target = {};
    const ref = makeRef(target);
    assert.ok(ref instanceof WeakRef);
    assert.strictEqual(ref.deref(), target);
  });

  it("makes StrongRefs when weakness is disabled", function () {
    const target = {};
    const ref = makeRef(target, false);
    assert.ok(ref instanceof StrongRef);
    assert.strictEqual(ref.deref(), target);
  });

  it("isObjRef tells objects from primitives", function () {
    assert.strictEqual(isObjRef({}), true);
    assert.strictEqual(isObjRef([]), true);
    assert.strictEqual(isObjRef(() => {}), true);
    assert.strictEqual(isObjRef(null), false);
    assert.strictEqual(isObjRef("object"), false);
    assert.strictEqual(isObjRef(0), false);
  });
});

describe("map capabilities", function () {
  it("recognizes mutable maps", function () {
    assert.strictEqual(isMutableMapLike(new Map()), true);
    const readOnly = {
      has: () => false,
      get: () => undefined,
      keys: () => [],
    };
    assert.strictEqual(isMutableMapLike(readOnly), false);
  });

  it("reads entries from maps and pair lists", function () {
    const map = new Map<string, number | undefined>([["a", 1], ["b", undefined]]);
    assert.deepStrictEqual([...entriesOf(map)], [["a", 1], ["b", undefined]]);
    assert.deepStrictEqual([...entriesOf([["x", 2]] as const)], [["x", 2]]);
  });
});

describe("repr", function () {
  it("renders primitives", function () {
    assert.strictEqual(repr("a"), '"a"');
    assert.strictEqual(repr(3), "3");
    assert.strictEqual(repr(10n), "10n");
    assert.strictEqual(repr(null), "null");
    assert.strictEqual(repr(undefined), "undefined");
    assert.strictEqual(repr(true), "true");
  });

  it("renders collections", function () {
    assert.strictEqual(repr([1, "b", null]), '[1, "b", null]');
    assert.strictEqual(repr(new Map([["a", 1]])), 'Map({"a" => 1})');
    assert.strictEqual(repr(new Set([1, 2])), "Set([1, 2])");
    assert.strictEqual(repr(new Set()), "Set()");
    assert.strictEqual(repr({ x: 1, y: "z" }), '{"x": 1, "y": "z"}');
  });

  it("defers to custom toString methods", function () {
    assert.strictEqual(repr({ toString: () => "custom" }), "custom");
  });

  it("guards against cycles", function () {
    const array: unknown[] = [1];
    array.push(array);
    assert.strictEqual(repr(array), "[1, ...]");

    const owner = {};
    assert.strictEqual(
      recursiveRepr(owner, () => `outer(${recursiveRepr(owner, () => "inner")})`),
      "outer(...)",
    );
  });
});
