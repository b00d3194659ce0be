import * as assert from "assert";
import {
  ElementNotFoundError,
  IndexOutOfRangeError,
  KeyMissingError,
  OrderedSetIndexError,
  keyComparator,
} from "@holdall/common";
import copyDeep from "@holdall/copy";
import { OrderedSet } from "./index";

class NameSet extends OrderedSet<string> {
  protected fromIterable(data: Iterable<string>): NameSet {
    return new NameSet(data);
  }
}

describe("OrderedSet", function () {
  it("should be importable", function () {
    assert.strictEqual(typeof OrderedSet, "function");
    const set = new OrderedSet();
    assert.strictEqual(set.size, 0);
    assert.strictEqual(set.isEmpty(), true);
    assert.strictEqual(Object.getPrototypeOf(set), OrderedSet.prototype);
  });

  it("keeps first-insertion order", function () {
    const set = new OrderedSet([3, 1, 3, 2, 1]);
    assert.deepStrictEqual(set.toArray(), [3, 1, 2]);
    set.add(1);
    assert.deepStrictEqual([...set], [3, 1, 2]);
    set.add(0);
    assert.deepStrictEqual([...set], [3, 1, 2, 0]);
  });

  it("update appends only unseen elements", function () {
    const set = new OrderedSet([1, 2, 3]);
    assert.strictEqual(set.update([3, 1, 5, 1, 4]), set);
    assert.deepStrictEqual(set.toArray(), [1, 2, 3, 5, 4]);
    set.update([6], new Set([7, 6]));
    assert.deepStrictEqual(set.toArray(), [1, 2, 3, 5, 4, 6, 7]);
  });

  it("treats NaN as a single element", function () {
    const set = new OrderedSet([NaN, NaN, 0, -0]);
    assert.strictEqual(set.size, 2);
    assert.strictEqual(set.has(NaN), true);
  });

  it("tracks survivors across add and discard", function () {
    const set = new OrderedSet<string>();
    set.add("a").add("b").add("c").add("d");
    assert.strictEqual(set.discard("b"), true);
    assert.strictEqual(set.discard("b"), false);
    set.add("b");
    set.discard("a");
    assert.deepStrictEqual(set.toArray(), ["c", "d", "b"]);
    assert.strictEqual(set.index("c"), 0);
    assert.strictEqual(set.index("d"), 1);
    assert.strictEqual(set.index("b"), 2);
    assert.strictEqual(set.count("b"), 1);
    assert.strictEqual(set.count("a"), 0);
  });

  it("indexes positively and negatively", function () {
    const set = new OrderedSet(["x", "y", "z"]);
    assert.strictEqual(set.at(0), "x");
    assert.strictEqual(set.at(-1), "z");
    assert.strictEqual(set.at(-3), "x");
    assert.throws(() => set.at(3), IndexOutOfRangeError);
    assert.throws(() => set.at(-4), IndexOutOfRangeError);
    assert.throws(() => set.at(1.5), TypeError);
  });

  it("slices into new sets", function () {
    const set = new OrderedSet([1, 2, 3, 4]);
    const tail = set.slice(1);
    assert.ok(tail instanceof OrderedSet);
    assert.deepStrictEqual(tail.toArray(), [2, 3, 4]);
    assert.deepStrictEqual(set.slice(-3, -1).toArray(), [2, 3]);
    assert.deepStrictEqual(set.slice(5).toArray(), []);
  });

  it("finds positions within a window", function () {
    const set = new OrderedSet([10, 20, 30]);
    assert.strictEqual(set.index(30), 2);
    assert.strictEqual(set.index(30, -1), 2);
    assert.strictEqual(set.index(20, 1, 2), 1);
    assert.throws(() => set.index(30, 0, 2), ElementNotFoundError);
    assert.throws(() => set.index(40), {
      name: "ElementNotFoundError",
      message: "40 is not in the set",
    });
  });

  it("pop and remove fail with the combined error", function () {
    const set = new OrderedSet([1, 2, 3]);
    assert.throws(() => set.pop(5), OrderedSetIndexError);
    assert.throws(() => set.pop(5), KeyMissingError);
    assert.throws(() => set.pop(5), IndexOutOfRangeError);
    assert.throws(() => set.remove(9), OrderedSetIndexError);
    assert.throws(() => set.remove(9), KeyMissingError);
    assert.throws(() => set.remove(9), IndexOutOfRangeError);
    assert.throws(() => set.deleteAt(-4), {
      name: "OrderedSetIndexError",
      message: "pop index out of range",
    });
    assert.throws(() => new OrderedSet().pop(), {
      name: "OrderedSetIndexError",
      message: "pop from an empty set",
    });
    assert.deepStrictEqual(set.toArray(), [1, 2, 3]);
  });

  it("pops by position and keeps indices in sync", function () {
    const set = new OrderedSet(["a", "b", "c", "d"]);
    assert.strictEqual(set.pop(), "d");
    assert.strictEqual(set.pop(0), "a");
    assert.deepStrictEqual(set.toArray(), ["b", "c"]);
    assert.strictEqual(set.index("c"), 1);
    set.deleteAt(-2);
    assert.deepStrictEqual(set.toArray(), ["c"]);
    assert.strictEqual(set.index("c"), 0);
    set.remove("c");
    assert.strictEqual(set.isEmpty(), true);
  });

  it("reverses and sorts in place", function () {
    const set = new OrderedSet([3, 1, 2]);
    assert.deepStrictEqual(set.reverse().toArray(), [2, 1, 3]);
    assert.strictEqual(set.index(3), 2);
    assert.deepStrictEqual(set.sort().toArray(), [1, 2, 3]);
    assert.deepStrictEqual(set.sort({ reverse: true }).toArray(), [3, 2, 1]);
    assert.strictEqual(set.index(1), 2);
    assert.deepStrictEqual([...set.reversed()], [1, 2, 3]);
  });

  it("sorts stably by key in either direction", function () {
    const words = new OrderedSet(["bb", "a", "cc", "d"]);
    words.sortBy(word => word.length);
    assert.deepStrictEqual(words.toArray(), ["a", "d", "bb", "cc"]);
    words.sortBy(word => word.length, { reverse: true });
    assert.deepStrictEqual(words.toArray(), ["bb", "cc", "a", "d"]);
    words.sort({ compare: keyComparator((word: string) => word.charCodeAt(0)) });
    assert.deepStrictEqual(words.toArray(), ["a", "bb", "cc", "d"]);
  });

  it("combines sets in receiver order, then argument order", function () {
    const set = new OrderedSet([1, 2, 3, 4]);
    assert.deepStrictEqual(set.union([5, 2], [6, 1]).toArray(), [1, 2, 3, 4, 5, 6]);
    assert.deepStrictEqual(set.intersection([4, 2], new Set([2, 4, 9])).toArray(), [2, 4]);
    assert.deepStrictEqual(set.difference([2], [4]).toArray(), [1, 3]);
    assert.deepStrictEqual(
      new OrderedSet([1, 4, 3, 5, 7]).symmetricDifference([9, 7, 1, 3, 2]).toArray(),
      [4, 5, 9, 2],
    );
    // None of the above touched the receiver.
    assert.deepStrictEqual(set.toArray(), [1, 2, 3, 4]);
  });

  it("reads each argument only once", function () {
    function* numbers(...values: number[]) {
      yield* values;
    }
    const set = new OrderedSet([1, 2, 3]);
    assert.deepStrictEqual(set.symmetricDifference(numbers(2, 5)).toArray(), [1, 3, 5]);
    assert.deepStrictEqual(set.union(numbers(4, 1)).toArray(), [1, 2, 3, 4]);
    assert.deepStrictEqual(set.intersection(numbers(3, 1)).toArray(), [1, 3]);
    assert.strictEqual(set.equals(numbers(3, 1, 2)), true);
    assert.strictEqual(set.isSupersetOf(numbers(1, 3)), true);

    set.symmetricDifferenceUpdate(new Map([[3, "c"], [4, "d"]]).keys());
    assert.deepStrictEqual(set.toArray(), [1, 2, 4]);
  });

  it("updates in place", function () {
    const set = new OrderedSet([1, 2, 3, 4]);
    assert.strictEqual(set.intersectionUpdate([4, 3, 2]), set);
    assert.deepStrictEqual(set.toArray(), [2, 3, 4]);
    set.differenceUpdate([3]);
    assert.deepStrictEqual(set.toArray(), [2, 4]);
    set.symmetricDifferenceUpdate([4, 5]);
    assert.deepStrictEqual(set.toArray(), [2, 5]);
    assert.strictEqual(set.index(5), 1);
  });

  it("satisfies set-algebra laws", function () {
    const universe = new OrderedSet([1, 2, 3, 4, 5, 6, 7, 8]);
    const a = new OrderedSet([1, 2, 3, 4]);
    const b = new OrderedSet([6, 5, 4, 3]);

    assert.ok(a.union(b).equals(b.union(a)));
    assert.ok(a.intersection(b).equals(b.intersection(a)));
    assert.deepStrictEqual(a.union(b).toArray(), [1, 2, 3, 4, 6, 5]);
    assert.deepStrictEqual(b.union(a).toArray(), [6, 5, 4, 3, 1, 2]);

    assert.ok(
      universe.difference(a.union(b)).equals(
        universe.difference(a).intersection(universe.difference(b)),
      ),
    );
    assert.ok(
      universe.difference(a.intersection(b)).equals(
        universe.difference(a).union(universe.difference(b)),
      ),
    );
  });

  it("compares as sets, ignoring position", function () {
    const set = new OrderedSet([1, 2]);
    assert.strictEqual(set.equals([2, 1]), true);
    assert.strictEqual(set.equals(new OrderedSet([2, 1])), true);
    assert.strictEqual(set.equals([1, 2, 3]), false);
    assert.strictEqual(set.isSubsetOf([3, 2, 1]), true);
    assert.strictEqual(set.isSubsetOf([2, 1]), true);
    assert.strictEqual(set.isProperSubsetOf([2, 1]), false);
    assert.strictEqual(set.isProperSubsetOf([2, 1, 0]), true);
    assert.strictEqual(set.isSupersetOf([2]), true);
    assert.strictEqual(set.isProperSupersetOf([2, 1]), false);
    assert.strictEqual(set.isProperSupersetOf(new Set([1])), true);
    assert.strictEqual(set.isDisjointFrom([3, 4]), true);
    assert.strictEqual(set.isDisjointFrom([4, 2]), false);
  });

  it("builds results of the receiver's type", function () {
    const names = new NameSet(["ann", "bo"]);
    assert.ok(names.union(["cy"]) instanceof NameSet);
    assert.ok(names.intersection(["bo"]) instanceof NameSet);
    assert.ok(names.slice(1) instanceof NameSet);
    assert.ok(names.copy() instanceof NameSet);
    assert.strictEqual(names.toString(), 'NameSet(["ann", "bo"])');
  });

  it("copies shallowly and deeply", function () {
    const shared = { id: 1 };
    const set = new OrderedSet([shared]);

    const shallow = set.copy();
    assert.notStrictEqual(shallow, set);
    assert.strictEqual(shallow.at(0), shared);

    const deep = copyDeep(set);
    assert.ok(deep instanceof OrderedSet);
    assert.notStrictEqual(deep.at(0), shared);
    assert.deepStrictEqual(deep.at(0), shared);
    assert.strictEqual(deep.has(shared), false);
  });

  it("renders itself without recursing forever", function () {
    assert.strictEqual(new OrderedSet([1, "a"]).toString(), 'OrderedSet([1, "a"])');
    assert.strictEqual(new OrderedSet().toString(), "OrderedSet()");
    const set = new OrderedSet<unknown>([1]);
    set.add(set);
    assert.strictEqual(String(set), "OrderedSet([1, ...])");
  });

  it("passes positions to forEach", function () {
    const seen: [string, number][] = [];
    new OrderedSet(["p", "q"]).forEach((value, index) => seen.push([value, index]));
    assert.deepStrictEqual(seen, [["p", 0], ["q", 1]]);
  });
});
