import * as assert from "assert";
import {
  KeyMissingError,
  OrderingError,
  defaultCompare,
  keyComparator,
  reverseComparator,
} from "@holdall/common";
import copyDeep from "@holdall/copy";
import {
  SortedDict,
  SortedDictItemsView,
  SortedDictKeysView,
  SortedDictValuesView,
} from "./index";

describe("SortedDict", function () {
  it("should be importable", function () {
    assert.strictEqual(typeof SortedDict, "function");
    const dict = new SortedDict();
    assert.strictEqual(dict.size, 0);
    assert.strictEqual(dict.isEmpty(), true);
    assert.strictEqual(dict.compare, defaultCompare);
  });

  it("iterates keys in ascending order", function () {
    const dict = new SortedDict<number, string>();
    dict.set(5, "five").set(1, "one").set(3, "three");
    assert.deepStrictEqual([...dict.keys()], [1, 3, 5]);
    assert.deepStrictEqual([...dict.keys().reversed()], [5, 3, 1]);
    assert.deepStrictEqual([...dict], [[1, "one"], [3, "three"], [5, "five"]]);
    assert.deepStrictEqual([...dict.reversed()], [[5, "five"], [3, "three"], [1, "one"]]);
    assert.deepStrictEqual([...dict.values()], ["one", "three", "five"]);
    assert.deepStrictEqual([...dict.values().reversed()], ["five", "three", "one"]);
  });

  it("overwrites without moving keys", function () {
    const dict = new SortedDict([[2, "b"], [1, "a"]]);
    dict.set(2, "B");
    assert.deepStrictEqual(dict.items().toArray(), [[1, "a"], [2, "B"]]);
  });

  it("rejects keys that cannot be ordered, keeping nothing", function () {
    const dict = new SortedDict<unknown, string>([[5, "five"], [1, "one"]]);
    assert.throws(() => dict.set("a", "letter"), OrderingError);
    assert.strictEqual(dict.size, 2);
    assert.strictEqual(dict.has("a"), false);
    assert.deepStrictEqual(dict.keys().toArray(), [1, 5]);
  });

  it("rejects a first key that cannot be ordered", function () {
    const dict = new SortedDict<unknown, string>();
    assert.throws(() => dict.set(NaN, "x"), {
      name: "OrderingError",
      message: "NaN cannot be ordered",
    });
    assert.throws(() => dict.set({}, "y"), OrderingError);
    assert.throws(() => dict.update([[new Date(NaN), "z"]]), OrderingError);
    assert.throws(() => new SortedDict([[{}, "w"]]), OrderingError);
    assert.throws(() => SortedDict.fromKeys([NaN]), OrderingError);
    assert.strictEqual(dict.size, 0);
    assert.deepStrictEqual(dict.keys().toArray(), []);

    dict.set(1, "one");
    assert.strictEqual(dict.delete(NaN), false);
    assert.strictEqual(dict.delete(1), true);
    assert.strictEqual(dict.size, 0);
    assert.strictEqual(dict.has(1), false);
  });

  it("updates all or nothing", function () {
    const dict = new SortedDict<unknown, string>([[1, "a"]]);
    assert.throws(() => dict.update([[2, "b"], ["x", "c"]]), OrderingError);
    assert.strictEqual(dict.size, 1);
    assert.strictEqual(dict.has(2), false);

    dict.update(new Map([[0, "z"], [1, "A"]]));
    assert.deepStrictEqual([...dict], [[0, "z"], [1, "A"]]);
  });

  it("supports the map surface", function () {
    const dict = SortedDict.fromObject({ b: 2, a: 1 });
    assert.strictEqual(dict.get("a"), 1);
    assert.strictEqual(dict.get("z"), undefined);
    assert.strictEqual(dict.lookup("b"), 2);
    assert.throws(() => dict.lookup("z"), {
      name: "KeyMissingError",
      message: '"z"',
    });
    assert.strictEqual(dict.delete("a"), true);
    assert.strictEqual(dict.delete("a"), false);
    assert.deepStrictEqual(dict.keys().toArray(), ["b"]);
    dict.clear();
    assert.strictEqual(dict.size, 0);
  });

  it("pops entries", function () {
    const dict = SortedDict.fromObject({ a: 1, b: 2, c: 3 });
    assert.strictEqual(dict.pop("a"), 1);
    assert.strictEqual(dict.pop("a", null), null);
    assert.throws(() => dict.pop("a"), KeyMissingError);
    assert.deepStrictEqual(dict.popItem(), ["c", 3]);
    assert.deepStrictEqual(dict.popItem(), ["b", 2]);
    assert.throws(() => dict.popItem(), {
      name: "KeyMissingError",
      message: "popItem(): dictionary is empty",
    });
  });

  it("sets defaults", function () {
    const dict = SortedDict.fromObject({ a: 1 });
    assert.strictEqual(dict.setDefault("a", 9), 1);
    assert.strictEqual(dict.setDefault("d", 4), 4);
    assert.deepStrictEqual([...dict], [["a", 1], ["d", 4]]);
  });

  it("builds from keys in one pass", function () {
    assert.deepStrictEqual(
      [...SortedDict.fromKeys(["c", "a", "b"], 0)],
      [["a", 0], ["b", 0], ["c", 0]],
    );
    assert.deepStrictEqual(
      [...SortedDict.fromKeys([2, 1])],
      [[1, undefined], [2, undefined]],
    );
  });

  it("honors a custom comparator", function () {
    const dict = new SortedDict<number, string>(null, reverseComparator(defaultCompare));
    dict.set(1, "a").set(3, "c").set(2, "b");
    assert.deepStrictEqual(dict.keys().toArray(), [3, 2, 1]);
  });

  it("tells apart keys that compare equal", function () {
    const byLength = keyComparator((word: string) => word.length);
    const dict = new SortedDict<string, number>(null, byLength);
    dict.set("bb", 1).set("aa", 2).set("c", 3);
    assert.deepStrictEqual(dict.keys().toArray(), ["c", "bb", "aa"]);
    dict.delete("aa");
    assert.deepStrictEqual(dict.keys().toArray(), ["c", "bb"]);
    assert.strictEqual(dict.get("bb"), 1);
  });

  it("gives live views", function () {
    const dict = new SortedDict<string, { x: number }>();
    const keys = dict.keys();
    const values = dict.values();
    const items = dict.items();
    assert.ok(keys instanceof SortedDictKeysView);
    assert.ok(values instanceof SortedDictValuesView);
    assert.ok(items instanceof SortedDictItemsView);
    assert.strictEqual(keys.size, 0);

    dict.set("k", { x: 1 });
    assert.strictEqual(keys.size, 1);
    assert.strictEqual(keys.has("k"), true);
    assert.strictEqual(values.has({ x: 1 }), true);
    assert.strictEqual(values.has({ x: 2 }), false);
    assert.strictEqual(items.has(["k", { x: 1 }]), true);
    assert.strictEqual(items.has(["k", { x: 2 }]), false);
    assert.strictEqual(items.has(["j", { x: 1 }]), false);
  });

  it("renders views", function () {
    const dict = new SortedDict([[3, "c"], [1, "a"]]);
    assert.strictEqual(dict.keys().toString(), "SortedDictKeysView([1, 3])");
    assert.strictEqual(dict.values().toString(), 'SortedDictValuesView(["a", "c"])');
    assert.strictEqual(dict.items().toString(), 'SortedDictItemsView([[1, "a"], [3, "c"]])');
  });

  it("compares entries, not order", function () {
    const dict = SortedDict.fromObject({ a: [1], b: [2] });
    assert.strictEqual(dict.equals(new Map([["b", [2]], ["a", [1]]])), true);
    assert.strictEqual(dict.equals(new Map([["a", [1]]])), false);
    assert.strictEqual(dict.equals(new Map([["a", [1]], ["b", [3]]])), false);
    assert.strictEqual(dict.equals(dict.copy()), true);
  });

  it("merges into a new dictionary", function () {
    const dict = SortedDict.fromObject({ a: 1, b: 2 });
    const merged = dict.merge([["c", 4], ["b", 3]]);
    assert.deepStrictEqual([...merged], [["a", 1], ["b", 3], ["c", 4]]);
    assert.deepStrictEqual([...dict], [["a", 1], ["b", 2]]);
  });

  it("copies keep order, entries and comparator", function () {
    const original = new SortedDict<number, { n: number }>(
      [[3, { n: 3 }], [1, { n: 1 }], [2, { n: 2 }]],
    );

    const copy = new SortedDict(original).copy();
    assert.deepStrictEqual(copy.keys().toArray(), [1, 2, 3]);
    assert.strictEqual(copy.get(1), original.get(1));
    assert.strictEqual(copy.compare, original.compare);
    copy.delete(1);
    assert.strictEqual(original.has(1), true);

    const deep = copyDeep(original);
    assert.ok(deep instanceof SortedDict);
    assert.deepStrictEqual(deep.keys().toArray(), [1, 2, 3]);
    assert.notStrictEqual(deep.get(2), original.get(2));
    assert.strictEqual(deep.equals(original), true);
  });

  it("renders itself without recursing forever", function () {
    assert.strictEqual(
      SortedDict.fromObject({ b: 2, a: 1 }).toString(),
      'SortedDict({"a": 1, "b": 2})',
    );
    assert.strictEqual(new SortedDict().toString(), "SortedDict({})");
    const dict = new SortedDict<string, unknown>();
    dict.set("self", dict);
    assert.strictEqual(String(dict), 'SortedDict({"self": ...})');
  });

  it("allows deleting while iterating", function () {
    const dict = SortedDict.fromObject({ a: 1, b: 2, c: 3 });
    const seen: string[] = [];
    dict.forEach((value, key) => {
      seen.push(key);
      if (key === "a") dict.delete("b");
    });
    assert.deepStrictEqual(seen, ["a", "c"]);
  });
});
