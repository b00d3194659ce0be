import * as assert from "assert";
import copyDeep, { DeepCopier, DeepCopyable, deepCopy, isDeepCopyable } from "./index";

class Layer {
  public readonly children: Layer[] = [];
  constructor(public name: string, public parent: Layer | null = null) {}
}

class Counter implements DeepCopyable<Counter> {
  static copies = 0;
  constructor(public count = 0) {}

  [deepCopy](copier: DeepCopier): Counter {
    ++Counter.copies;
    return copier.remember(this, new Counter(this.count));
  }
}

describe("copyDeep", function () {
  it("should be importable", function () {
    assert.strictEqual(typeof copyDeep, "function");
  });

  it("returns primitives and functions as they are", function () {
    const fn = () => 1;
    assert.strictEqual(copyDeep(1), 1);
    assert.strictEqual(copyDeep("a"), "a");
    assert.strictEqual(copyDeep(null), null);
    assert.strictEqual(copyDeep(undefined), undefined);
    assert.strictEqual(copyDeep(fn), fn);
  });

  it("copies nested arrays and objects", function () {
    const original = { a: [1, { b: 2 }], c: "d" };
    const copy = copyDeep(original);
    assert.notStrictEqual(copy, original);
    assert.notStrictEqual(copy.a, original.a);
    assert.notStrictEqual(copy.a[1], original.a[1]);
    assert.deepStrictEqual(copy, original);
  });

  it("copies maps, sets and dates", function () {
    const key = { id: 1 };
    const original = {
      map: new Map([[key, [1, 2]]]),
      set: new Set([key]),
      when: new Date(1000),
    };
    const copy = copyDeep(original);
    assert.notStrictEqual(copy.map, original.map);
    assert.notStrictEqual(copy.when, original.when);
    assert.strictEqual(copy.when.getTime(), 1000);

    const [copiedKey] = copy.map.keys();
    assert.notStrictEqual(copiedKey, key);
    assert.deepStrictEqual(copiedKey, key);
    // The same original key reached twice maps to the same copy.
    assert.strictEqual(copy.set.has(copiedKey), true);
  });

  it("preserves prototypes and cycles", function () {
    const root = new Layer("root");
    const child = new Layer("child", root);
    root.children.push(child);

    const copy = copyDeep(root);
    assert.ok(copy instanceof Layer);
    assert.notStrictEqual(copy, root);
    assert.strictEqual(copy.children.length, 1);
    assert.ok(copy.children[0] instanceof Layer);
    assert.strictEqual(copy.children[0].name, "child");
    assert.strictEqual(copy.children[0].parent, copy);
  });

  it("shares weak collections and copies binary data", function () {
    const weak = new WeakMap<object, number>();
    const bytes = new Uint8Array([1, 2, 3]);
    const copy = copyDeep({ weak, bytes });
    assert.strictEqual(copy.weak, weak);
    assert.notStrictEqual(copy.bytes, bytes);
    assert.ok(copy.bytes instanceof Uint8Array);
    assert.deepStrictEqual(Array.from(copy.bytes), [1, 2, 3]);
  });

  it("defers to DeepCopyable objects", function () {
    const counter = new Counter(7);
    assert.strictEqual(isDeepCopyable(counter), true);
    assert.strictEqual(isDeepCopyable({}), false);

    Counter.copies = 0;
    const copy = copyDeep([counter, counter]);
    assert.strictEqual(Counter.copies, 1);
    assert.ok(copy[0] instanceof Counter);
    assert.notStrictEqual(copy[0], counter);
    assert.strictEqual(copy[0].count, 7);
    assert.strictEqual(copy[0], copy[1]);
  });

  it("releases copiers back to the pool", function () {
    const copier = DeepCopier.acquire();
    const original = {};
    const clone = copier.remember(original, {});
    assert.strictEqual(copier.copy(original), clone);
    copier.release();
    // The memo is cleared on release, so a reacquired copier starts fresh.
    const again = DeepCopier.acquire();
    assert.notStrictEqual(again.copy(original), clone);
    again.release();
  });
});
