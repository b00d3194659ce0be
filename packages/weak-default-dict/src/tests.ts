import * as assert from "assert";
import { KeyMissingError } from "@holdall/common";
import { WeakKeyDefaultDictionary, WeakValueDefaultDictionary } from "./index";

interface Handle {
  id: number;
}

function getGC(): (() => void) | undefined {
  const gc: unknown = Reflect.get(globalThis, "gc");
  return typeof gc === "function" ? () => { gc(); } : undefined;
}

// Objects referenced weakly during the current job stay alive until it ends,
// so collection can only be observed from a later one.
function nextTurn(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe("WeakKeyDefaultDictionary", function () {
  const a: Handle = { id: 1 };
  const b: Handle = { id: 2 };

  it("should be importable", function () {
    assert.strictEqual(typeof WeakKeyDefaultDictionary, "function");
    const dict = new WeakKeyDefaultDictionary();
    assert.strictEqual(dict.size, 0);
    assert.strictEqual(dict.isEmpty(), true);
    assert.strictEqual(dict.defaultFactory, null);
  });

  it("creates missing values exactly once", function () {
    let calls = 0;
    const factory = () => {
      ++calls;
      return [calls];
    };
    const dict = new WeakKeyDefaultDictionary<Handle, number[]>(factory);
    assert.strictEqual(dict.defaultFactory, factory);
    assert.strictEqual(dict.get(a), undefined);
    assert.strictEqual(calls, 0);

    const first = dict.lookup(a);
    assert.deepStrictEqual(first, [1]);
    assert.strictEqual(dict.lookup(a), first);
    assert.strictEqual(calls, 1);
    assert.strictEqual(dict.has(a), true);
    assert.strictEqual(dict.get(a), first);
  });

  it("stores the factory's result when the factory writes the same key", function () {
    const dict = new WeakKeyDefaultDictionary<Handle, string>(() => {
      dict.set(a, "inner");
      return "outer";
    });
    assert.strictEqual(dict.lookup(a), "outer");
    assert.strictEqual(dict.size, 1);
    assert.strictEqual(dict.get(a), "outer");
    assert.deepStrictEqual([...dict], [[a, "outer"]]);
  });

  it("fails on missing keys without a factory", function () {
    const dict = new WeakKeyDefaultDictionary<Handle, string>();
    assert.throws(() => dict.lookup(a), KeyMissingError);
    assert.throws(() => dict.pop(a), {
      name: "KeyMissingError",
      message: '{"id": 1}',
    });
    assert.strictEqual(dict.pop(a, "none"), "none");
  });

  it("supports the map surface in insertion order", function () {
    const dict = new WeakKeyDefaultDictionary<Handle, string>(null, [[b, "two"], [a, "one"]]);
    assert.deepStrictEqual([...dict.keys()], [b, a]);
    assert.deepStrictEqual([...dict.values()], ["two", "one"]);
    assert.deepStrictEqual([...dict], [[b, "two"], [a, "one"]]);

    dict.set(b, "TWO");
    assert.deepStrictEqual([...dict.values()], ["TWO", "one"]);
    assert.strictEqual(dict.pop(b), "TWO");
    assert.strictEqual(dict.delete(b), false);
    assert.strictEqual(dict.delete(a), true);
    assert.strictEqual(dict.isEmpty(), true);
  });

  it("rejects primitive keys at run time", function () {
    const dict = new WeakKeyDefaultDictionary<object, number>();
    // @ts-expect-error
    assert.throws(() => dict.set("key", 1), {
      name: "TypeError",
      message: "cannot hold a 'string' value weakly",
    });
  });

  it("copies and clears", function () {
    const dict = new WeakKeyDefaultDictionary<Handle, number>(() => 0, new Map([[a, 1]]));
    const copy = dict.copy();
    copy.set(b, 2);
    assert.strictEqual(dict.has(b), false);
    assert.strictEqual(copy.lookup(a), 1);
    assert.strictEqual(copy.defaultFactory, dict.defaultFactory);

    dict.clear();
    assert.strictEqual(dict.size, 0);
    assert.strictEqual(dict.has(a), false);
    assert.strictEqual(copy.size, 2);
  });

  it("renders its entries", function () {
    const dict = new WeakKeyDefaultDictionary<Handle, string>(null, [[a, "one"]]);
    assert.strictEqual(dict.toString(), 'WeakKeyDefaultDictionary({{"id": 1} => "one"})');
    assert.strictEqual(
      new WeakKeyDefaultDictionary().toString(),
      "WeakKeyDefaultDictionary()",
    );
  });

  it("drops entries whose key is reclaimed", async function () {
    const gc = getGC();
    if (!gc) {
      this.skip();
      return;
    }

    const dict = new WeakKeyDefaultDictionary<Handle, string>();
    dict.set(a, "kept");
    (function () {
      dict.set({ id: 3 }, "temporary");
    })();

    await nextTurn();
    gc();

    assert.strictEqual(dict.size, 1);
    assert.deepStrictEqual([...dict], [[a, "kept"]]);
  });
});

describe("WeakValueDefaultDictionary", function () {
  it("should be importable", function () {
    assert.strictEqual(typeof WeakValueDefaultDictionary, "function");
    const dict = new WeakValueDefaultDictionary();
    assert.strictEqual(dict.size, 0);
    assert.strictEqual(dict.defaultFactory, null);
  });

  it("creates missing values exactly once", function () {
    let calls = 0;
    const dict = new WeakValueDefaultDictionary<string, number[]>(() => {
      ++calls;
      return [];
    });
    const first = dict.lookup("k");
    assert.strictEqual(calls, 1);
    assert.strictEqual(dict.lookup("k"), first);
    assert.strictEqual(calls, 1);
    assert.strictEqual(dict.has("k"), true);
    assert.strictEqual(dict.get("other"), undefined);
    assert.strictEqual(calls, 1);
  });

  it("stores the factory's result when the factory writes the same key", function () {
    const inner: Handle = { id: 1 };
    const outer: Handle = { id: 2 };
    const dict = new WeakValueDefaultDictionary<string, Handle>(() => {
      dict.set("k", inner);
      return outer;
    });
    assert.strictEqual(dict.lookup("k"), outer);
    assert.strictEqual(dict.size, 1);
    assert.strictEqual(dict.get("k"), outer);
    assert.deepStrictEqual([...dict.values()], [outer]);
  });

  it("fails on missing keys without a factory", function () {
    const dict = new WeakValueDefaultDictionary<string, object>();
    assert.throws(() => dict.lookup("k"), {
      name: "KeyMissingError",
      message: '"k"',
    });
    assert.strictEqual(dict.pop("k", null), null);
  });

  it("supports the map surface in insertion order", function () {
    const one: Handle = { id: 1 };
    const two: Handle = { id: 2 };
    const dict = new WeakValueDefaultDictionary<string, Handle>(null, [["x", one], ["y", two]]);
    assert.deepStrictEqual([...dict.keys()], ["x", "y"]);
    assert.deepStrictEqual([...dict.values()], [one, two]);

    dict.set("x", two);
    assert.deepStrictEqual([...dict], [["x", two], ["y", two]]);
    assert.strictEqual(dict.pop("y"), two);
    assert.strictEqual(dict.delete("y"), false);
    assert.strictEqual(dict.delete("x"), true);
    assert.strictEqual(dict.isEmpty(), true);
  });

  it("rejects primitive values at run time", function () {
    const dict = new WeakValueDefaultDictionary<string, object>();
    // @ts-expect-error
    assert.throws(() => dict.set("k", 42), {
      name: "TypeError",
      message: "cannot hold a 'number' value weakly",
    });
  });

  it("copies and clears", function () {
    const one: Handle = { id: 1 };
    const dict = new WeakValueDefaultDictionary<string, Handle>(null, new Map([["x", one]]));
    const copy = dict.copy();
    dict.clear();
    assert.strictEqual(dict.has("x"), false);
    assert.strictEqual(copy.get("x"), one);
    assert.strictEqual(copy.toString(), 'WeakValueDefaultDictionary({"x" => {"id": 1}})');
  });

  it("forgets a value once it is reclaimed", async function () {
    const gc = getGC();
    if (!gc) {
      this.skip();
      return;
    }

    const dict = new WeakValueDefaultDictionary<string, number[]>(() => []);
    (function () {
      const value = dict.lookup("k");
      assert.strictEqual(dict.lookup("k"), value);
    })();

    await nextTurn();
    gc();

    assert.strictEqual(dict.has("k"), false);
    assert.strictEqual(dict.size, 0);
    assert.deepStrictEqual([...dict.keys()], []);
  });

  it("keeps a replaced entry when the old value is reclaimed", async function () {
    const gc = getGC();
    if (!gc) {
      this.skip();
      return;
    }

    const kept: Handle = { id: 9 };
    const dict = new WeakValueDefaultDictionary<string, Handle>();
    (function () {
      dict.set("k", { id: 0 });
    })();
    dict.set("k", kept);

    await nextTurn();
    gc();
    // Give any pending cleanup callbacks a chance to run.
    await nextTurn();

    assert.strictEqual(dict.get("k"), kept);
  });
});
