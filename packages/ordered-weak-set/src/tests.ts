import * as assert from "assert";
import {
  ElementNotFoundError,
  IndexOutOfRangeError,
  KeyMissingError,
} from "@holdall/common";
import copyDeep from "@holdall/copy";
import { OrderedWeakSet } from "./index";

interface Sprite {
  name: string;
}

function sprite(name: string): Sprite {
  return { name };
}

function names(sprites: Iterable<Sprite>): string[] {
  return Array.from(sprites, ({ name }) => name);
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

// Creating the temporaries in their own frame leaves no local variable
// pointing at them once this returns.
function addTemporaries(set: OrderedWeakSet<Sprite>, count: number): void {
  for (let i = 0; i < count; ++i) {
    set.add(sprite(`temp${i}`));
  }
}

describe("OrderedWeakSet", function () {
  const a = sprite("a");
  const b = sprite("b");
  const c = sprite("c");
  const d = sprite("d");

  it("should be importable", function () {
    assert.strictEqual(typeof OrderedWeakSet, "function");
    const set = new OrderedWeakSet();
    assert.strictEqual(set.size, 0);
    assert.strictEqual(set.isEmpty(), true);
  });

  it("keeps first-insertion order", function () {
    const set = new OrderedWeakSet([b, a, b, c]);
    assert.deepStrictEqual(names(set), ["b", "a", "c"]);
    assert.strictEqual(set.size, 3);
    assert.strictEqual(set.has(a), true);
    assert.strictEqual(set.has(d), false);
    assert.strictEqual(set.count(a), 1);
    assert.strictEqual(set.at(-1), c);
    assert.deepStrictEqual(names(set.reversed()), ["c", "a", "b"]);
  });

  it("rejects primitives at run time", function () {
    const set = new OrderedWeakSet<object>();
    // @ts-expect-error
    assert.throws(() => set.add(1), {
      name: "TypeError",
      message: "cannot hold a 'number' value weakly",
    });
  });

  it("removes by value and by position", function () {
    const set = new OrderedWeakSet([a, b, c, d]);
    assert.strictEqual(set.discard(b), true);
    assert.strictEqual(set.discard(b), false);
    assert.throws(() => set.remove(b), KeyMissingError);
    assert.strictEqual(set.pop(), d);
    assert.strictEqual(set.pop(0), a);
    assert.deepStrictEqual(names(set), ["c"]);
    set.deleteAt(0);
    assert.strictEqual(set.isEmpty(), true);
    assert.throws(() => set.pop(), {
      name: "IndexOutOfRangeError",
      message: "pop from an empty set",
    });
  });

  it("indexes within bounds only", function () {
    const set = new OrderedWeakSet([a, b, c]);
    assert.strictEqual(set.index(b), 1);
    assert.strictEqual(set.index(c, 1), 2);
    assert.throws(() => set.index(c, 0, 2), {
      name: "ElementNotFoundError",
      message: '{"name": "c"} is not in the set',
    });
    assert.throws(() => set.index(d), ElementNotFoundError);
    assert.throws(() => set.at(3), IndexOutOfRangeError);
    assert.deepStrictEqual(names(set.slice(1)), ["b", "c"]);
  });

  it("combines and compares as sets", function () {
    const set = new OrderedWeakSet([a, b, c]);
    assert.deepStrictEqual(names(set.union([d, a])), ["a", "b", "c", "d"]);
    assert.deepStrictEqual(names(set.intersection([c, a])), ["a", "c"]);
    assert.deepStrictEqual(names(set.difference([b])), ["a", "c"]);
    assert.deepStrictEqual(names(set.symmetricDifference([d, b])), ["a", "c", "d"]);
    assert.strictEqual(set.equals([c, b, a]), true);
    assert.strictEqual(set.equals([a, b]), false);
    assert.strictEqual(set.isSubsetOf([a, b, c, d]), true);
    assert.strictEqual(set.isSupersetOf([c, a]), true);
    assert.strictEqual(set.isSupersetOf([d]), false);
    assert.strictEqual(set.isDisjointFrom([d]), true);
  });

  it("copies share their elements", function () {
    const set = new OrderedWeakSet([a, b]);
    const copy = set.copy();
    copy.add(c);
    assert.deepStrictEqual(names(set), ["a", "b"]);
    assert.deepStrictEqual(names(copy), ["a", "b", "c"]);

    const deep = copyDeep(set);
    assert.notStrictEqual(deep, set);
    assert.strictEqual(deep.at(0), a);
  });

  it("clears everything", function () {
    const set = new OrderedWeakSet([a, b]);
    set.clear();
    assert.strictEqual(set.size, 0);
    assert.strictEqual(set.has(a), false);
    set.add(a);
    assert.deepStrictEqual(names(set), ["a"]);
  });

  it("renders its live elements", function () {
    assert.strictEqual(
      new OrderedWeakSet([a]).toString(),
      'OrderedWeakSet([{"name": "a"}])',
    );
    assert.strictEqual(new OrderedWeakSet().toString(), "OrderedWeakSet()");
  });

  it("drops reclaimed elements without reordering survivors", async function () {
    const gc = getGC();
    if (!gc) {
      this.skip();
      return;
    }

    const set = new OrderedWeakSet([a]);
    addTemporaries(set, 3);
    set.add(b);
    addTemporaries(set, 2);
    set.add(c);

    await nextTurn();
    gc();

    assert.strictEqual(set.size, 3);
    assert.deepStrictEqual(names(set), ["a", "b", "c"]);
    assert.strictEqual(set.at(1), b);
    assert.strictEqual(set.index(c), 2);
  });

  it("holds elements strongly with weakness disabled", async function () {
    const gc = getGC();
    if (!gc) {
      this.skip();
      return;
    }

    const set = new OrderedWeakSet<Sprite>(null, false);
    addTemporaries(set, 2);

    await nextTurn();
    gc();

    assert.deepStrictEqual(names(set), ["temp0", "temp1"]);
  });
});
