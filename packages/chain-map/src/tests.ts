import * as assert from "assert";
import { KeyMissingError, LookupMapLike, MapLike } from "@holdall/common";
import { ChainMapProxy } from "./index";

function layers() {
  return {
    first: new Map([["a", 1]]),
    second: new Map([["a", 2], ["b", 3]]),
  };
}

const readOnly: MapLike<string, number> = {
  has: key => key === "r",
  get: key => key === "r" ? 1 : undefined,
  keys: () => ["r"],
};

describe("ChainMapProxy", function () {
  it("should be importable", function () {
    assert.strictEqual(typeof ChainMapProxy, "function");
    const proxy = new ChainMapProxy();
    assert.strictEqual(proxy.layers.length, 1);
    assert.strictEqual(proxy.size, 0);
    assert.strictEqual(proxy.isEmpty(), true);
  });

  it("finds keys in the first layer holding them", function () {
    const { first, second } = layers();
    const proxy = new ChainMapProxy([first, second]);
    assert.strictEqual(proxy.lookup("a"), 1);
    assert.strictEqual(proxy.lookup("b"), 3);
    assert.strictEqual(proxy.size, 2);
    assert.strictEqual(proxy.has("b"), true);
    assert.strictEqual(proxy.has("c"), false);
    assert.strictEqual(proxy.isEmpty(), false);
  });

  it("sees changes to its layers", function () {
    const { first, second } = layers();
    const proxy = ChainMapProxy.of(first, second);
    first.set("a", 9);
    assert.strictEqual(proxy.lookup("a"), 9);
    first.delete("a");
    assert.strictEqual(proxy.lookup("a"), 2);
    second.set("c", 4);
    assert.strictEqual(proxy.size, 3);
  });

  it("iterates the key union in first-seen order", function () {
    const proxy = ChainMapProxy.of(
      new Map([["x", 1], ["y", 2]]),
      new Map([["z", 3], ["x", 4]]),
    );
    assert.deepStrictEqual([...proxy.keys()], ["x", "y", "z"]);
    assert.deepStrictEqual([...proxy.values()], [1, 2, 3]);
    assert.deepStrictEqual([...proxy], [["x", 1], ["y", 2], ["z", 3]]);

    const seen: string[] = [];
    proxy.forEach((value, key) => seen.push(`${key}=${value}`));
    assert.deepStrictEqual(seen, ["x=1", "y=2", "z=3"]);
  });

  it("routes misses through the missing hook", function () {
    const { first } = layers();
    assert.throws(() => new ChainMapProxy([first]).lookup("q"), {
      name: "KeyMissingError",
      message: '"q"',
    });
    assert.throws(() => new ChainMapProxy([first]).lookup("q"), KeyMissingError);

    const misses: string[] = [];
    const proxy = new ChainMapProxy([first], key => {
      misses.push(key);
      return 0;
    });
    assert.strictEqual(proxy.lookup("q"), 0);
    assert.strictEqual(proxy.get("q"), undefined);
    assert.strictEqual(proxy.get("q", -1), -1);
    assert.strictEqual(proxy.get("a", -1), 1);
    assert.deepStrictEqual(misses, ["q"]);
  });

  it("reads layers through their own lookup", function () {
    const { first, second } = layers();
    const filled = new Map<string, number>();
    const defaulting: LookupMapLike<string, number> = {
      has: key => filled.has(key),
      get: key => filled.get(key),
      keys: () => filled.keys(),
      lookup: key => {
        const value = filled.get(key) ?? 7;
        filled.set(key, value);
        return value;
      },
    };

    const proxy = new ChainMapProxy<string, number>([defaulting, second]);
    assert.strictEqual(proxy.get("b"), 3);
    assert.strictEqual(proxy.lookup("b"), 7);
    assert.deepStrictEqual([...filled], [["b", 7]]);
    assert.strictEqual(proxy.get("b"), 7);

    const nested = new ChainMapProxy<string, number>([new ChainMapProxy([first]), second]);
    assert.strictEqual(nested.lookup("a"), 1);
    assert.strictEqual(nested.lookup("b"), 3);
    assert.throws(() => nested.lookup("q"), KeyMissingError);

    const broken: LookupMapLike<string, number> = {
      has: () => false,
      get: () => undefined,
      keys: () => [],
      lookup: () => {
        throw new RangeError("broken layer");
      },
    };
    assert.throws(() => new ChainMapProxy<string, number>([broken, second]).lookup("b"), {
      name: "RangeError",
      message: "broken layer",
    });
  });

  it("prepends child layers", function () {
    const { first, second } = layers();
    const proxy = new ChainMapProxy([first, second]);

    const child = proxy.newChild();
    assert.strictEqual(child.layers.length, 3);
    assert.strictEqual(child.lookup("a"), 1);

    const shadowed = proxy.newChild(null, [["a", 5]]);
    assert.strictEqual(shadowed.lookup("a"), 5);
    assert.strictEqual(proxy.lookup("a"), 1);

    const layer = new Map([["b", 7]]);
    const withLayer = proxy.newChild(layer, new Map([["c", 8]]));
    assert.strictEqual(withLayer.layers[0], layer);
    assert.deepStrictEqual([...layer], [["b", 7], ["c", 8]]);
    assert.deepStrictEqual([...withLayer.keys()], ["b", "c", "a"]);

    assert.strictEqual(proxy.newChild(readOnly).lookup("r"), 1);
    assert.throws(() => proxy.newChild(readOnly, [["s", 2]]), {
      name: "TypeError",
      message: "cannot store entries into a read-only layer",
    });
  });

  it("drops the first layer for parents", function () {
    const { first, second } = layers();
    const proxy = new ChainMapProxy([first, second]);
    assert.strictEqual(proxy.parents.lookup("a"), 2);
    assert.strictEqual(proxy.parents.layers[0], second);
    const root = proxy.parents.parents;
    assert.strictEqual(root.layers.length, 1);
    assert.strictEqual(root.isEmpty(), true);
  });

  it("copies share layers", function () {
    const { first, second } = layers();
    const proxy = new ChainMapProxy([first, second]);
    const copy = proxy.copy();
    assert.notStrictEqual(copy, proxy);
    assert.strictEqual(copy.layers[0], first);
    assert.strictEqual(copy.layers[1], second);
  });

  it("merges into plain maps", function () {
    const { first, second } = layers();
    const proxy = new ChainMapProxy([first, second]);
    const other = new Map([["b", 30], ["c", 4]]);

    const merged = proxy.merge(other);
    assert.ok(merged instanceof Map);
    assert.deepStrictEqual([...merged], [["a", 1], ["b", 30], ["c", 4]]);

    assert.deepStrictEqual(
      [...proxy.mergeInto(other)],
      [["b", 3], ["c", 4], ["a", 1]],
    );
  });

  it("compares by effective entries", function () {
    const { first, second } = layers();
    const proxy = new ChainMapProxy([first, second]);
    assert.strictEqual(proxy.equals(new Map([["b", 3], ["a", 1]])), true);
    assert.strictEqual(proxy.equals(new Map([["a", 2], ["b", 3]])), false);
    assert.strictEqual(proxy.equals(new Map([["a", 1]])), false);
    assert.strictEqual(proxy.equals(proxy.copy()), true);
  });

  it("builds from keys", function () {
    const proxy = ChainMapProxy.fromKeys(["x", "y"], 0);
    assert.strictEqual(proxy.lookup("y"), 0);
    assert.strictEqual(proxy.size, 2);
    const bare = ChainMapProxy.fromKeys(["x"]);
    assert.strictEqual(bare.has("x"), true);
    assert.strictEqual(bare.lookup("x"), undefined);
  });

  it("renders its layers without recursing forever", function () {
    const { first, second } = layers();
    assert.strictEqual(
      new ChainMapProxy([first, second]).toString(),
      'ChainMapProxy(Map({"a" => 1}), Map({"a" => 2, "b" => 3}))',
    );

    const layer = new Map<string, unknown>();
    const proxy = new ChainMapProxy([layer]);
    layer.set("me", proxy);
    assert.strictEqual(String(proxy), 'ChainMapProxy(Map({"me" => ...}))');
  });
});
