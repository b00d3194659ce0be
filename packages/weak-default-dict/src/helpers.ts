import { recursiveRepr, repr } from "@holdall/common";

// Supplies the value lookup() stores for a key it does not find.
export type DefaultFactory<V> = () => V;

export function reprEntries(
  owner: object,
  name: string,
  entries: Iterable<readonly [unknown, unknown]>,
): string {
  return recursiveRepr(owner, () => {
    const parts = Array.from(entries, ([key, value]) => `${repr(key)} => ${repr(value)}`);
    return parts.length ? `${name}({${parts.join(", ")}})` : `${name}()`;
  });
}
