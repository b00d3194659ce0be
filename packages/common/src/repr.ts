// Containers render themselves for diagnostics, and a container may end up
// holding itself (a SortedDict stored under one of its own keys, say). Every
// object currently being rendered is tracked here so that reaching it again
// prints "..." instead of recursing forever.
const rendering = new Set<object>();

export function recursiveRepr(owner: object, render: () => string): string {
  if (rendering.has(owner)) return "...";
  rendering.add(owner);
  try {
    return render();
  } finally {
    rendering.delete(owner);
  }
}

const { toString: objectToString } = Object.prototype;

export function repr(value: unknown): string {
  switch (typeof value) {
  case "string":
    return JSON.stringify(value);
  case "bigint":
    return `${value}n`;
  case "symbol":
    return value.toString();
  case "function":
    return value.name ? `[Function ${value.name}]` : "[Function]";
  case "object":
    if (value === null) break;
    return reprObject(value);
  }
  return String(value);
}

function reprObject(value: object): string {
  if (Array.isArray(value)) {
    return recursiveRepr(value, () => `[${value.map(repr).join(", ")}]`);
  }
  if (value instanceof Map) {
    return recursiveRepr(value, () => {
      const entries: string[] = [];
      value.forEach((v, k) => entries.push(`${repr(k)} => ${repr(v)}`));
      return `Map(${entries.length ? `{${entries.join(", ")}}` : ""})`;
    });
  }
  if (value instanceof Set) {
    return recursiveRepr(value, () => {
      const items: string[] = [];
      value.forEach(v => items.push(repr(v)));
      return `Set(${items.length ? `[${items.join(", ")}]` : ""})`;
    });
  }
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? "Date(Invalid)" : `Date(${value.toISOString()})`;
  }
  // Objects that know how to print themselves (including every holdall
  // container) are trusted to do so.
  if (typeof value.toString === "function" && value.toString !== objectToString) {
    return String(value);
  }
  return recursiveRepr(value, () => {
    const entries = Object.keys(value).map(
      key => `${JSON.stringify(key)}: ${repr(Reflect.get(value, key))}`,
    );
    return `{${entries.join(", ")}}`;
  });
}
