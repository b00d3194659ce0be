export { type DefaultFactory } from "./helpers";
export { WeakKeyDefaultDictionary } from "./weak-key";
export { WeakValueDefaultDictionary } from "./weak-value";
