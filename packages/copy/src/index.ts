export * from "./copy";
export { default } from "./copy";
