export * from "./compare.ts";
export * from "./diff.ts";
export * from "./result.ts";
