export * from "./classify.ts";
export * from "./kinds.ts";
