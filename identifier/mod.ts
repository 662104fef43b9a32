export * from "./encoding.ts";
export * from "./errors.ts";
export * from "./identifier.ts";
export * from "./qualifiers.ts";
export * from "./validate.ts";
export * from "./variant.ts";
