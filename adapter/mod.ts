export * from "./define.ts";
export * from "./environment.ts";
export * from "./errors.ts";
export * from "./exec.ts";
export * from "./external.ts";
export * from "./in-process.ts";
export * from "./payload.ts";
export * from "./protocol.ts";
export * from "./references.ts";
export * from "./types.ts";
export * from "./workdir.ts";
