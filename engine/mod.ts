export * from "./cases.ts";
export * from "./cli.ts";
export * from "./commands/list.ts";
export * from "./commands/run.ts";
export * from "./commands/validate.ts";
export * from "./config.ts";
export * from "./errors.ts";
export * from "./logger.ts";
export * from "./record.ts";
export * from "./registry.ts";
export * from "./runner.ts";
export * from "./scheduler.ts";
export * from "./summary.ts";
export * from "./task-buffer.ts";
export * from "./types.ts";
