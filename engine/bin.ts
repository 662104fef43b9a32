#!/usr/bin/env -S node --import tsx
import { exit, main } from "effection";
import { cli } from "./cli.ts";
import { ConfigError, UsageError } from "./errors.ts";

main(function* (argv) {
  try {
    let code = yield* cli(argv);
    if (code !== 0) {
      yield* exit(code);
    }
  } catch (error) {
    if (error instanceof ConfigError || error instanceof UsageError) {
      yield* exit(2, error.message);
    }
    throw error;
  }
});
