import { Buffer } from "node:buffer";
import { type Operation } from "effection";
import { run } from "@swhid-conformance/sandbox";
import { cleanEnvironment } from "./environment.ts";
import { CommandError } from "./errors.ts";

export interface ExecOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
}

/**
 * Run a helper tool the harness itself depends on (git, tar) and return
 * its stdout. Anything but a clean exit is a `CommandError`.
 */
export function* exec(
  command: string,
  args: string[],
  options: ExecOptions = {},
): Operation<string> {
  let outcome = yield* run({
    type: "process",
    command,
    arguments: args,
    cwd: options.cwd,
    env: cleanEnvironment(options.env),
  }, { timeoutMs: options.timeoutMs ?? 60_000 });

  if (outcome.type !== "success") {
    throw new CommandError(command, args, outcome, options.cwd);
  }
  return Buffer.from(outcome.stdout).toString("utf8");
}
