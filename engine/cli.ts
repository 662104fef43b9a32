import { type Operation, withResolvers } from "effection";
import { parser } from "zod-opts";
import packageJson from "./package.json" with { type: "json" };
import { list, listCommandDefinition } from "./commands/list.ts";
import { run, runCommandDefinition } from "./commands/run.ts";
import { validateCommandDefinition, validateIdentifier } from "./commands/validate.ts";
import { verboseLogging } from "./logger.ts";
import { hasFailures } from "./record.ts";
import { formatSummary } from "./summary.ts";
import type { Commands } from "./types.ts";

export function* parseArgs(argv: string[]): Operation<Commands> {
  let resolvers = withResolvers<Commands>();

  parser()
    .name("swhid-conformance")
    .description("Compare SWHID implementations against each other and known values")
    .version(packageJson.version)
    .subcommand(runCommandDefinition
      .action((parsed) =>
        resolvers.resolve({
          command: "run",
          options: parsed,
        })
      ))
    .subcommand(listCommandDefinition
      .action((parsed) =>
        resolvers.resolve({
          command: "list",
          options: parsed,
        })
      ))
    .subcommand(validateCommandDefinition
      .action((parsed) =>
        resolvers.resolve({
          command: "validate",
          options: parsed,
        })
      ))
    .parse(argv);

  return yield* resolvers.operation;
}

export interface Output {
  write(text: string): void;
}

const stdout: Output = {
  write: (text) => process.stdout.write(text),
};

/**
 * Run one command and return the process exit code: 1 when a run has a
 * failing or disputed case, or an identifier does not validate.
 */
export function* cli(argv: string[], output: Output = stdout): Operation<number> {
  let command = yield* parseArgs(argv);

  yield* verboseLogging(command.options.verbose ?? false);

  switch (command.command) {
    case "run": {
      let record = yield* run(command.options);
      output.write(`${formatSummary(record)}\n`);
      return hasFailures(record) ? 1 : 0;
    }
    case "list": {
      let lines = yield* list(command.options);
      output.write(`${lines.join("\n")}\n`);
      return 0;
    }
    case "validate": {
      let report = validateIdentifier(command.options);
      output.write(`${report.lines.join("\n")}\n`);
      return report.ok ? 0 : 1;
    }
  }
}
