import { writeFile } from "node:fs/promises";
import { call, type Operation, until } from "effection";
import { command } from "zod-opts";
import { expandCases } from "../cases.ts";
import { createImplementation, limitsOf, loadConfig } from "../config.ts";
import { ConfigError } from "../errors.ts";
import { log, namespace } from "../logger.ts";
import { buildRecord, type ConformanceRecord } from "../record.ts";
import { createRegistry } from "../registry.ts";
import { runSuite } from "../scheduler.ts";
import { RunFlagsSchema, type RunFlags } from "../types.ts";

export function* run(flags: RunFlags): Operation<ConformanceRecord> {
  return yield* call(function* () {
    yield* namespace("run");
    return yield* runCommand(flags);
  });
}

export function* runCommand(flags: RunFlags): Operation<ConformanceRecord> {
  let config = yield* loadConfig(flags.config);

  let selected = config.implementations;
  if (flags.impl) {
    let known = selected.map((entry) => entry.name);
    let unknown = flags.impl.filter((name) => !known.includes(name));
    if (unknown.length > 0) {
      throw new ConfigError(
        `unknown implementation ${unknown.map((name) => `'${name}'`).join(", ")}`,
        flags.config,
      );
    }
    selected = selected.filter((entry) => flags.impl?.includes(entry.name));
  }
  let settings = {
    ...config.settings,
    concurrency: flags.concurrency ?? config.settings.concurrency,
  };

  let startedAt = new Date();
  let registry = yield* createRegistry(selected.map(createImplementation));
  let cases = yield* expandCases(config.payloads, { categories: flags.category });
  yield* log.info(
    `${cases.length} test case(s) x ${settings.variants.length} variant(s) against ${registry.entries.length} implementation(s)`,
  );

  let reports = yield* runSuite(registry, cases, {
    concurrency: settings.concurrency,
    limits: limitsOf(settings),
    variants: settings.variants,
  });
  let record = buildRecord({
    startedAt,
    finishedAt: new Date(),
    settings,
    registry,
    reports,
  });

  if (flags.output) {
    yield* until(writeFile(flags.output, `${JSON.stringify(record, null, 2)}\n`));
    yield* log.info(`wrote ${flags.output}`);
  }
  return record;
}

export const runCommandDefinition = command("run")
  .description("Run every implementation against every payload")
  .options({
    verbose: {
      type: RunFlagsSchema.shape.verbose,
      alias: "v",
      description: "Print debugging output",
    },
    config: {
      type: RunFlagsSchema.shape.config,
      alias: "c",
      description: "Configuration file",
    },
    impl: {
      type: RunFlagsSchema.shape.impl,
      description: "Only run these implementations",
    },
    category: {
      type: RunFlagsSchema.shape.category,
      description: "Only run payloads in these categories",
    },
    output: {
      type: RunFlagsSchema.shape.output,
      alias: "o",
      description: "Write the result record to this file",
    },
    concurrency: {
      type: RunFlagsSchema.shape.concurrency,
      alias: "j",
      description: "Invocations to run at the same time",
    },
  });
