import { call, type Operation } from "effection";
import { command } from "zod-opts";
import { createImplementations, loadConfig } from "../config.ts";
import { namespace } from "../logger.ts";
import { createRegistry, type RegisteredImplementation } from "../registry.ts";
import { ListFlagsSchema, type ListFlags } from "../types.ts";

export function describeEntry(entry: RegisteredImplementation): string[] {
  let { implementation, info, availability, capabilities } = entry;
  let heading = `${implementation.name} (${implementation.kind}) ${info.version}`;
  if (!availability.available) {
    return [`${heading}: unavailable: ${availability.reason}`];
  }
  let lines = [info.language ? `${heading} [${info.language}]` : heading];
  if (info.description) {
    lines.push(`  ${info.description}`);
  }
  if (capabilities) {
    lines.push(`  types: ${capabilities.types.join(", ")}`);
    lines.push(`  variants: ${capabilities.variants.join(", ")}`);
    if (capabilities.qualifiers.length > 0) {
      lines.push(`  qualifiers: ${capabilities.qualifiers.join(", ")}`);
    }
  }
  return lines;
}

export function* list(flags: ListFlags): Operation<string[]> {
  return yield* call(function* () {
    yield* namespace("list");
    let config = yield* loadConfig(flags.config);
    let registry = yield* createRegistry(createImplementations(config));
    return registry.entries.flatMap(describeEntry);
  });
}

export const listCommandDefinition = command("list")
  .description("Probe the configured implementations and show what they support")
  .options({
    verbose: {
      type: ListFlagsSchema.shape.verbose,
      alias: "v",
      description: "Print debugging output",
    },
    config: {
      type: ListFlagsSchema.shape.config,
      alias: "c",
      description: "Configuration file",
    },
  });
