import { type Operation, until } from "effection";
import { z } from "zod";
import { workerMain } from "@swhid-conformance/sandbox/worker-main";
import {
  isModuleImplementation,
  type ModuleImplementation,
  ModuleRequestSchema,
} from "./define.ts";
import { ImplementationUnavailable } from "./errors.ts";

export const EntryDataSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("describe"), module: z.string() }),
  z.object({
    op: z.literal("compute"),
    module: z.string(),
    request: ModuleRequestSchema,
  }),
]);

export type EntryData = z.input<typeof EntryDataSchema>;

function* load(href: string): Operation<ModuleImplementation> {
  let loaded: unknown;
  try {
    loaded = yield* until(import(href));
  } catch (error) {
    throw new ImplementationUnavailable(
      `cannot load ${href}: ${error instanceof Error ? error.message : error}`,
    );
  }
  let candidate = typeof loaded === "object" && loaded !== null &&
      "default" in loaded
    ? loaded.default
    : undefined;
  if (!isModuleImplementation(candidate)) {
    throw new ImplementationUnavailable(
      `${href} does not export a default defineImplementation()`,
    );
  }
  return candidate;
}

await workerMain(function* (data) {
  let entry = EntryDataSchema.parse(data);
  let implementation = yield* load(entry.module);
  switch (entry.op) {
    case "describe":
      return {
        info: implementation.info ?? {},
        capabilities: implementation.capabilities,
      };
    case "compute":
      return yield* implementation.compute(entry.request);
  }
});
