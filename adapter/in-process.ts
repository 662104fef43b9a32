import { access } from "node:fs/promises";
import { fileURLToPath, pathToFileURL } from "node:url";
import { Buffer } from "node:buffer";
import { type Operation, until } from "effection";
import { z } from "zod";
import {
  type CapabilityDescriptor,
  CapabilitySchema,
} from "@swhid-conformance/capability";
import {
  crashed,
  type Limits,
  type RawOutcome,
  run,
} from "@swhid-conformance/sandbox";
import type { EntryData } from "./in-process-entry.ts";
import { readDiscoveryResponse } from "./protocol.ts";
import type { Availability, Implementation, ImplementationInfo } from "./types.ts";

const ENTRY = new URL("./in-process-entry.ts", import.meta.url);

export interface InProcessOptions {
  name: string;
  /** module whose default export comes from `defineImplementation()` */
  module: URL | string;
  /** overrides what the module declares */
  capabilities?: CapabilityDescriptor;
  discoveryTimeoutMs?: number;
}

const DescribeResponse = z.object({
  info: z.object({
    version: z.string().optional(),
    language: z.string().optional(),
    description: z.string().optional(),
  }),
  capabilities: CapabilitySchema,
});

type Description = z.output<typeof DescribeResponse>;

/**
 * The module reports its failure to load as an error of its own; to the
 * engine that is the implementation being unavailable.
 */
function launchFailure(outcome: RawOutcome): RawOutcome {
  if (
    outcome.type === "crashed" && outcome.cause === "reported" &&
    outcome.errorName === "ImplementationUnavailable"
  ) {
    return { ...outcome, cause: "launch" };
  }
  return outcome;
}

function readIdentifier(outcome: RawOutcome): RawOutcome {
  if (outcome.type !== "success") {
    return launchFailure(outcome);
  }
  let value: unknown = JSON.parse(Buffer.from(outcome.stdout).toString("utf8"));
  if (typeof value !== "string") {
    return crashed(
      "protocol",
      `compute() must return a string, got ${typeof value}`,
      outcome.metrics,
    );
  }
  return { ...outcome, stdout: new Uint8Array(Buffer.from(value, "utf8")) };
}

/**
 * An implementation written in TypeScript or JavaScript, loaded into a
 * fresh worker thread for every invocation so that the sandbox can hold
 * it to its limits.
 */
export function inProcess(options: InProcessOptions): Implementation {
  let href = typeof options.module === "string"
    ? pathToFileURL(options.module).href
    : options.module.href;
  let discoveryLimits: Limits = {
    timeoutMs: options.discoveryTimeoutMs ?? 30_000,
  };
  let description: Description | undefined;

  function* describeModule(): Operation<Description> {
    if (!description) {
      let data: EntryData = { op: "describe", module: href };
      let outcome = yield* run({ type: "worker", entry: ENTRY, data }, discoveryLimits);
      description = readDiscoveryResponse(launchFailure(outcome), DescribeResponse);
    }
    return description;
  }

  return {
    name: options.name,
    kind: "in-process",
    *describe(): Operation<ImplementationInfo> {
      let { info } = yield* describeModule();
      return {
        version: info.version ?? "unknown",
        language: info.language ?? "typescript",
        description: info.description,
        name: options.name,
      };
    },
    *probe(): Operation<Availability> {
      if (!href.startsWith("file:")) {
        return { available: true, location: href };
      }
      let location = fileURLToPath(href);
      try {
        yield* until(access(location));
        return { available: true, location };
      } catch {
        return { available: false, reason: `${location} does not exist` };
      }
    },
    *capabilities() {
      if (options.capabilities) {
        return options.capabilities;
      }
      let { capabilities } = yield* describeModule();
      return capabilities;
    },
    *compute(request, limits) {
      let data: EntryData = {
        op: "compute",
        module: href,
        request: {
          payloadPath: request.payload.path,
          type: request.type,
          variant: request.variant.key,
          commit: request.commit,
          tag: request.tag,
        },
      };
      let outcome = yield* run({ type: "worker", entry: ENTRY, data }, limits);
      return readIdentifier(outcome);
    },
  };
}
