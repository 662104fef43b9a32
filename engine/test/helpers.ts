import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { type Operation, until } from "effection";
import {
  type Availability,
  type ComputeRequest,
  type Implementation,
  useWorkDir,
} from "@swhid-conformance/adapter";
import {
  type CapabilityInput,
  defineCapabilities,
} from "@swhid-conformance/capability";
import type { RawOutcome } from "@swhid-conformance/sandbox";

export const HELLO_BLOB = "swh:1:cnt:ce013625030ba8dba906f756967f9e9ca394464a";
export const EMPTY_BLOB = "swh:1:cnt:e69de29bb2d1d6434b8b29ae775ad8c2e48c5391";

export const LIMITS = { timeoutMs: 20_000 };

export function answer(text: string): RawOutcome {
  return {
    type: "success",
    stdout: new TextEncoder().encode(text),
    stderr: "",
    metrics: { durationMs: 1 },
  };
}

export interface FakeOptions {
  availability?: Availability;
  capabilities?: CapabilityInput;
  version?: string;
  /** thrown from `capabilities()` */
  discoveryError?: Error;
  compute?: (request: ComputeRequest) => RawOutcome;
}

/**
 * An implementation that answers from a function, for exercising the
 * engine without launching anything.
 */
export function fake(name: string, options: FakeOptions = {}): Implementation & {
  calls: ComputeRequest[];
} {
  let calls: ComputeRequest[] = [];
  return {
    name,
    kind: "in-process",
    calls,
    *describe() {
      return { name, version: options.version ?? "1.0.0" };
    },
    *probe() {
      return options.availability ?? { available: true };
    },
    *capabilities() {
      if (options.discoveryError) {
        throw options.discoveryError;
      }
      return defineCapabilities(options.capabilities ?? { types: ["cnt", "dir"] });
    },
    *compute(request) {
      calls.push(request);
      return options.compute ? options.compute(request) : answer(HELLO_BLOB);
    },
  };
}

export function* useFiles(files: Record<string, string>): Operation<string> {
  let dir = yield* useWorkDir("swhid-engine-test-");
  for (let [name, content] of Object.entries(files)) {
    yield* until(writeFile(join(dir, name), content));
  }
  return dir;
}
