import type { Operation } from "effection";
import { crashed, type Launch, type Limits, type RawOutcome } from "./api.ts";
import { runProcess } from "./process.ts";
import { runWorker } from "./worker.ts";

/**
 * Execute one invocation under `limits`. Never throws on behalf of the
 * implementation: failing to even start it is a `crashed` outcome with
 * cause `launch`.
 */
export function* run(launch: Launch, limits: Limits): Operation<RawOutcome> {
  let started = performance.now();
  try {
    switch (launch.type) {
      case "process":
        return yield* runProcess(launch, limits);
      case "worker":
        return yield* runWorker(launch, limits);
    }
  } catch (error) {
    return crashed(
      "launch",
      error instanceof Error ? error.message : String(error),
      { durationMs: Math.round(performance.now() - started) },
      { errorName: error instanceof Error ? error.name : undefined },
    );
  }
}
