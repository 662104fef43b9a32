import { Buffer } from "node:buffer";
import { Worker } from "node:worker_threads";
import {
  call,
  type Operation,
  race,
  sleep,
  until,
  withResolvers,
} from "effection";
import {
  crashed,
  errnoCode,
  type Limits,
  type Metrics,
  type RawOutcome,
  type WorkerLaunch,
} from "./api.ts";
import { WorkerResultSchema } from "./messages.ts";

const SAMPLE_INTERVAL_MS = 20;

type Settlement =
  | { type: "message"; message: unknown }
  | { type: "error"; error: Error }
  | { type: "exit"; code: number };

/**
 * Run an in-process implementation on its own worker thread. The V8 heap
 * of the worker is capped, its event loop time is watched against the CPU
 * budget, and it is terminated once it finishes or breaks a limit.
 */
export function runWorker(
  launch: WorkerLaunch,
  limits: Limits,
): Operation<RawOutcome> {
  return call(function* () {
    let started = performance.now();
    let usage: { cpuMs?: number; peakMemoryKb?: number } = {};
    let metrics = (): Metrics => ({
      durationMs: Math.round(performance.now() - started),
      ...usage,
    });

    let worker = new Worker(launch.entry, {
      workerData: launch.data,
      resourceLimits: limits.memoryMb !== undefined
        ? { maxOldGenerationSizeMb: limits.memoryMb }
        : undefined,
      stderr: true,
    });

    let stderr: Buffer[] = [];
    worker.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    let settlement = withResolvers<Settlement>();
    let settled = false;
    let settle = (value: Settlement) => {
      if (!settled) {
        settled = true;
        settlement.resolve(value);
      }
    };
    worker.once("message", (message: unknown) => settle({ type: "message", message }));
    worker.once("error", (error: Error) => settle({ type: "error", error }));
    worker.once("exit", (code: number) => settle({ type: "exit", code }));

    function* completion(): Operation<RawOutcome> {
      let ended = yield* settlement.operation;
      let diagnostic = Buffer.concat(stderr).toString("utf8");
      switch (ended.type) {
        case "error": {
          if (errnoCode(ended.error) === "ERR_WORKER_OUT_OF_MEMORY") {
            return {
              type: "resource-exceeded",
              resource: "memory",
              limit: limits.memoryMb ?? 0,
              detail: ended.error.message,
              metrics: metrics(),
            };
          }
          return crashed("exit", ended.error.message, metrics(), {
            errorName: ended.error.name,
          });
        }
        case "exit":
          return crashed(
            "exit",
            diagnostic || `worker exited with code ${ended.code} without a result`,
            metrics(),
            { exitCode: ended.code },
          );
        case "message": {
          let parsed = WorkerResultSchema.safeParse(ended.message);
          if (!parsed.success) {
            return crashed(
              "protocol",
              `unexpected worker message: ${parsed.error.message}`,
              metrics(),
            );
          }
          let result = parsed.data;
          if (result.heapUsedKb !== undefined) {
            usage.peakMemoryKb = result.heapUsedKb;
          }
          if (!result.ok) {
            return crashed("reported", result.error.message, metrics(), {
              errorName: result.error.name,
            });
          }
          return {
            type: "success",
            stdout: new Uint8Array(
              Buffer.from(JSON.stringify(result.value ?? null), "utf8"),
            ),
            stderr: diagnostic,
            metrics: metrics(),
          };
        }
      }
    }

    function* deadline(): Operation<RawOutcome> {
      yield* sleep(limits.timeoutMs);
      return { type: "timed-out", limitMs: limits.timeoutMs, metrics: metrics() };
    }

    function* watchdog(): Operation<RawOutcome> {
      let interval = limits.sampleIntervalMs ?? SAMPLE_INTERVAL_MS;
      while (true) {
        yield* sleep(interval);
        let { active } = worker.performance.eventLoopUtilization();
        usage.cpuMs = Math.round(active);
        if (limits.cpuMs !== undefined && active > limits.cpuMs) {
          return {
            type: "resource-exceeded",
            resource: "cpu",
            limit: limits.cpuMs,
            detail: `event loop busy for ${Math.round(active)}ms over ${limits.cpuMs}ms`,
            metrics: metrics(),
          };
        }
      }
    }

    try {
      return yield* race([completion(), deadline(), watchdog()]);
    } finally {
      yield* until(worker.terminate());
    }
  });
}
