import { all } from "effection";
import { expect } from "expect";
import { describe, it } from "@swhid-conformance/bdd";
import { run } from "../src/sandbox.ts";
import { decode } from "./helpers.ts";

const entry = (name: string) => new URL(`./fixtures/${name}`, import.meta.url);

describe("worker sandbox", () => {
  it("returns the JSON encoded value of the worker", function* () {
    let outcome = yield* run(
      { type: "worker", entry: entry("echo-worker.ts"), data: { hash: "sha1" } },
      { timeoutMs: 10_000 },
    );
    expect(outcome.type).toEqual("success");
    if (outcome.type === "success") {
      expect(JSON.parse(decode(outcome.stdout))).toEqual({
        echo: { hash: "sha1" },
      });
      expect(outcome.metrics.peakMemoryKb).toBeGreaterThan(0);
    }
  });

  it("reports an error raised by the implementation", function* () {
    let outcome = yield* run(
      { type: "worker", entry: entry("throw-worker.ts"), data: null },
      { timeoutMs: 10_000 },
    );
    expect(outcome).toMatchObject({
      type: "crashed",
      cause: "reported",
      errorName: "UnsupportedPayload",
      detail: "cannot hash sockets",
    });
  });

  it("terminates a worker that outlives its budget", function* () {
    let [slow, fast] = yield* all([
      run({ type: "worker", entry: entry("wait-worker.ts"), data: null }, {
        timeoutMs: 1_000,
      }),
      run({ type: "worker", entry: entry("echo-worker.ts"), data: 1 }, {
        timeoutMs: 10_000,
      }),
    ]);
    expect(slow).toMatchObject({ type: "timed-out", limitMs: 1_000 });
    expect(fast.type).toEqual("success");
  });

  it("terminates a worker that spends its CPU budget", function* () {
    let outcome = yield* run(
      { type: "worker", entry: entry("spin-worker.ts"), data: null },
      { timeoutMs: 20_000, cpuMs: 300 },
    );
    expect(outcome).toMatchObject({
      type: "resource-exceeded",
      resource: "cpu",
      limit: 300,
    });
  });

  it("reports a worker that exhausts its heap", function* () {
    let outcome = yield* run(
      { type: "worker", entry: entry("hog-worker.ts"), data: null },
      { timeoutMs: 20_000, memoryMb: 32 },
    );
    expect(outcome).toMatchObject({
      type: "resource-exceeded",
      resource: "memory",
      limit: 32,
    });
  });

  it("reports a worker module that cannot be loaded", function* () {
    let outcome = yield* run(
      { type: "worker", entry: entry("missing-worker.ts"), data: null },
      { timeoutMs: 10_000 },
    );
    expect(outcome).toMatchObject({ type: "crashed" });
  });
});
