import { join } from "node:path";
import type { Operation } from "effection";
import { expect } from "expect";
import { describe, it } from "@swhid-conformance/bdd";
import type { TestCase } from "./cases.ts";
import { SettingsSchema } from "./config.ts";
import { RecordVersionError } from "./errors.ts";
import {
  buildRecord,
  type ConformanceRecord,
  createRunId,
  hasFailures,
  parseRecord,
  SCHEMA_VERSION,
} from "./record.ts";
import { createRegistry } from "./registry.ts";
import { runSuite } from "./scheduler.ts";
import { formatSummary } from "./summary.ts";
import { setupLogging } from "./testing.ts";
import { answer, EMPTY_BLOB, fake, HELLO_BLOB, LIMITS, useFiles } from "./test/helpers.ts";

const HELLO_HASH = "ce013625030ba8dba906f756967f9e9ca394464a";
const EMPTY_HASH = "e69de29bb2d1d6434b8b29ae775ad8c2e48c5391";

function* sampleRecord(): Operation<ConformanceRecord> {
  yield* setupLogging();
  let dir = yield* useFiles({ "hello.txt": "hello\n" });
  let path = join(dir, "hello.txt");
  let testCase: TestCase = {
    id: "content/hello",
    category: "content",
    name: "hello",
    type: "cnt",
    source: path,
    payload: { path, source: path, kind: "file", sizeBytes: 6 },
    expected: {},
  };
  let registry = yield* createRegistry([
    fake("a"),
    fake("b"),
    fake("odd", { compute: () => answer(EMPTY_BLOB) }),
    fake("gone", { availability: { available: false, reason: "not on PATH" } }),
  ]);
  let settings = SettingsSchema.parse({ concurrency: 2 });
  let reports = yield* runSuite(registry, [testCase], {
    concurrency: settings.concurrency,
    limits: LIMITS,
    variants: settings.variants,
  });
  return buildRecord({
    id: "run-1",
    startedAt: new Date("2026-10-18T09:30:00.000Z"),
    finishedAt: new Date("2026-10-18T09:30:01.500Z"),
    settings,
    registry,
    reports,
  });
}

describe("buildRecord", () => {
  it("describes the run", function* () {
    let record = yield* sampleRecord();
    expect(record.schemaVersion).toEqual(SCHEMA_VERSION);
    expect(record.run).toMatchObject({
      id: "run-1",
      startedAt: "2026-10-18T09:30:00.000Z",
      finishedAt: "2026-10-18T09:30:01.500Z",
      durationMs: 1500,
      settings: { concurrency: 2, timeoutMs: 30_000, variants: ["v1-sha1-hex"] },
    });
    expect(record.run.host.node).toEqual(process.version);
  });

  it("lists every implementation, available or not", function* () {
    let record = yield* sampleRecord();
    expect(record.implementations.map(({ name, available }) => [name, available]))
      .toEqual([["a", true], ["b", true], ["odd", true], ["gone", false]]);
    let gone = record.implementations[3];
    expect(gone.reason).toEqual("not on PATH");
    expect(gone.capabilities).toBeUndefined();
    expect(record.implementations[0].capabilities?.types).toEqual(["cnt", "dir"]);
  });

  it("records each verdict with the blame behind it", function* () {
    let record = yield* sampleRecord();
    let [test] = record.tests;
    expect(test).toMatchObject({
      id: "content/hello",
      variant: "v1-sha1-hex",
      payload: { objectType: "cnt", sizeBytes: 6 },
      expected: {},
      outcome: {
        status: "disagreement",
        consensus: HELLO_BLOB,
        groups: [
          { swhid: HELLO_BLOB, members: ["a", "b"] },
          { swhid: EMPTY_BLOB, members: ["odd"] },
        ],
        outliers: ["odd"],
        blame: [{ implementation: "odd", kind: "MISMATCH_ERROR", subtype: "outlier" }],
        unavailable: ["gone"],
      },
    });
    expect(test.results.map((r) => [r.implementation, r.status])).toEqual([
      ["a", "pass"],
      ["b", "pass"],
      ["odd", "fail"],
      ["gone", "unavailable"],
    ]);
    let odd = test.results[2];
    expect(odd.swhid).toEqual(EMPTY_BLOB);
    expect(odd.error).toMatchObject({
      kind: "MISMATCH_ERROR",
      subtype: "outlier",
      message: `produced ${EMPTY_BLOB}, while 2 agree on ${HELLO_BLOB}`,
      diff: [{
        path: "/hash",
        expected: HELLO_HASH,
        actual: EMPTY_HASH,
        category: "value_mismatch",
      }],
    });
  });

  it("counts verdicts per implementation and statuses per case", function* () {
    let record = yield* sampleRecord();
    expect(record.aggregates.byImplementation).toEqual({
      a: { passed: 1, failed: 0, errored: 0, skipped: 0, unavailable: 0, undecided: 0 },
      b: { passed: 1, failed: 0, errored: 0, skipped: 0, unavailable: 0, undecided: 0 },
      odd: { passed: 0, failed: 1, errored: 0, skipped: 0, unavailable: 0, undecided: 0 },
      gone: { passed: 0, failed: 0, errored: 0, skipped: 0, unavailable: 1, undecided: 0 },
    });
    expect(record.aggregates.byStatus).toEqual({ disagreement: 1 });
    expect(hasFailures(record)).toBe(true);
  });

  it("summarizes the run for the terminal", function* () {
    let record = yield* sampleRecord();
    expect(formatSummary(record).split("\n")).toEqual([
      "1 case(s) in 1500ms",
      "statuses: disagreement 1",
      "",
      "implementation  pass  fail  error  skip  unavailable  undecided",
      "a                  1     0      0     0            0          0",
      "b                  1     0      0     0            0          0",
      "odd                0     1      0     0            0          0",
      "gone               0     0      0     0            1          0",
      "",
      "problems:",
      "  content/hello v1-sha1-hex: disagreement",
      `    odd: MISMATCH_ERROR/outlier: produced ${EMPTY_BLOB}, while 2 agree on ${HELLO_BLOB}`,
    ]);
  });
});

describe("parseRecord", () => {
  it("reads back what was written", function* () {
    let record = yield* sampleRecord();
    expect(parseRecord(JSON.parse(JSON.stringify(record)))).toEqual(record);
  });

  it("accepts a newer minor version and keeps unknown fields", function* () {
    let record = yield* sampleRecord();
    let newer = { ...JSON.parse(JSON.stringify(record)), schemaVersion: "1.4.0", notes: "x" };
    expect(parseRecord(newer)).toMatchObject({ schemaVersion: "1.4.0", notes: "x" });
  });

  it("reads a record written before blame was recorded", function* () {
    let record = yield* sampleRecord();
    let written = JSON.parse(JSON.stringify(record));
    delete written.tests[0].outcome.blame;
    expect(parseRecord(written).tests[0].outcome.blame).toEqual([]);
  });

  it("refuses a different major version", function* () {
    let error: unknown;
    try {
      parseRecord({ schemaVersion: "2.0.0" });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(RecordVersionError);
    expect(error).toMatchObject({ found: "2.0.0", supported: SCHEMA_VERSION });
  });
});

describe("createRunId", () => {
  it("starts with a file name safe timestamp", function* () {
    let id = createRunId(new Date("2026-10-18T09:30:00.123Z"), "seed");
    expect(id).toMatch(/^2026-10-18T09-30-00Z_[0-9a-f]{6}$/);
    expect(createRunId(new Date("2026-10-18T09:30:00.123Z"), "seed")).toEqual(id);
  });
});
