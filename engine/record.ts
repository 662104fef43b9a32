import { createHash } from "node:crypto";
import { arch, platform, release } from "node:os";
import { z } from "zod";
import type { Verdict } from "@swhid-conformance/consensus";
import { ERROR_KINDS } from "@swhid-conformance/taxonomy";
import type { TestCase } from "./cases.ts";
import type { Settings } from "./config.ts";
import { RecordVersionError } from "./errors.ts";
import type { Registry } from "./registry.ts";
import type { CaseReport } from "./scheduler.ts";

export const SCHEMA_VERSION = "1.0.0";

const DiffEntrySchema = z.object({
  path: z.string(),
  expected: z.union([z.string(), z.number()]).optional(),
  actual: z.union([z.string(), z.number()]).optional(),
  category: z.enum(["value_mismatch", "missing_field", "ordering"]),
});

const ErrorRecordSchema = z.object({
  kind: z.enum(ERROR_KINDS),
  subtype: z.string(),
  message: z.string(),
  context: z.record(z.string(), z.union([z.string(), z.number()])).optional(),
  diff: z.array(DiffEntrySchema).optional(),
});

const VERDICTS = ["pass", "fail", "error", "skip", "unavailable", "undecided"] as const;

const ResultRecordSchema = z.object({
  implementation: z.string(),
  status: z.enum(VERDICTS),
  swhid: z.string().optional(),
  error: ErrorRecordSchema.optional(),
  reason: z.string().optional(),
  metrics: z.object({
    durationMs: z.number(),
    cpuMs: z.number().optional(),
    peakMemoryKb: z.number().optional(),
  }).optional(),
});

const OutcomeRecordSchema = z.object({
  status: z.enum([
    "conformant",
    "agreement",
    "pass",
    "fail",
    "disagreement",
    "skipped",
    "error",
  ]),
  consensus: z.string().optional(),
  golden: z.string().optional(),
  groups: z.array(z.object({ swhid: z.string(), members: z.array(z.string()) })),
  outliers: z.array(z.string()),
  blame: z.array(z.object({
    implementation: z.string(),
    kind: z.enum(ERROR_KINDS),
    subtype: z.string(),
  })).default([]),
  skipped: z.array(z.string()),
  unavailable: z.array(z.string()),
});

const TestRecordSchema = z.object({
  id: z.string(),
  category: z.string(),
  name: z.string(),
  description: z.string().optional(),
  variant: z.string(),
  payload: z.object({
    source: z.string(),
    path: z.string().optional(),
    objectType: z.string(),
    sizeBytes: z.number().optional(),
    commit: z.string().optional(),
    tag: z.string().optional(),
    ref: z.string().optional(),
    problem: z.string().optional(),
  }),
  expected: z.object({
    swhid: z.string().optional(),
    error: z.string().optional(),
  }),
  results: z.array(ResultRecordSchema),
  outcome: OutcomeRecordSchema,
});

const CapabilityRecordSchema = z.object({
  types: z.array(z.string()),
  variants: z.array(z.string()),
  qualifiers: z.array(z.string()),
  maxPayloadMb: z.number().optional(),
  supportsUnicode: z.boolean(),
  supportsPercentEncoding: z.boolean(),
});

const ImplementationRecordSchema = z.object({
  name: z.string(),
  kind: z.enum(["external", "in-process"]),
  version: z.string(),
  language: z.string().optional(),
  description: z.string().optional(),
  available: z.boolean(),
  reason: z.string().optional(),
  capabilities: CapabilityRecordSchema.optional(),
});

const CountsSchema = z.object({
  passed: z.number().int(),
  failed: z.number().int(),
  errored: z.number().int(),
  skipped: z.number().int(),
  unavailable: z.number().int(),
  undecided: z.number().int(),
});

export type Counts = z.output<typeof CountsSchema>;

/**
 * Newer minor versions may add fields, so unknown keys are kept.
 */
export const RecordSchema = z.object({
  schemaVersion: z.string(),
  run: z.object({
    id: z.string(),
    startedAt: z.string(),
    finishedAt: z.string(),
    durationMs: z.number(),
    host: z.object({
      platform: z.string(),
      arch: z.string(),
      release: z.string(),
      node: z.string(),
    }),
    settings: z.object({
      concurrency: z.number(),
      timeoutMs: z.number(),
      cpuMs: z.number().optional(),
      memoryMb: z.number().optional(),
      addressSpaceMb: z.number().optional(),
      variants: z.array(z.string()),
    }),
  }).passthrough(),
  implementations: z.array(ImplementationRecordSchema),
  tests: z.array(TestRecordSchema),
  aggregates: z.object({
    byImplementation: z.record(z.string(), CountsSchema),
    byStatus: z.record(z.string(), z.number()),
  }),
}).passthrough();

export type ConformanceRecord = z.output<typeof RecordSchema>;
export type TestRecord = z.output<typeof TestRecordSchema>;
export type ResultRecord = z.output<typeof ResultRecordSchema>;

const COUNT_KEYS: Record<Verdict, keyof Counts> = {
  pass: "passed",
  fail: "failed",
  error: "errored",
  skip: "skipped",
  unavailable: "unavailable",
  undecided: "undecided",
};

export function emptyCounts(): Counts {
  return { passed: 0, failed: 0, errored: 0, skipped: 0, unavailable: 0, undecided: 0 };
}

/**
 * `2026-10-18T09-30-00Z_1a2b3c`: sortable, and safe to use as a file name.
 */
export function createRunId(startedAt: Date, seed = `${process.pid}`): string {
  let stamp = startedAt.toISOString().replace(/\.\d+Z$/, "Z").replaceAll(":", "-");
  let suffix = createHash("sha1").update(`${stamp}:${seed}`).digest("hex").slice(0, 6);
  return `${stamp}_${suffix}`;
}

function expectedOf(testCase: TestCase, report: CaseReport): TestRecord["expected"] {
  if (testCase.expectedError !== undefined) {
    return { error: testCase.expectedError };
  }
  return { swhid: testCase.expected[report.variant]?.text };
}

function testRecord(report: CaseReport): TestRecord {
  let { testCase, outcome } = report;
  let blame = new Map(outcome.blame.map((b) => [b.implementation, b]));

  return {
    id: testCase.id,
    category: testCase.category,
    name: testCase.name,
    description: testCase.description,
    variant: report.variant,
    payload: {
      source: testCase.source,
      path: testCase.payload?.path,
      objectType: testCase.type,
      sizeBytes: testCase.payload?.sizeBytes,
      commit: testCase.commit,
      tag: testCase.tag,
      ref: testCase.ref,
      problem: testCase.problem,
    },
    expected: expectedOf(testCase, report),
    results: report.results.map((result): ResultRecord => {
      let assigned = blame.get(result.implementation);
      let failure = assigned?.failure ?? result.failure;
      return {
        implementation: result.implementation,
        status: outcome.verdicts[result.implementation] ?? "error",
        swhid: result.text,
        error: failure
          ? {
            kind: failure.kind,
            subtype: failure.subtype,
            message: failure.message,
            context: failure.context,
            diff: assigned?.diff ? [...assigned.diff] : undefined,
          }
          : undefined,
        reason: result.reason,
        metrics: result.metrics,
      };
    }),
    outcome: {
      status: outcome.status,
      consensus: outcome.consensus,
      golden: outcome.golden,
      groups: outcome.groups.map((group) => ({
        swhid: group.text,
        members: [...group.members],
      })),
      outliers: [...outcome.outliers],
      blame: outcome.blame.map(({ implementation, failure }) => ({
        implementation,
        kind: failure.kind,
        subtype: failure.subtype,
      })),
      skipped: [...outcome.skipped],
      unavailable: [...outcome.unavailable],
    },
  };
}

export interface RecordInput {
  readonly id?: string;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly settings: Settings;
  readonly registry: Registry;
  readonly reports: readonly CaseReport[];
}

export function buildRecord(input: RecordInput): ConformanceRecord {
  let { startedAt, finishedAt, settings, registry, reports } = input;
  let tests = reports.map(testRecord);

  let byImplementation: Record<string, Counts> = {};
  for (let { implementation } of registry.entries) {
    byImplementation[implementation.name] = emptyCounts();
  }
  let byStatus: Record<string, number> = {};
  for (let test of tests) {
    byStatus[test.outcome.status] = (byStatus[test.outcome.status] ?? 0) + 1;
    for (let result of test.results) {
      let counts = byImplementation[result.implementation] ??= emptyCounts();
      counts[COUNT_KEYS[result.status]] += 1;
    }
  }

  return {
    schemaVersion: SCHEMA_VERSION,
    run: {
      id: input.id ?? createRunId(startedAt),
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      host: {
        platform: platform(),
        arch: arch(),
        release: release(),
        node: process.version,
      },
      settings: {
        concurrency: settings.concurrency,
        timeoutMs: settings.timeoutMs,
        cpuMs: settings.cpuMs,
        memoryMb: settings.memoryMb,
        addressSpaceMb: settings.addressSpaceMb,
        variants: [...settings.variants],
      },
    },
    implementations: registry.entries.map(({ implementation, info, availability, capabilities }) => ({
      name: implementation.name,
      kind: implementation.kind,
      version: info.version,
      language: info.language,
      description: info.description,
      available: availability.available,
      reason: availability.available ? undefined : availability.reason,
      capabilities: capabilities
        ? {
          types: [...capabilities.types],
          variants: [...capabilities.variants],
          qualifiers: [...capabilities.qualifiers],
          maxPayloadMb: capabilities.maxPayloadMb,
          supportsUnicode: capabilities.supportsUnicode,
          supportsPercentEncoding: capabilities.supportsPercentEncoding,
        }
        : undefined,
    })),
    tests,
    aggregates: { byImplementation, byStatus },
  };
}

/**
 * Read a stored record. Any 1.x record is accepted.
 */
export function parseRecord(value: unknown): ConformanceRecord {
  if (typeof value === "object" && value !== null && "schemaVersion" in value) {
    let found = String(value.schemaVersion);
    if (found.split(".")[0] !== SCHEMA_VERSION.split(".")[0]) {
      throw new RecordVersionError(found, SCHEMA_VERSION);
    }
  }
  return RecordSchema.parse(value);
}

/** whether the run should make the process exit non-zero */
export function hasFailures(record: ConformanceRecord): boolean {
  return record.tests.some(({ outcome }) =>
    outcome.status === "fail" || outcome.status === "disagreement"
  );
}
