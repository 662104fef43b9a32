import { all, call, type Operation, type Task } from "effection";
import { compare, type Outcome, type Result } from "@swhid-conformance/consensus";
import type { VariantKey } from "@swhid-conformance/identifier";
import type { Limits } from "@swhid-conformance/sandbox";
import { expectationFor, type TestCase } from "./cases.ts";
import { log, namespace } from "./logger.ts";
import type { Registry } from "./registry.ts";
import { runInvocation } from "./runner.ts";
import { type TaskBuffer, useTaskBuffer } from "./task-buffer.ts";

export interface SuiteSettings {
  /** invocations running at the same time */
  concurrency: number;
  limits: Limits;
  variants: readonly VariantKey[];
}

export interface CaseReport {
  readonly testCase: TestCase;
  readonly variant: VariantKey;
  readonly results: readonly Result[];
  readonly outcome: Outcome;
}

function* runCase(
  buffer: TaskBuffer,
  registry: Registry,
  testCase: TestCase,
  variant: VariantKey,
  limits: Limits,
): Operation<CaseReport> {
  let tasks: Task<Result>[] = [];
  for (let entry of registry.entries) {
    tasks.push(
      yield* yield* buffer.spawn(() => runInvocation(entry, testCase, variant, limits)),
    );
  }
  // compare only once every invocation for this case is in
  let results = yield* all(tasks);
  let outcome = compare(results, expectationFor(testCase, variant));
  yield* log.info(`${testCase.id} ${variant}: ${outcome.status}`);
  return { testCase, variant, results, outcome };
}

/**
 * Run every implementation against every test case in every variant.
 * Reports come back in case order, then variant order.
 */
export function* runSuite(
  registry: Registry,
  cases: readonly TestCase[],
  settings: SuiteSettings,
): Operation<CaseReport[]> {
  return yield* call(function* () {
    yield* namespace("run");
    let buffer = yield* useTaskBuffer(settings.concurrency);
    return yield* all(
      cases.flatMap((testCase) =>
        settings.variants.map((variant) =>
          runCase(buffer, registry, testCase, variant, settings.limits)
        )
      ),
    );
  });
}
