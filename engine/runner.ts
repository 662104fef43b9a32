import type { Operation } from "effection";
import { checkSupport, requirementsOf } from "@swhid-conformance/capability";
import {
  failed,
  fromClassification,
  type Result,
  skipped,
  unavailable,
} from "@swhid-conformance/consensus";
import { getVariant, type VariantKey } from "@swhid-conformance/identifier";
import type { Limits, RawOutcome } from "@swhid-conformance/sandbox";
import { classify } from "@swhid-conformance/taxonomy";
import type { TestCase } from "./cases.ts";
import { log } from "./logger.ts";
import type { RegisteredImplementation } from "./registry.ts";

/**
 * One invocation: one implementation, one test case, one variant. Never
 * throws for anything the implementation does.
 */
export function* runInvocation(
  entry: RegisteredImplementation,
  testCase: TestCase,
  variant: VariantKey,
  limits: Limits,
): Operation<Result> {
  let { implementation, availability, capabilities } = entry;
  let { name } = implementation;

  if (!availability.available || !capabilities) {
    return unavailable(
      name,
      availability.available ? "no capabilities" : availability.reason,
    );
  }

  let required = requirementsOf(testCase.expected[variant]);
  let support = checkSupport(capabilities, {
    ...required,
    type: testCase.type,
    variant,
    payloadBytes: testCase.payload?.sizeBytes,
    unicode: required.unicode || testCase.payload?.unicodeNames,
  });
  if (!support.supported) {
    return skipped(name, support.reason);
  }

  if (!testCase.payload) {
    return failed(name, {
      kind: "IO_ERROR",
      subtype: "payload",
      message: testCase.problem ?? `payload ${testCase.source} is not available`,
    });
  }

  let outcome: RawOutcome;
  try {
    outcome = yield* implementation.compute({
      payload: testCase.payload,
      type: testCase.type,
      variant: getVariant(variant),
      commit: testCase.commit,
      tag: testCase.tag,
    }, limits);
  } catch (error) {
    return failed(name, {
      kind: "IO_ERROR",
      subtype: "adapter",
      message: error instanceof Error ? error.message : String(error),
    });
  }

  let result = fromClassification(
    name,
    classify(outcome, { type: testCase.type, variant }),
    outcome.metrics,
  );
  yield* log.debug(
    `${testCase.id} ${variant} ${name}: ${result.status} in ${outcome.metrics.durationMs}ms`,
  );
  return result;
}
