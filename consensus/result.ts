import type { Identifier } from "@swhid-conformance/identifier";
import type { Metrics } from "@swhid-conformance/sandbox";
import {
  type Classification,
  type ErrorKind,
  type Failure,
  isAnswerFailure,
  isUnavailable,
} from "@swhid-conformance/taxonomy";

export type ResultStatus = "pass" | "fail" | "skip" | "error";

/**
 * One implementation's answer for one test case and variant, before it is
 * compared with anyone else's. `pass` only means a usable identifier came
 * back.
 */
export interface Result {
  readonly implementation: string;
  readonly status: ResultStatus;
  readonly identifier?: Identifier;
  /** what the implementation printed, when it was text */
  readonly text?: string;
  readonly failure?: Failure;
  /** why the invocation was not attempted */
  readonly reason?: string;
  readonly metrics?: Metrics;
}

/**
 * A wrong or unusable answer fails; anything that kept an answer from
 * being produced is an error.
 */
export function statusOf(kind: ErrorKind): "fail" | "error" {
  return isAnswerFailure(kind) ? "fail" : "error";
}

export function fromClassification(
  implementation: string,
  classification: Classification,
  metrics?: Metrics,
): Result {
  if (classification.ok) {
    return {
      implementation,
      status: "pass",
      identifier: classification.identifier,
      text: classification.text,
      metrics,
    };
  }
  return failed(implementation, classification.failure, metrics, classification.text);
}

export function failed(
  implementation: string,
  failure: Failure,
  metrics?: Metrics,
  text?: string,
): Result {
  return {
    implementation,
    status: statusOf(failure.kind),
    failure,
    text,
    metrics,
  };
}

export function skipped(implementation: string, reason: string): Result {
  return { implementation, status: "skip", reason };
}

export function unavailable(implementation: string, reason: string): Result {
  return failed(implementation, {
    kind: "IO_ERROR",
    subtype: "unavailable",
    message: reason,
  });
}

/** attempted, and able to be attempted */
export function isParticipant(result: Result): boolean {
  return result.status !== "skip" && !isUnavailable(result.failure);
}
