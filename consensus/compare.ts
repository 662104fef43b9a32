import { Buffer } from "node:buffer";
import {
  compareBytes,
  equals,
  type Identifier,
  serialize,
} from "@swhid-conformance/identifier";
import {
  type ErrorKind,
  type Failure,
  isUnavailable,
} from "@swhid-conformance/taxonomy";
import { type DiffEntry, diffIdentifiers } from "./diff.ts";
import { isParticipant, type Result } from "./result.ts";

/**
 * What a test case documents about the right answer.
 */
export type Expectation =
  | { readonly type: "positive"; readonly golden?: Identifier }
  | { readonly type: "negative"; readonly errorKind?: ErrorKind };

export type CaseStatus =
  /** every implementation produced the golden value */
  | "conformant"
  /** no golden value, and every implementation produced the same one */
  | "agreement"
  /** negative case rejected by every implementation that attempted it */
  | "pass"
  | "fail"
  | "disagreement"
  /** nothing was attempted */
  | "skipped"
  /** no golden value, and nobody produced an identifier */
  | "error";

export type Verdict =
  | "pass"
  | "fail"
  | "error"
  | "skip"
  | "unavailable"
  /** part of a tie for the largest group */
  | "undecided";

export interface Group {
  /** canonical text shared by the members */
  readonly text: string;
  readonly identifier: Identifier;
  readonly members: readonly string[];
}

export interface Blame {
  readonly implementation: string;
  readonly failure: Failure;
  /** how the answer differs from the value it was held against */
  readonly diff?: readonly DiffEntry[];
}

export interface Outcome {
  readonly status: CaseStatus;
  /** canonical text of the unique largest group */
  readonly consensus?: string;
  readonly golden?: string;
  readonly groups: readonly Group[];
  readonly verdicts: Readonly<Record<string, Verdict>>;
  /** produced an identifier that is not the accepted one */
  readonly outliers: readonly string[];
  readonly blame: readonly Blame[];
  readonly skipped: readonly string[];
  readonly unavailable: readonly string[];
}

interface Member {
  result: Result;
  identifier: Identifier;
}

/**
 * Partition the successful results by structural equality. Larger groups
 * come first; groups of the same size are ordered by the bytes of their
 * canonical text.
 */
export function groupResults(results: readonly Result[]): Group[] {
  let groups: Array<{ identifier: Identifier; members: Member[] }> = [];
  for (let result of results) {
    let { identifier } = result;
    if (result.status !== "pass" || !identifier) {
      continue;
    }
    let group = groups.find((g) => equals(g.identifier, identifier));
    if (group) {
      group.members.push({ result, identifier });
    } else {
      groups.push({ identifier, members: [{ result, identifier }] });
    }
  }
  return groups
    .map(({ identifier, members }) => ({
      text: serialize(identifier),
      identifier,
      members: members.map(({ result }) => result.implementation),
    }))
    .sort((a, b) =>
      b.members.length - a.members.length ||
      compareBytes(Buffer.from(a.text, "utf8"), Buffer.from(b.text, "utf8"))
    );
}

function mismatch(
  implementation: string,
  subtype: string,
  message: string,
  diff?: DiffEntry[],
): Blame {
  return {
    implementation,
    failure: { kind: "MISMATCH_ERROR", subtype, message },
    diff,
  };
}

/**
 * Turn every result for one test case and variant into the case verdict.
 * Call only once all results are in.
 */
export function compare(
  results: readonly Result[],
  expectation: Expectation = { type: "positive" },
): Outcome {
  let skipped = results
    .filter((r) => r.status === "skip")
    .map((r) => r.implementation);
  let unavailable = results
    .filter((r) => isUnavailable(r.failure))
    .map((r) => r.implementation);
  let participants = results.filter(isParticipant);
  let groups = groupResults(participants);

  let verdicts: Record<string, Verdict> = {};
  for (let name of skipped) {
    verdicts[name] = "skip";
  }
  for (let name of unavailable) {
    verdicts[name] = "unavailable";
  }
  let blame: Blame[] = [];
  let outliers: string[] = [];

  let [largest, runnerUp] = groups;
  let majority = largest && (!runnerUp || runnerUp.members.length < largest.members.length)
    ? largest
    : undefined;
  let consensus = majority &&
      (majority.members.length >= 2 || participants.length === 1)
    ? majority.text
    : undefined;

  let base = { groups, skipped, unavailable, blame, outliers, verdicts };

  if (participants.length === 0) {
    return { ...base, status: "skipped" };
  }

  // a result that failed on its own account is blamed for that, whatever
  // the expectation
  let blameFailure = (result: Result, failure: Failure) => {
    verdicts[result.implementation] = result.status === "error" ? "error" : "fail";
    blame.push({ implementation: result.implementation, failure });
  };

  if (expectation.type === "negative") {
    let { errorKind } = expectation;
    for (let result of participants) {
      let { failure } = result;
      if (!failure) {
        verdicts[result.implementation] = "fail";
        blame.push(mismatch(
          result.implementation,
          "unexpected_success",
          `accepted a payload that must be rejected, producing ${result.text}`,
        ));
      } else if (errorKind === undefined || failure.kind === errorKind) {
        verdicts[result.implementation] = "pass";
      } else {
        blameFailure(result, failure);
      }
    }
    return { ...base, status: blame.length === 0 ? "pass" : "fail" };
  }

  let { golden } = expectation;
  if (golden) {
    let goldenText = serialize(golden);
    for (let result of participants) {
      let { failure, identifier } = result;
      if (failure || !identifier) {
        blameFailure(result, failure ?? {
          kind: "IO_ERROR",
          subtype: "no-result",
          message: "no identifier",
        });
      } else if (equals(identifier, golden)) {
        verdicts[result.implementation] = "pass";
      } else {
        verdicts[result.implementation] = "fail";
        outliers.push(result.implementation);
        blame.push(mismatch(
          result.implementation,
          "golden",
          `expected ${goldenText}, got ${serialize(identifier)}`,
          diffIdentifiers(golden, identifier),
        ));
      }
    }
    return {
      ...base,
      consensus,
      golden: goldenText,
      status: blame.length === 0 ? "conformant" : "fail",
    };
  }

  let top = largest ? largest.members.length : 0;
  for (let result of participants) {
    let { failure, identifier } = result;
    if (failure || !identifier) {
      blameFailure(result, failure ?? {
        kind: "IO_ERROR",
        subtype: "no-result",
        message: "no identifier",
      });
      continue;
    }
    let group = groups.find((g) => g.members.includes(result.implementation));
    if (!group || group === majority) {
      verdicts[result.implementation] = "pass";
    } else if (group.members.length === top) {
      verdicts[result.implementation] = "undecided";
    } else {
      verdicts[result.implementation] = "fail";
      outliers.push(result.implementation);
      let against = majority ?? largest;
      blame.push(mismatch(
        result.implementation,
        majority ? "outlier" : "minority",
        `produced ${group.text}, while ${against.members.length} agree on ${against.text}`,
        diffIdentifiers(against.identifier, identifier),
      ));
    }
  }

  let status: CaseStatus;
  if (groups.length === 0) {
    status = "error";
  } else if (groups.length === 1 && blame.length === 0) {
    status = "agreement";
  } else {
    status = "disagreement";
  }
  return { ...base, consensus, status };
}
