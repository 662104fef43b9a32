import { Buffer, isUtf8 } from "node:buffer";
import {
  type Identifier,
  parse,
  type Requested,
  validate,
} from "@swhid-conformance/identifier";
import type { RawOutcome } from "@swhid-conformance/sandbox";
import type { Failure } from "./kinds.ts";

export type Classification =
  | { readonly ok: true; readonly identifier: Identifier; readonly text: string }
  | { readonly ok: false; readonly failure: Failure; readonly text?: string };

interface Subject {
  readonly outcome: RawOutcome;
  readonly requested: Requested;
  /** filled in by earlier rules */
  text?: string;
  identifier?: Identifier;
}

type Rule = (subject: Subject) => Failure | undefined;

const parseRule: Rule = (subject) => {
  let { outcome } = subject;
  if (outcome.type !== "success") {
    return undefined;
  }
  if (!isUtf8(outcome.stdout)) {
    return {
      kind: "PARSE_ERROR",
      subtype: "encoding",
      message: "output is not valid UTF-8",
    };
  }
  subject.text = Buffer.from(outcome.stdout).toString("utf8");
  let parsed = parse(subject.text);
  if (!parsed.ok) {
    return {
      kind: "PARSE_ERROR",
      subtype: "syntax",
      message: parsed.error.message,
    };
  }
  subject.identifier = parsed.value;
  return undefined;
};

const normalizeRule: Rule = ({ identifier }) => {
  if (!identifier || identifier.canonical) {
    return undefined;
  }
  let [first] = identifier.issues;
  return {
    kind: "NORMALIZE_ERROR",
    subtype: first.code,
    message: identifier.issues.map((issue) => issue.message).join("; "),
  };
};

const validationRule: Rule = ({ identifier, requested }) => {
  if (!identifier) {
    return undefined;
  }
  let issues = validate(identifier, requested);
  if (issues.length === 0) {
    return undefined;
  }
  return {
    kind: "VALIDATION_ERROR",
    subtype: issues[0].code,
    message: issues.map((issue) => issue.message).join("; "),
  };
};

const computeRule: Rule = ({ outcome }) => {
  if (outcome.type !== "crashed" || outcome.cause !== "reported") {
    return undefined;
  }
  return {
    kind: "COMPUTE_ERROR",
    subtype: outcome.errorName ?? "reported",
    message: outcome.detail,
  };
};

const timeoutRule: Rule = ({ outcome }) => {
  if (outcome.type !== "timed-out") {
    return undefined;
  }
  return {
    kind: "TIMEOUT",
    subtype: "wall-clock",
    message: `no result within ${outcome.limitMs}ms`,
    context: { limitMs: outcome.limitMs },
  };
};

const resourceRule: Rule = ({ outcome }) => {
  if (outcome.type !== "resource-exceeded") {
    return undefined;
  }
  return {
    kind: "RESOURCE_LIMIT",
    subtype: outcome.resource,
    message: outcome.detail,
    context: { limit: outcome.limit },
  };
};

const ioRule: Rule = ({ outcome }) => {
  if (outcome.type !== "crashed") {
    return undefined;
  }
  let context: Record<string, string | number> = {};
  if (outcome.exitCode !== undefined) {
    context.exitCode = outcome.exitCode;
  }
  if (outcome.signal !== undefined) {
    context.signal = outcome.signal;
  }
  return {
    kind: "IO_ERROR",
    subtype: outcome.cause === "launch" ? "unavailable" : outcome.cause,
    message: outcome.detail ||
      (outcome.signal ? `killed by ${outcome.signal}` : `exited with ${outcome.exitCode}`),
    context,
  };
};

/** first match wins */
export const RULES: readonly Rule[] = [
  parseRule,
  normalizeRule,
  validationRule,
  computeRule,
  timeoutRule,
  resourceRule,
  ioRule,
];

/**
 * Turn the raw outcome of one invocation into either the identifier it
 * produced or exactly one failure.
 */
export function classify(
  outcome: RawOutcome,
  requested: Requested = {},
): Classification {
  let subject: Subject = { outcome, requested };
  for (let rule of RULES) {
    let failure = rule(subject);
    if (failure) {
      return { ok: false, failure, text: subject.text };
    }
  }
  if (subject.identifier && subject.text !== undefined) {
    return { ok: true, identifier: subject.identifier, text: subject.text };
  }
  // every non-success outcome is matched by one of the rules above
  throw new Error(`unclassified outcome '${outcome.type}'`);
}
