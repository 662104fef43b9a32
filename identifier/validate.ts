import { type Identifier, type ObjectType, parse } from "./identifier.ts";
import { isQualifierKey, qualifierText } from "./qualifiers.ts";
import type { VariantKey } from "./variant.ts";

export type ValidationCode =
  | "duplicate-qualifier"
  | "unknown-qualifier"
  | "invalid-lines"
  | "lines-without-content"
  | "invalid-visit"
  | "invalid-anchor"
  | "type-mismatch"
  | "variant-mismatch";

export interface ValidationIssue {
  readonly code: ValidationCode;
  readonly message: string;
}

/** what the caller asked the implementation to produce */
export interface Requested {
  readonly type?: ObjectType;
  readonly variant?: VariantKey;
}

const LINES = /^([0-9]+)(?:-([0-9]+))?$/;
const ANCHOR_TYPES: readonly ObjectType[] = ["dir", "rev", "rel", "snp"];

function checkReference(
  value: string,
  allowed: readonly ObjectType[],
): string | undefined {
  let nested = parse(value);
  if (!nested.ok) {
    return nested.error.message;
  }
  if (!allowed.includes(nested.value.type)) {
    return `expected a ${allowed.join("/")} identifier, got ${nested.value.type}`;
  }
  return undefined;
}

/**
 * Semantic checks on a well-formed identifier. An empty list means the
 * identifier is consistent with itself and with the request.
 */
export function validate(
  identifier: Identifier,
  requested: Requested = {},
): ValidationIssue[] {
  let issues: ValidationIssue[] = [];
  let seen = new Set<string>();

  for (let { key, value } of identifier.qualifiers) {
    if (seen.has(key)) {
      issues.push({
        code: "duplicate-qualifier",
        message: `qualifier '${key}' appears more than once`,
      });
    }
    seen.add(key);

    if (!isQualifierKey(key)) {
      issues.push({
        code: "unknown-qualifier",
        message: `unknown qualifier '${key}'`,
      });
      continue;
    }

    let text = qualifierText(value);
    switch (key) {
      case "lines": {
        let match = LINES.exec(text);
        let start = match ? Number(match[1]) : 0;
        let end = match?.[2] !== undefined ? Number(match[2]) : start;
        if (!match || start < 1 || end < start) {
          issues.push({
            code: "invalid-lines",
            message: `lines '${text}' is not a line number or ascending range`,
          });
        }
        if (identifier.type !== "cnt") {
          issues.push({
            code: "lines-without-content",
            message: `lines qualifier on a ${identifier.type} identifier`,
          });
        }
        break;
      }
      case "visit": {
        let problem = checkReference(text, ["snp"]);
        if (problem) {
          issues.push({ code: "invalid-visit", message: `visit: ${problem}` });
        }
        break;
      }
      case "anchor": {
        let problem = checkReference(text, ANCHOR_TYPES);
        if (problem) {
          issues.push({ code: "invalid-anchor", message: `anchor: ${problem}` });
        }
        break;
      }
    }
  }

  if (requested.type && identifier.type !== requested.type) {
    issues.push({
      code: "type-mismatch",
      message: `requested ${requested.type}, got ${identifier.type}`,
    });
  }
  if (requested.variant && identifier.variant?.key !== requested.variant) {
    issues.push({
      code: "variant-mismatch",
      message: `requested ${requested.variant}, got ${
        identifier.variant?.key ?? "an unknown variant"
      }`,
    });
  }

  return issues;
}
