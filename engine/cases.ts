import type { Operation } from "effection";
import {
  CommandError,
  discoverAnnotatedTags,
  discoverBranches,
  PayloadError,
  ReferenceResolutionError,
  type ResolvedPayload,
  resolveReference,
  usePayload,
} from "@swhid-conformance/adapter";
import type { Expectation } from "@swhid-conformance/consensus";
import type {
  Identifier,
  ObjectType,
  VariantKey,
} from "@swhid-conformance/identifier";
import type { ErrorKind } from "@swhid-conformance/taxonomy";
import type { PayloadEntry } from "./config.ts";
import { log } from "./logger.ts";

export type Goldens = Partial<Record<VariantKey, Identifier>>;

export interface TestCase {
  /** `<category>/<name>`, followed by the ref for discovered cases */
  readonly id: string;
  readonly category: string;
  readonly name: string;
  readonly description?: string;
  readonly type: ObjectType;
  /** the path as configured */
  readonly source: string;
  readonly payload?: ResolvedPayload;
  /** why the payload could not be prepared; every invocation fails with it */
  readonly problem?: string;
  readonly commit?: string;
  readonly tag?: string;
  /** branch or tag name a discovered case was created for */
  readonly ref?: string;
  readonly expected: Goldens;
  readonly expectedError?: ErrorKind | "any";
}

export interface ExpandOptions {
  /** only these payload categories */
  categories?: readonly string[];
}

export function expectationFor(testCase: TestCase, variant: VariantKey): Expectation {
  if (testCase.expectedError !== undefined) {
    return {
      type: "negative",
      errorKind: testCase.expectedError === "any" ? undefined : testCase.expectedError,
    };
  }
  return { type: "positive", golden: testCase.expected[variant] };
}

function goldens(identifier: Identifier | undefined): Goldens {
  return identifier?.variant ? { [identifier.variant.key]: identifier } : {};
}

function isPreparationError(error: unknown): error is Error {
  return error instanceof PayloadError || error instanceof CommandError ||
    error instanceof ReferenceResolutionError;
}

function* expandEntry(category: string, entry: PayloadEntry): Operation<TestCase[]> {
  let base: TestCase = {
    id: `${category}/${entry.name}`,
    category,
    name: entry.name,
    description: entry.description,
    type: entry.objectType,
    source: entry.path,
    expected: entry.expected,
    expectedError: entry.expectedError,
  };

  let payload: ResolvedPayload;
  try {
    payload = yield* usePayload(entry.path);
  } catch (error) {
    if (!isPreparationError(error)) {
      throw error;
    }
    yield* log.warn(`${base.id}: ${error.message}`);
    return [{ ...base, problem: error.message }];
  }

  let repository = entry.repository ?? payload.path;
  try {
    let commit = entry.commit
      ? yield* resolveReference(repository, entry.commit, "commit")
      : undefined;
    let tag = entry.tag ? yield* resolveReference(repository, entry.tag, "tag") : undefined;
    let cases: TestCase[] = [{ ...base, payload, commit, tag }];

    if (entry.discoverBranches) {
      for (let branch of yield* discoverBranches(repository)) {
        cases.push({
          ...base,
          id: `${base.id}/branches/${branch.name}`,
          type: "rev",
          payload,
          commit: branch.target,
          ref: branch.name,
          expected: goldens(entry.expectedRefs.branches[branch.name]),
          expectedError: undefined,
        });
      }
    }
    if (entry.discoverTags) {
      for (let tag of yield* discoverAnnotatedTags(repository)) {
        cases.push({
          ...base,
          id: `${base.id}/tags/${tag.name}`,
          type: "rel",
          payload,
          tag: tag.target,
          ref: tag.name,
          expected: goldens(entry.expectedRefs.tags[tag.name]),
          expectedError: undefined,
        });
      }
    }
    if (cases.length > 1) {
      yield* log.debug(`${base.id}: discovered ${cases.length - 1} references`);
    }
    return cases;
  } catch (error) {
    if (!isPreparationError(error)) {
      throw error;
    }
    yield* log.warn(`${base.id}: ${error.message}`);
    return [{ ...base, payload, problem: error.message }];
  }
}

/**
 * Turn configured payloads into test cases. Payloads are prepared in the
 * caller's scope and stay available until it exits; symbolic references
 * are resolved to full object ids here, before anything is invoked.
 */
export function* expandCases(
  payloads: Readonly<Record<string, readonly PayloadEntry[]>>,
  options: ExpandOptions = {},
): Operation<TestCase[]> {
  let cases: TestCase[] = [];
  for (let [category, entries] of Object.entries(payloads)) {
    if (options.categories && !options.categories.includes(category)) {
      continue;
    }
    for (let entry of entries) {
      cases.push(...yield* expandEntry(category, entry));
    }
  }
  return cases;
}
