import type { Operation } from "effection";
import { CommandError, ReferenceResolutionError } from "./errors.ts";
import { exec } from "./exec.ts";

const FULL_OBJECT_ID = /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/;

export type ReferenceKind = "commit" | "tag";

export interface DiscoveredRef {
  name: string;
  /** full object id the ref points at */
  target: string;
}

function* git(repository: string, args: string[], ref: string): Operation<string> {
  try {
    return yield* exec("git", args, { cwd: repository });
  } catch (error) {
    if (error instanceof CommandError) {
      throw new ReferenceResolutionError(repository, ref, error.message);
    }
    throw error;
  }
}

/**
 * Turn a branch, tag or abbreviated hash into the full object id, so that
 * every implementation is handed the same unambiguous input. A commit
 * reference is peeled to the commit; a tag reference resolves to the tag
 * object itself.
 */
export function* resolveReference(
  repository: string,
  ref: string,
  kind: ReferenceKind = "commit",
): Operation<string> {
  if (FULL_OBJECT_ID.test(ref)) {
    return ref;
  }
  let revspec = kind === "commit" ? `${ref}^{commit}` : `refs/tags/${ref}`;
  let output = yield* git(repository, ["rev-parse", "--verify", revspec], ref);
  return output.trim();
}

function* forEachRef(
  repository: string,
  prefix: string,
): Operation<Array<{ type: string; name: string; target: string }>> {
  let output = yield* git(repository, [
    "for-each-ref",
    "--format=%(objecttype)%09%(refname:short)%09%(objectname)",
    prefix,
  ], prefix);
  return output.split("\n").filter(Boolean).map((line) => {
    let [type, name, target] = line.split("\t");
    return { type, name, target };
  });
}

export function* discoverBranches(repository: string): Operation<DiscoveredRef[]> {
  let refs = yield* forEachRef(repository, "refs/heads");
  return refs.map(({ name, target }) => ({ name, target }));
}

/**
 * Annotated tags only: a lightweight tag is just a name for a commit and
 * has no release object of its own.
 */
export function* discoverAnnotatedTags(
  repository: string,
): Operation<DiscoveredRef[]> {
  let refs = yield* forEachRef(repository, "refs/tags");
  return refs
    .filter(({ type }) => type === "tag")
    .map(({ name, target }) => ({ name, target }));
}
