import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type Operation, resource, until } from "effection";

/**
 * A scratch directory for one invocation, removed with the scope.
 */
export function useWorkDir(prefix = "swhid-impl-"): Operation<string> {
  return resource(function* (provide) {
    let dir = yield* until(mkdtemp(join(tmpdir(), prefix)));
    try {
      yield* provide(dir);
    } finally {
      yield* until(rm(dir, { recursive: true, force: true }));
    }
  });
}
