import { Buffer } from "node:buffer";
import type { Stats } from "node:fs";
import { lstat, mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type Operation, resource, until } from "effection";
import { errnoCode } from "@swhid-conformance/sandbox";
import { CommandError, PayloadError } from "./errors.ts";
import { exec } from "./exec.ts";
import type { ResolvedPayload } from "./types.ts";

const ARCHIVE = /\.(tar\.gz|tgz)$/;
const SLASH = Buffer.from("/");

/**
 * Run one step of preparing a payload. File system failures become a
 * `PayloadError` naming the payload.
 */
function* preparing<T>(source: string, step: () => Operation<T>): Operation<T> {
  try {
    return yield* step();
  } catch (error) {
    if (error instanceof PayloadError || error instanceof CommandError) {
      throw error;
    }
    if (error instanceof Error && errnoCode(error) !== undefined) {
      throw new PayloadError(source, error.message);
    }
    throw error;
  }
}

function* stat(path: string): Operation<Stats> {
  try {
    return yield* until(lstat(path));
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      throw new PayloadError(path, "does not exist");
    }
    throw error;
  }
}

export interface Survey {
  sizeBytes: number;
  /** some entry name below the root has a byte outside ASCII */
  unicodeNames: boolean;
}

/**
 * Total size of a tree in bytes, and whether any name in it leaves ASCII.
 * Symbolic links count as themselves and are never followed. Names are
 * read as raw bytes, so entries whose names are not valid UTF-8 are
 * measured like any other.
 */
export function* survey(path: string | Buffer): Operation<Survey> {
  let info = yield* until(lstat(path));
  if (!info.isDirectory()) {
    return { sizeBytes: info.size, unicodeNames: false };
  }
  let root = typeof path === "string" ? Buffer.from(path) : path;
  let total: Survey = { sizeBytes: 0, unicodeNames: false };
  for (let name of yield* until(readdir(root, { encoding: "buffer" }))) {
    let entry = yield* survey(Buffer.concat([root, SLASH, name]));
    total.sizeBytes += entry.sizeBytes;
    total.unicodeNames = total.unicodeNames || entry.unicodeNames ||
      name.some((byte) => byte >= 0x80);
  }
  return total;
}

function* extract(archive: string, into: string): Operation<string> {
  yield* exec("tar", ["-xzf", archive, "-C", into]);
  let names = yield* until(readdir(into, { encoding: "buffer" }));
  let [only] = names;
  if (names.length !== 1) {
    return into;
  }
  let path = Buffer.concat([Buffer.from(into), SLASH, only]);
  if (!(yield* until(lstat(path))).isDirectory()) {
    return into;
  }
  let name = only.toString("utf8");
  if (!Buffer.from(name, "utf8").equals(only)) {
    throw new PayloadError(archive, "archive root directory name is not valid UTF-8");
  }
  return join(into, name);
}

/**
 * Make a payload available on disk for as long as the calling scope
 * lives. Archives are unpacked into a temporary directory that is removed
 * afterwards; everything else is used in place.
 */
export function usePayload(source: string): Operation<ResolvedPayload> {
  return resource(function* (provide) {
    let info = yield* preparing(source, () => stat(source));

    if (info.isFile() && ARCHIVE.test(source)) {
      let dir = yield* preparing(
        source,
        () => until(mkdtemp(join(tmpdir(), "swhid-payload-"))),
      );
      try {
        let path = yield* preparing(source, () => extract(source, dir));
        let contents = yield* preparing(source, () => survey(path));
        yield* provide({ path, source, kind: "directory", ...contents });
      } finally {
        yield* until(rm(dir, { recursive: true, force: true }));
      }
    } else {
      let contents = yield* preparing(source, () => survey(source));
      yield* provide({
        path: source,
        source,
        kind: info.isDirectory() ? "directory" : "file",
        ...contents,
      });
    }
  });
}
