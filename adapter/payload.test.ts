import { Buffer } from "node:buffer";
import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import process from "node:process";
import { call, until } from "effection";
import { expect } from "expect";
import { describe, it } from "@swhid-conformance/bdd";
import { PayloadError } from "./errors.ts";
import { exec } from "./exec.ts";
import { survey, usePayload } from "./payload.ts";
import { useWorkDir } from "./workdir.ts";

function* tree(root: string) {
  yield* until(mkdir(join(root, "tree", "sub"), { recursive: true }));
  yield* until(writeFile(join(root, "tree", "a.txt"), "abc"));
  yield* until(writeFile(join(root, "tree", "sub", "b.txt"), "defg"));
  return join(root, "tree");
}

describe("payloads", () => {
  it("uses a file in place", function* () {
    let dir = yield* useWorkDir();
    let path = join(dir, "hello.txt");
    yield* until(writeFile(path, "hello\n"));
    expect(yield* usePayload(path)).toEqual({
      path,
      source: path,
      kind: "file",
      sizeBytes: 6,
      unicodeNames: false,
    });
  });

  it("uses a directory in place", function* () {
    let path = yield* tree(yield* useWorkDir());
    expect(yield* usePayload(path)).toEqual({
      path,
      source: path,
      kind: "directory",
      sizeBytes: 7,
      unicodeNames: false,
    });
  });

  it("measures a tree by the bytes of its files", function* () {
    let path = yield* tree(yield* useWorkDir());
    expect(yield* survey(join(path, "sub"))).toEqual({
      sizeBytes: 4,
      unicodeNames: false,
    });
  });

  it("measures entries whose names are not UTF-8", function* () {
    // other platforms refuse such names when they are created
    if (process.platform !== "linux") {
      return;
    }
    let path = yield* tree(yield* useWorkDir());
    let name = Buffer.concat([
      Buffer.from(`${path}/f`),
      Buffer.from([0xe9]),
      Buffer.from(".t"),
    ]);
    yield* until(writeFile(name, "xyz"));
    expect(yield* usePayload(path)).toEqual({
      path,
      source: path,
      kind: "directory",
      sizeBytes: 10,
      unicodeNames: true,
    });
  });

  it("fails on a missing payload", function* () {
    let dir = yield* useWorkDir();
    let missing = join(dir, "nothing-here");
    let error: unknown;
    try {
      yield* usePayload(missing);
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(PayloadError);
    expect(error).toMatchObject({
      message: `payload ${missing}: does not exist`,
    });
  });

  it("reports a file system failure as a payload error", function* () {
    let dir = yield* useWorkDir();
    let file = join(dir, "plain.txt");
    yield* until(writeFile(file, "abc"));
    let path = join(file, "inside");
    let error: unknown;
    try {
      yield* usePayload(path);
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(PayloadError);
    expect(error).toMatchObject({
      path,
      message: expect.stringContaining(`payload ${path}: ENOTDIR`),
    });
  });

  it("unpacks an archive for the duration of the scope", function* () {
    let dir = yield* useWorkDir();
    yield* tree(dir);
    let archive = join(dir, "tree.tar.gz");
    yield* exec("tar", ["-czf", archive, "-C", dir, "tree"]);

    let extracted = yield* call(function* () {
      let payload = yield* usePayload(archive);
      expect(payload).toMatchObject({
        source: archive,
        kind: "directory",
        sizeBytes: 7,
      });
      expect(basename(payload.path)).toEqual("tree");
      expect(existsSync(join(payload.path, "sub", "b.txt"))).toBe(true);
      return payload.path;
    });

    expect(existsSync(extracted)).toBe(false);
  });
});
