import { stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import process from "node:process";
import { type Operation, until } from "effection";
import { getVariant, type ObjectType, type VariantKey } from "@swhid-conformance/identifier";
import type { ComputeRequest } from "../types.ts";
import { useWorkDir } from "../workdir.ts";

export const HELLO_BLOB = "swh:1:cnt:ce013625030ba8dba906f756967f9e9ca394464a";

export function fixture(name: string): string {
  return new URL(`./fixtures/${name}`, import.meta.url).pathname;
}

export function nodeCommand(script: string): [string, ...string[]] {
  return [process.execPath, fixture(script)];
}

export function* useHelloFile(): Operation<string> {
  let dir = yield* useWorkDir("swhid-test-");
  let path = join(dir, "hello.txt");
  yield* until(writeFile(path, "hello\n"));
  return path;
}

export function* request(
  path: string,
  type: ObjectType = "cnt",
  variant: VariantKey = "v1-sha1-hex",
): Operation<ComputeRequest> {
  let info = yield* until(stat(path));
  return {
    payload: {
      path,
      source: path,
      kind: info.isDirectory() ? "directory" : "file",
      sizeBytes: info.size,
    },
    type,
    variant: getVariant(variant),
  };
}

export const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

export const LIMITS = { timeoutMs: 20_000 };
