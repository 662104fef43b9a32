import { Buffer } from "node:buffer";
import { createHash } from "node:crypto";
import { lstat, readdir, readFile, readlink } from "node:fs/promises";
import { type Operation, until } from "effection";
import { compareBytes, type HashAlgorithm } from "@swhid-conformance/identifier";

export const MODES = {
  file: "100644",
  executable: "100755",
  symlink: "120000",
  directory: "40000",
} as const;

export type Mode = typeof MODES[keyof typeof MODES];

export interface TreeEntry {
  readonly mode: Mode;
  /** raw bytes of the name, exactly as the file system returned them */
  readonly name: Uint8Array;
  readonly hash: Uint8Array;
}

const SLASH = Buffer.from("/");
const NUL = Buffer.from([0]);

/**
 * Hash of a git object: a `<kind> <length>\0` header followed by the body.
 */
export function hashObject(
  kind: "blob" | "tree",
  body: Uint8Array,
  algorithm: HashAlgorithm,
): Uint8Array {
  let hash = createHash(algorithm);
  hash.update(`${kind} ${body.length}\0`);
  hash.update(body);
  return new Uint8Array(hash.digest());
}

// git compares a directory entry as if its name ended with a slash
function sortKey(entry: TreeEntry): Uint8Array {
  return entry.mode === MODES.directory
    ? Buffer.concat([entry.name, SLASH])
    : entry.name;
}

export function encodeTree(entries: readonly TreeEntry[]): Uint8Array {
  let sorted = [...entries].sort((a, b) => compareBytes(sortKey(a), sortKey(b)));
  return Buffer.concat(sorted.flatMap((entry) => [
    Buffer.from(`${entry.mode} `),
    entry.name,
    NUL,
    entry.hash,
  ]));
}

export function* hashContent(
  path: string | Buffer,
  algorithm: HashAlgorithm,
): Operation<Uint8Array> {
  let bytes = yield* until(readFile(path));
  return hashObject("blob", bytes, algorithm);
}

function* hashEntry(
  path: Buffer,
  name: Buffer,
  algorithm: HashAlgorithm,
): Operation<TreeEntry> {
  let info = yield* until(lstat(path));
  if (info.isSymbolicLink()) {
    let target = yield* until(readlink(path, { encoding: "buffer" }));
    return { mode: MODES.symlink, name, hash: hashObject("blob", target, algorithm) };
  }
  if (info.isDirectory()) {
    return {
      mode: MODES.directory,
      name,
      hash: yield* hashDirectory(path, algorithm),
    };
  }
  if (info.isFile()) {
    return {
      mode: info.mode & 0o111 ? MODES.executable : MODES.file,
      name,
      hash: yield* hashContent(path, algorithm),
    };
  }
  throw new Error(`${path.toString()} has an unsupported file type`);
}

/**
 * Hash a directory tree the way git would store it, with empty
 * directories kept. Names are never decoded, so any byte sequence the file
 * system allows is hashed as is.
 */
export function* hashDirectory(
  path: string | Buffer,
  algorithm: HashAlgorithm,
): Operation<Uint8Array> {
  let root = typeof path === "string" ? Buffer.from(path) : path;
  let names = yield* until(readdir(root, { encoding: "buffer" }));
  let entries: TreeEntry[] = [];
  for (let name of names) {
    entries.push(yield* hashEntry(Buffer.concat([root, SLASH, name]), name, algorithm));
  }
  return hashObject("tree", encodeTree(entries), algorithm);
}
