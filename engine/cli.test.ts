import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { until } from "effection";
import { expect } from "expect";
import { describe, it } from "@swhid-conformance/bdd";
import { cli, type Output, parseArgs } from "./cli.ts";
import { ConfigError, UsageError } from "./errors.ts";
import { parseRecord } from "./record.ts";
import { setupLogging } from "./testing.ts";
import { HELLO_BLOB, useFiles } from "./test/helpers.ts";

function capture(): Output & { text(): string } {
  let chunks: string[] = [];
  return {
    write: (text) => {
      chunks.push(text);
    },
    text: () => chunks.join(""),
  };
}

const SUITE = [
  "settings:",
  "  concurrency: 2",
  "implementations:",
  "  - type: reference",
  "payloads:",
  "  content:",
  "    - name: hello",
  "      path: hello.txt",
  "      objectType: cnt",
  "      expected:",
  `        v1-sha1-hex: "${HELLO_BLOB}"`,
  "",
].join("\n");

describe("parseArgs", () => {
  it("parses the run command", function* () {
    let command = yield* parseArgs(["run", "--config", "suite.yaml", "-j", "3"]);
    expect(command).toMatchObject({
      command: "run",
      options: { config: "suite.yaml", concurrency: 3 },
    });
  });

  it("takes the identifier to validate as an argument", function* () {
    let command = yield* parseArgs(["validate", HELLO_BLOB, "--type", "cnt"]);
    expect(command).toMatchObject({
      command: "validate",
      options: { identifier: HELLO_BLOB, type: "cnt" },
    });
  });
});

describe("cli", () => {
  it("describes a valid identifier", function* () {
    yield* setupLogging();
    let output = capture();
    let code = yield* cli(["validate", HELLO_BLOB], output);

    expect(code).toEqual(0);
    expect(output.text()).toEqual([
      "scheme: swh",
      "version: 1",
      "type: cnt (content)",
      "hash: ce013625030ba8dba906f756967f9e9ca394464a",
      "variant: v1-sha1-hex",
      "valid",
      "",
    ].join("\n"));
  });

  it("fails an identifier of the wrong type", function* () {
    yield* setupLogging();
    let output = capture();
    let code = yield* cli(["validate", HELLO_BLOB, "--type", "dir"], output);

    expect(code).toEqual(1);
    expect(output.text().split("\n").slice(-3)).toEqual([
      "VALIDATION_ERROR: requested dir, got cnt",
      "invalid",
      "",
    ]);
  });

  it("fails text that does not parse", function* () {
    yield* setupLogging();
    let output = capture();
    let code = yield* cli(["validate", "swh:1:cnt"], output);

    expect(code).toEqual(1);
    expect(output.text()).toMatch(/^PARSE_ERROR: /);
  });

  it("refuses an unknown object type", function* () {
    yield* setupLogging();
    let error: unknown;
    try {
      yield* cli(["validate", HELLO_BLOB, "--type", "blob"], capture());
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(UsageError);
    expect(error).toMatchObject({ message: "unknown object type 'blob'" });
  });

  it("runs a suite and writes the record", function* () {
    yield* setupLogging();
    let dir = yield* useFiles({ "suite.yaml": SUITE, "hello.txt": "hello\n" });
    let recordPath = join(dir, "record.json");
    let output = capture();
    let code = yield* cli([
      "run",
      "--config",
      join(dir, "suite.yaml"),
      "--output",
      recordPath,
    ], output);

    expect(code).toEqual(0);
    expect(output.text()).toMatch(/^1 case\(s\) in \d+ms\nstatuses: conformant 1\n/);

    let record = parseRecord(JSON.parse(yield* until(readFile(recordPath, "utf8"))));
    expect(record.tests.map((t) => [t.id, t.outcome.status])).toEqual([
      ["content/hello", "conformant"],
    ]);
    expect(record.tests[0].results[0]).toMatchObject({
      implementation: "reference",
      status: "pass",
      swhid: HELLO_BLOB,
    });
  });

  it("refuses to run an implementation that is not configured", function* () {
    yield* setupLogging();
    let dir = yield* useFiles({ "suite.yaml": SUITE, "hello.txt": "hello\n" });
    let config = join(dir, "suite.yaml");
    let error: unknown;
    try {
      yield* cli(["run", "--config", config, "--impl", "nope"], capture());
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      message: `${config}: unknown implementation 'nope'`,
    });
  });
});
