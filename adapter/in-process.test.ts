import { expect } from "expect";
import { describe, it } from "@swhid-conformance/bdd";
import { defineCapabilities } from "@swhid-conformance/capability";
import { inProcess } from "./in-process.ts";
import {
  decode,
  fixture,
  HELLO_BLOB,
  LIMITS,
  request,
  useHelloFile,
} from "./test/helpers.ts";

describe("in-process implementations", () => {
  let blob = () =>
    inProcess({ name: "blob", module: fixture("blob-implementation.ts") });

  it("computes on a worker thread", function* () {
    let path = yield* useHelloFile();
    let outcome = yield* blob().compute(yield* request(path), LIMITS);
    expect(outcome.type).toEqual("success");
    if (outcome.type === "success") {
      expect(decode(outcome.stdout)).toEqual(HELLO_BLOB);
    }
  });

  it("describes itself from the module", function* () {
    expect(yield* blob().describe()).toEqual({
      name: "blob",
      version: "0.0.1",
      language: "typescript",
      description: "hashes single files",
    });
  });

  it("reads capabilities from the module", function* () {
    expect(yield* blob().capabilities()).toEqual({
      types: ["cnt"],
      variants: ["v1-sha1-hex"],
      qualifiers: [],
      supportsUnicode: true,
      supportsPercentEncoding: true,
    });
  });

  it("prefers configured capabilities", function* () {
    let capabilities = defineCapabilities({
      types: ["cnt"],
      variants: ["v2-sha256-hex"],
    });
    let implementation = inProcess({
      name: "blob",
      module: fixture("blob-implementation.ts"),
      capabilities,
    });
    expect(yield* implementation.capabilities()).toBe(capabilities);
  });

  it("reports what the implementation threw", function* () {
    let path = yield* useHelloFile();
    let implementation = inProcess({
      name: "throwing",
      module: fixture("throwing-implementation.ts"),
    });
    let outcome = yield* implementation.compute(yield* request(path), LIMITS);
    expect(outcome).toMatchObject({
      type: "crashed",
      cause: "reported",
      errorName: "UnsupportedPayload",
      detail: "refusing cnt",
    });
  });

  it("treats a module without an implementation as a launch failure", function* () {
    let path = yield* useHelloFile();
    let implementation = inProcess({
      name: "bogus",
      module: fixture("not-an-implementation.ts"),
    });
    let outcome = yield* implementation.compute(yield* request(path), LIMITS);
    expect(outcome).toMatchObject({
      type: "crashed",
      cause: "launch",
      errorName: "ImplementationUnavailable",
    });
  });

  it("treats a missing module as unavailable", function* () {
    let path = yield* useHelloFile();
    let implementation = inProcess({
      name: "missing",
      module: fixture("does-not-exist.ts"),
    });
    let availability = yield* implementation.probe();
    expect(availability).toEqual({
      available: false,
      reason: `${fixture("does-not-exist.ts")} does not exist`,
    });
    let outcome = yield* implementation.compute(yield* request(path), LIMITS);
    expect(outcome).toMatchObject({ type: "crashed", cause: "launch" });
  });

  it("finds an existing module", function* () {
    expect(yield* blob().probe()).toEqual({
      available: true,
      location: fixture("blob-implementation.ts"),
    });
  });
});
