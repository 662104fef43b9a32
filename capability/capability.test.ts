import { expect } from "expect";
import { describe, it } from "@swhid-conformance/bdd";
import { parseOrThrow } from "@swhid-conformance/identifier";
import {
  CapabilitySchema,
  checkSupport,
  defineCapabilities,
  requirementsOf,
  restrictTypes,
} from "./capability.ts";

const BLOB = "swh:1:cnt:e69de29bb2d1d6434b8b29ae775ad8c2e48c5391";

describe("defineCapabilities", () => {
  it("fills in defaults", function* () {
    expect(defineCapabilities({ types: ["cnt"] })).toEqual({
      types: ["cnt"],
      variants: ["v1-sha1-hex"],
      qualifiers: [],
      supportsUnicode: true,
      supportsPercentEncoding: true,
    });
  });

  it("accepts long object type names", function* () {
    expect(defineCapabilities({ types: ["content", "directory", "snp"] }).types)
      .toEqual(["cnt", "dir", "snp"]);
  });

  it("rejects what it does not know", function* () {
    let result = CapabilitySchema.safeParse({
      types: ["blob"],
      variants: ["v3-blake3-hex"],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual([
        "unknown object type 'blob'",
        "unknown variant 'v3-blake3-hex'",
      ]);
    }
  });

  it("needs at least one object type", function* () {
    expect(CapabilitySchema.safeParse({ types: [] }).success).toBe(false);
  });
});

describe("checkSupport", () => {
  let descriptor = defineCapabilities({
    types: ["cnt", "dir"],
    variants: ["v1-sha1-hex", "v2-sha256-hex"],
    maxPayloadMb: 1,
  });

  it("supports what was declared", function* () {
    expect(checkSupport(descriptor, { type: "dir", variant: "v2-sha256-hex" }))
      .toEqual({ supported: true });
  });

  it("explains why a request is skipped", function* () {
    expect(checkSupport(descriptor, { type: "rev", variant: "v1-sha1-hex" })).toEqual({
      supported: false,
      reason: "object type rev is not supported",
    });
    expect(checkSupport(descriptor, { type: "cnt", variant: "v2-sha256-base85" })).toEqual({
      supported: false,
      reason: "variant v2-sha256-base85 is not supported",
    });
    expect(checkSupport(descriptor, {
      type: "cnt",
      variant: "v1-sha1-hex",
      payloadBytes: 2 * 1024 * 1024,
    })).toEqual({
      supported: false,
      reason: "payload of 2097152 bytes exceeds 1MB",
    });
  });

  it("lets a payload up to the limit through", function* () {
    expect(checkSupport(descriptor, {
      type: "cnt",
      variant: "v1-sha1-hex",
      payloadBytes: 1024 * 1024,
    })).toEqual({ supported: true });
  });
});

describe("checkSupport with qualifiers", () => {
  let plain = defineCapabilities({
    types: ["cnt"],
    qualifiers: ["origin"],
    supportsUnicode: false,
    supportsPercentEncoding: false,
  });

  it("skips qualifier kinds that were not declared", function* () {
    expect(checkSupport(plain, {
      type: "cnt",
      variant: "v1-sha1-hex",
      qualifiers: ["origin", "lines"],
    })).toEqual({
      supported: false,
      reason: "qualifier lines is not supported",
    });
    expect(checkSupport(plain, {
      type: "cnt",
      variant: "v1-sha1-hex",
      qualifiers: ["origin"],
    })).toEqual({ supported: true });
  });

  it("skips text outside ASCII without Unicode support", function* () {
    expect(checkSupport(plain, { type: "cnt", variant: "v1-sha1-hex", unicode: true }))
      .toEqual({
        supported: false,
        reason: "names or qualifier values outside ASCII are not supported",
      });
  });

  it("skips escaped values without percent-encoding support", function* () {
    expect(checkSupport(plain, {
      type: "cnt",
      variant: "v1-sha1-hex",
      percentEncoding: true,
    })).toEqual({
      supported: false,
      reason: "percent-encoded qualifier values are not supported",
    });
  });

  it("lets everything through by default", function* () {
    expect(checkSupport(defineCapabilities({ types: ["cnt"], qualifiers: ["path"] }), {
      type: "cnt",
      variant: "v1-sha1-hex",
      qualifiers: ["path"],
      unicode: true,
      percentEncoding: true,
    })).toEqual({ supported: true });
  });
});

describe("requirementsOf", () => {
  it("asks nothing of a bare identifier", function* () {
    expect(requirementsOf(parseOrThrow(BLOB))).toEqual({});
    expect(requirementsOf(undefined)).toEqual({});
  });

  it("collects qualifier kinds and text needs", function* () {
    expect(requirementsOf(parseOrThrow(`${BLOB};origin=https://example.org/r%C3%A9po`)))
      .toEqual({ qualifiers: ["origin"], unicode: true, percentEncoding: false });
    expect(requirementsOf(parseOrThrow(`${BLOB};path=/a%3Bb;lines=1-2`)))
      .toEqual({ qualifiers: ["path", "lines"], unicode: false, percentEncoding: true });
  });
});

describe("restrictTypes", () => {
  it("keeps only the allowed types", function* () {
    let descriptor = defineCapabilities({ types: ["cnt", "dir", "rev"] });
    expect(restrictTypes(descriptor, ["cnt"]).types).toEqual(["cnt"]);
  });
});
