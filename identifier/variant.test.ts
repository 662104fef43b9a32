import { createHash } from "node:crypto";
import { expect } from "expect";
import { describe, it } from "@swhid-conformance/bdd";
import {
  detectVariant,
  encodeHash,
  getVariant,
  isVariantKey,
  VARIANT_KEYS,
} from "./variant.ts";

const DIGEST = new Uint8Array(createHash("sha256").update("x").digest());

describe("variants", () => {
  it("knows every supported combination", function* () {
    expect(VARIANT_KEYS).toEqual([
      "v1-sha1-hex",
      "v2-sha256-hex",
      "v2-sha256-base64",
      "v2-sha256-base85",
      "v2-sha256-base32",
    ]);
    expect(isVariantKey("v2-sha256-base32")).toBe(true);
    expect(isVariantKey("v2-sha512-hex")).toBe(false);
    expect(getVariant("v2-sha256-base64")).toMatchObject({
      version: 2,
      algorithm: "sha256",
      encoding: "base64",
      bytes: 32,
      length: 44,
    });
  });

  it("renders a digest in each encoding", function* () {
    expect(encodeHash(DIGEST, getVariant("v2-sha256-hex")))
      .toEqual("2d711642b726b04401627ca9fbac32f5c8530fb1903cc4db02258717921a4881");
    expect(encodeHash(DIGEST, getVariant("v2-sha256-base64")))
      .toEqual("LXEWQrcmsEQBYnyp+6wy9chTD7GQPMTbAiWHF5IaSIE=");
    expect(encodeHash(DIGEST, getVariant("v2-sha256-base32")))
      .toEqual("FVYRMQVXE2YEIALCPSU7XLBS6XEFGD5RSA6MJWYCEWDRPEQ2JCAQ");
    expect(encodeHash(DIGEST, getVariant("v2-sha256-base85")))
      .toEqual("EpZk?w<fSe0b+cq`>Znc$WsrokUYfO0wsqRk{U>X");
  });

  it("detects the variant from length and alphabet", function* () {
    let detect = (text: string) => {
      let detection = detectVariant(text);
      return detection.type === "known" ? detection.variant.key : detection.reason;
    };
    expect(detect("ce013625030ba8dba906f756967f9e9ca394464a")).toEqual("v1-sha1-hex");
    expect(detect("EpZk?w<fSe0b+cq`>Znc$WsrokUYfO0wsqRk{U>X")).toEqual("v2-sha256-base85");
    expect(detect("LXEWQrcmsEQBYnyp+6wy9chTD7GQPMTbAiWHF5IaSIE=")).toEqual("v2-sha256-base64");
    expect(detect("FVYRMQVXE2YEIALCPSU7XLBS6XEFGD5RSA6MJWYCEWDRPEQ2JCAQ"))
      .toEqual("v2-sha256-base32");
    expect(detect("abc")).toEqual("no variant has a 3 character hash");
  });

  it("reports a hash that fits no alphabet", function* () {
    let detection = detectVariant("*".repeat(52));
    expect(detection).toEqual({
      type: "unknown",
      reason: "52 character hash does not match the alphabet of v2-sha256-base32",
    });
  });
});
