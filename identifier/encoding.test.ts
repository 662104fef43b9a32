import { expect } from "expect";
import { describe, it } from "@swhid-conformance/bdd";
import { base32, base64, base85, hex } from "./encoding.ts";

const HELLO = new TextEncoder().encode("hello");

describe("hash encodings", () => {
  it("writes hex in lowercase", function* () {
    expect(hex.encode(Uint8Array.from([0xde, 0xad, 0xbe, 0xef]))).toEqual("deadbeef");
    expect(hex.decode("DEADBEEF")).toEqual(Uint8Array.from([0xde, 0xad, 0xbe, 0xef]));
    expect(hex.decode("abc")).toBeUndefined();
  });

  it("writes padded base64", function* () {
    expect(base64.encode(HELLO)).toEqual("aGVsbG8=");
    expect(base64.decode("aGVsbG8=")).toEqual(HELLO);
    expect(base64.decode("aGVsbG8")).toBeUndefined();
  });

  it("writes base32 without padding", function* () {
    expect(base32.encode(HELLO)).toEqual("NBSWY3DP");
    expect(base32.decode("NBSWY3DP")).toEqual(HELLO);
    expect(base32.decode("nbswy3dp")).toBeUndefined();
  });

  it("writes base85 with the RFC 1924 alphabet", function* () {
    expect(base85.encode(HELLO)).toEqual("Xk~0{Zv");
    expect(base85.decode("Xk~0{Zv")).toEqual(HELLO);
    expect(base85.encode(new Uint8Array(4))).toEqual("00000");
    expect(base85.encode(Uint8Array.from([255, 255, 255, 255]))).toEqual("|NsC0");
  });

  it("refuses base85 groups that overflow 32 bits", function* () {
    expect(base85.decode("~~~~~")).toBeUndefined();
    expect(base85.decode("Xk~0{Z")).toBeUndefined();
  });
});
