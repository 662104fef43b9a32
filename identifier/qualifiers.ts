import { Buffer, isUtf8 } from "node:buffer";
import { Err, Ok, type Result } from "effection";

/** known qualifier keys, in canonical order */
export const QUALIFIER_KEYS = [
  "origin",
  "visit",
  "anchor",
  "path",
  "lines",
] as const;

export type QualifierKey = typeof QUALIFIER_KEYS[number];

export function isQualifierKey(key: string): key is QualifierKey {
  return QUALIFIER_KEYS.some((known) => known === key);
}

/**
 * A qualifier value is held as the bytes left after percent-decoding. It is
 * never case-folded or Unicode-normalized.
 */
export interface Qualifier {
  readonly key: string;
  readonly value: Uint8Array;
}

const ESCAPE = /^[0-9A-Fa-f]{2}$/;

function mustEscape(code: number): boolean {
  return code < 0x21 || code === 0x7f || code === 0x25 || code === 0x3b;
}

/**
 * Decode percent escapes exactly once. `%2F` becomes the byte 0x2F and
 * nothing more. Everything that is not an escape contributes its UTF-8
 * bytes.
 */
export function percentDecode(text: string): Result<Uint8Array> {
  let bytes: number[] = [];
  let offset = 0;
  for (let char of text) {
    let code = char.codePointAt(0) ?? 0;
    if (code < 0x21 || code === 0x7f) {
      return Err(
        new Error(
          `raw control or whitespace character U+${
            code.toString(16).padStart(4, "0").toUpperCase()
          } at offset ${offset}`,
        ),
      );
    }
    offset += char.length;
  }

  for (let i = 0; i < text.length;) {
    if (text[i] === "%") {
      let escape = text.slice(i + 1, i + 3);
      if (!ESCAPE.test(escape)) {
        return Err(
          new Error(`'%' not followed by two hex digits at offset ${i}`),
        );
      }
      bytes.push(parseInt(escape, 16));
      i += 3;
    } else {
      let code = text.codePointAt(i) ?? 0;
      let char = String.fromCodePoint(code);
      bytes.push(...Buffer.from(char, "utf8"));
      i += char.length;
    }
  }
  return Ok(Uint8Array.from(bytes));
}

function escape(byte: number): string {
  return `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
}

/**
 * Canonical text of a qualifier value. Valid UTF-8 stays readable; when the
 * bytes are not valid UTF-8 every byte from 0x80 up is escaped as well.
 */
export function percentEncode(value: Uint8Array): string {
  if (isUtf8(value)) {
    let out = "";
    for (let char of Buffer.from(value).toString("utf8")) {
      let code = char.codePointAt(0) ?? 0;
      out += mustEscape(code) ? escape(code) : char;
    }
    return out;
  }
  let out = "";
  for (let byte of value) {
    out += mustEscape(byte) || byte >= 0x80
      ? escape(byte)
      : String.fromCharCode(byte);
  }
  return out;
}

/** byte-lexicographic order */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  return Buffer.compare(a, b);
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return compareBytes(a, b) === 0;
}

export function qualifierText(value: Uint8Array): string {
  return Buffer.from(value).toString("utf8");
}
