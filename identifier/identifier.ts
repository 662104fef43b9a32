import { Buffer } from "node:buffer";
import { Err, Ok, type Result } from "effection";
import { IdentifierSyntaxError } from "./errors.ts";
import {
  bytesEqual,
  isQualifierKey,
  percentDecode,
  percentEncode,
  type Qualifier,
  QUALIFIER_KEYS,
} from "./qualifiers.ts";
import { detectVariant, encodeHash, type Variant } from "./variant.ts";

export const OBJECT_TYPES = {
  cnt: "content",
  dir: "directory",
  rev: "revision",
  rel: "release",
  snp: "snapshot",
} as const;

export type ObjectType = keyof typeof OBJECT_TYPES;
export type ObjectTypeName = typeof OBJECT_TYPES[ObjectType];

export function isObjectType(value: string): value is ObjectType {
  return Object.keys(OBJECT_TYPES).includes(value);
}

/**
 * Accepts either the three letter code or the long name.
 */
export function toObjectType(value: string): ObjectType | undefined {
  if (isObjectType(value)) {
    return value;
  }
  for (let [code, name] of Object.entries(OBJECT_TYPES)) {
    if (name === value && isObjectType(code)) {
      return code;
    }
  }
  return undefined;
}

export type NormalizationCode =
  | "scheme-case"
  | "type-case"
  | "hash-encoding"
  | "hash-variant"
  | "qualifier-encoding"
  | "qualifier-order";

export interface NormalizationIssue {
  readonly code: NormalizationCode;
  readonly message: string;
}

/**
 * Structural form of an identifier string.
 */
export interface Identifier {
  /** the scheme exactly as written */
  readonly scheme: string;
  readonly version: 1 | 2;
  readonly type: ObjectType;
  /**
   * decoded hash bytes. When the variant is unknown these are the UTF-8
   * bytes of the hash text.
   */
  readonly hash: Uint8Array;
  readonly hashText: string;
  readonly variant?: Variant;
  readonly qualifiers: readonly Qualifier[];
  /** the text this identifier was parsed from */
  readonly text: string;
  readonly canonical: boolean;
  readonly issues: readonly NormalizationIssue[];
}

const SHAPE = /^([^:]*):([^:]*):([^:]*):(.*)$/s;
const SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*$/;
const HASH = /^[0-9A-Za-z!#$%&()*+\-;<=>?@^_`{|}~/]+$/;
const KEY = /^[A-Za-z][A-Za-z0-9_-]*$/;
const BASE85_LENGTH = 40;

/**
 * Parse identifier text. Text that breaks the grammar is an `Err`; text
 * that parses but is not in canonical form is returned with
 * `canonical: false` and the reasons in `issues`.
 */
export function parse(text: string): Result<Identifier> {
  let fail = (reason: string, position?: number) =>
    Err<Identifier>(new IdentifierSyntaxError(reason, text, position));

  let shape = SHAPE.exec(text);
  if (!shape) {
    return fail("expected <scheme>:<version>:<type>:<hash>");
  }
  let [, scheme, versionText, typeText, rest] = shape;

  if (!SCHEME.test(scheme) || scheme.toLowerCase() !== "swh") {
    return fail(`unknown scheme '${scheme}'`, 0);
  }

  let versionAt = scheme.length + 1;
  let version: 1 | 2;
  if (versionText === "1") {
    version = 1;
  } else if (versionText === "2") {
    version = 2;
  } else {
    return fail(`unknown version '${versionText}'`, versionAt);
  }

  let typeAt = versionAt + versionText.length + 1;
  let type = typeText.toLowerCase();
  if (!isObjectType(type)) {
    return fail(`unknown object type '${typeText}'`, typeAt);
  }

  let hashAt = typeAt + typeText.length + 1;
  let hashEnd = rest.indexOf(";");
  if (hashEnd < 0) {
    hashEnd = rest.length;
  }
  let detection = detectVariant(rest.slice(0, hashEnd));

  // the base85 alphabet contains ';' so the first separator may fall
  // inside the hash
  if (
    detection.type === "unknown" &&
    hashEnd < BASE85_LENGTH &&
    (rest.length === BASE85_LENGTH || rest[BASE85_LENGTH] === ";")
  ) {
    let candidate = detectVariant(rest.slice(0, BASE85_LENGTH));
    if (
      candidate.type === "known" && candidate.variant.encoding === "base85"
    ) {
      detection = candidate;
      hashEnd = BASE85_LENGTH;
    }
  }

  let hashText = rest.slice(0, hashEnd);
  if (hashText === "") {
    return fail("missing hash", hashAt);
  }
  if (!HASH.test(hashText)) {
    return fail(`invalid character in hash '${hashText}'`, hashAt);
  }

  let qualifiers: Qualifier[] = [];
  let written: string[] = [];
  let remainder = rest.slice(hashEnd);
  if (remainder !== "") {
    let offset = hashAt + hashEnd + 1;
    for (let segment of remainder.slice(1).split(";")) {
      if (segment === "") {
        return fail("empty qualifier", offset);
      }
      let eq = segment.indexOf("=");
      if (eq <= 0) {
        return fail(`qualifier '${segment}' has no key=value form`, offset);
      }
      let key = segment.slice(0, eq);
      if (!KEY.test(key)) {
        return fail(`invalid qualifier key '${key}'`, offset);
      }
      let raw = segment.slice(eq + 1);
      let value = percentDecode(raw);
      if (!value.ok) {
        return fail(
          `qualifier '${key}': ${value.error.message}`,
          offset + eq + 1,
        );
      }
      qualifiers.push({ key, value: value.value });
      written.push(raw);
      offset += segment.length + 1;
    }
  }

  let issues: NormalizationIssue[] = [];
  if (scheme !== scheme.toLowerCase()) {
    issues.push({
      code: "scheme-case",
      message: `scheme '${scheme}' is not lowercase`,
    });
  }
  if (typeText !== type) {
    issues.push({
      code: "type-case",
      message: `object type '${typeText}' is not lowercase`,
    });
  }

  let hash: Uint8Array;
  let variant: Variant | undefined;
  if (detection.type === "known") {
    hash = detection.hash;
    variant = detection.variant;
    if (variant.version !== version) {
      issues.push({
        code: "hash-variant",
        message:
          `${variant.key} hash cannot appear in a version ${version} identifier`,
      });
    } else if (encodeHash(hash, variant) !== hashText) {
      issues.push({
        code: "hash-encoding",
        message: `hash is not in canonical ${variant.encoding} form`,
      });
    }
  } else {
    hash = new Uint8Array(Buffer.from(hashText, "utf8"));
    issues.push({ code: "hash-variant", message: detection.reason });
  }

  qualifiers.forEach((qualifier, index) => {
    if (percentEncode(qualifier.value) !== written[index]) {
      issues.push({
        code: "qualifier-encoding",
        message: `qualifier '${qualifier.key}' is not canonically encoded`,
      });
    }
  });

  let rank = qualifiers
    .map((q) => q.key)
    .filter(isQualifierKey)
    .map((key) => QUALIFIER_KEYS.indexOf(key));
  if (rank.some((position, i) => i > 0 && position < rank[i - 1])) {
    issues.push({
      code: "qualifier-order",
      message: `qualifiers must appear in the order ${
        QUALIFIER_KEYS.join(", ")
      }`,
    });
  }

  return Ok({
    scheme,
    version,
    type,
    hash,
    hashText,
    variant,
    qualifiers,
    text,
    canonical: issues.length === 0,
    issues,
  });
}

/**
 * Render an identifier in canonical text, keeping its qualifiers in the
 * order they were given.
 */
export function serialize(identifier: Identifier): string {
  let { variant, hash, hashText } = identifier;
  let core = [
    identifier.scheme.toLowerCase(),
    identifier.version,
    identifier.type,
    variant ? encodeHash(hash, variant) : hashText,
  ].join(":");
  return identifier.qualifiers.reduce(
    (text, { key, value }) => `${text};${key}=${percentEncode(value)}`,
    core,
  );
}

/**
 * Structural equality: scheme, version, type, hash bytes and the exact
 * qualifier sequence. Qualifier values compare as bytes.
 */
export function equals(a: Identifier, b: Identifier): boolean {
  return a.scheme.toLowerCase() === b.scheme.toLowerCase() &&
    a.version === b.version &&
    a.type === b.type &&
    bytesEqual(a.hash, b.hash) &&
    a.qualifiers.length === b.qualifiers.length &&
    a.qualifiers.every((q, i) =>
      q.key === b.qualifiers[i].key && bytesEqual(q.value, b.qualifiers[i].value)
    );
}

/**
 * Like `parse()` but throws the syntax error.
 */
export function parseOrThrow(text: string): Identifier {
  let result = parse(text);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
