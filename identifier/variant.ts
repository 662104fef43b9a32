import { codecs, type HashEncoding } from "./encoding.ts";

export type HashAlgorithm = "sha1" | "sha256";

export type VariantKey =
  | "v1-sha1-hex"
  | "v2-sha256-hex"
  | "v2-sha256-base64"
  | "v2-sha256-base85"
  | "v2-sha256-base32";

/**
 * The {version, hash algorithm, text encoding} triple an identifier
 * instance belongs to.
 */
export interface Variant {
  readonly key: VariantKey;
  readonly version: 1 | 2;
  readonly algorithm: HashAlgorithm;
  readonly encoding: HashEncoding;
  /** decoded hash length in bytes */
  readonly bytes: number;
  /** length of the hash text */
  readonly length: number;
}

function variant(
  key: VariantKey,
  version: 1 | 2,
  algorithm: HashAlgorithm,
  encoding: HashEncoding,
  bytes: number,
  length: number,
): Variant {
  return {
    key,
    version,
    algorithm,
    encoding,
    bytes,
    length,
  };
}

/**
 * Detection order matters: a 40 character string is tried as hex before
 * base85.
 */
export const VARIANTS: readonly Variant[] = [
  variant("v1-sha1-hex", 1, "sha1", "hex", 20, 40),
  variant("v2-sha256-hex", 2, "sha256", "hex", 32, 64),
  variant("v2-sha256-base64", 2, "sha256", "base64", 32, 44),
  variant("v2-sha256-base85", 2, "sha256", "base85", 32, 40),
  variant("v2-sha256-base32", 2, "sha256", "base32", 32, 52),
];

export const VARIANT_KEYS: readonly VariantKey[] = VARIANTS.map((v) => v.key);

export type VariantDetection =
  | { readonly type: "known"; readonly variant: Variant; readonly hash: Uint8Array }
  | { readonly type: "unknown"; readonly reason: string };

export function isVariantKey(value: string): value is VariantKey {
  return VARIANT_KEYS.some((key) => key === value);
}

export function getVariant(key: VariantKey): Variant {
  let found = VARIANTS.find((v) => v.key === key);
  if (!found) {
    throw new Error(`unknown variant key '${key}'`);
  }
  return found;
}

/**
 * Infer the variant of a hash from its text length and alphabet. Never
 * guesses: anything outside the table is reported as unknown.
 */
export function detectVariant(text: string): VariantDetection {
  let candidates = VARIANTS.filter((v) => v.length === text.length);
  if (candidates.length === 0) {
    return {
      type: "unknown",
      reason: `no variant has a ${text.length} character hash`,
    };
  }
  for (let candidate of candidates) {
    let codec = codecs[candidate.encoding];
    if (!codec.alphabet.test(text)) {
      continue;
    }
    let hash = codec.decode(text);
    if (hash && hash.length === candidate.bytes) {
      return { type: "known", variant: candidate, hash };
    }
  }
  return {
    type: "unknown",
    reason: `${text.length} character hash does not match the alphabet of ${
      candidates.map((c) => c.key).join(", ")
    }`,
  };
}

/**
 * Render hash bytes in the canonical text form of a variant.
 */
export function encodeHash(hash: Uint8Array, variant: Variant): string {
  return codecs[variant.encoding].encode(hash);
}
