import { z } from "zod";
import {
  type Identifier,
  isVariantKey,
  percentEncode,
  QUALIFIER_KEYS,
  toObjectType,
  type ObjectType,
  type QualifierKey,
  type VariantKey,
} from "@swhid-conformance/identifier";

export const ObjectTypeSchema = z.string().transform((value, ctx): ObjectType => {
  let type = toObjectType(value);
  if (!type) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unknown object type '${value}'`,
    });
    return z.NEVER;
  }
  return type;
});

export const VariantKeySchema = z.string().transform((value, ctx): VariantKey => {
  if (isVariantKey(value)) {
    return value;
  }
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `unknown variant '${value}'`,
  });
  return z.NEVER;
});

/**
 * Declared once per implementation at discovery time. Object types may be
 * written as codes (`cnt`) or long names (`content`).
 */
export const CapabilitySchema = z.object({
  types: z.array(ObjectTypeSchema).min(1),
  variants: z.array(VariantKeySchema).default(["v1-sha1-hex"]),
  qualifiers: z.array(z.enum(QUALIFIER_KEYS)).default([]),
  maxPayloadMb: z.number().positive().optional(),
  supportsUnicode: z.boolean().default(true),
  supportsPercentEncoding: z.boolean().default(true),
});

export type CapabilityInput = z.input<typeof CapabilitySchema>;

export interface CapabilityDescriptor {
  readonly types: readonly ObjectType[];
  readonly variants: readonly VariantKey[];
  readonly qualifiers: readonly QualifierKey[];
  readonly maxPayloadMb?: number;
  readonly supportsUnicode: boolean;
  readonly supportsPercentEncoding: boolean;
}

export function defineCapabilities(input: CapabilityInput): CapabilityDescriptor {
  return CapabilitySchema.parse(input);
}

export interface SupportRequest {
  readonly type: ObjectType;
  readonly variant: VariantKey;
  readonly payloadBytes?: number;
  /** qualifier kinds the expected identifier carries */
  readonly qualifiers?: readonly string[];
  /** payload names or qualifier values with bytes outside ASCII */
  readonly unicode?: boolean;
  /** qualifier values whose canonical text has percent escapes */
  readonly percentEncoding?: boolean;
}

export type Requirements = Pick<
  SupportRequest,
  "qualifiers" | "unicode" | "percentEncoding"
>;

/**
 * What producing `identifier` asks of an implementation beyond its object
 * type and variant.
 */
export function requirementsOf(identifier: Identifier | undefined): Requirements {
  if (!identifier || identifier.qualifiers.length === 0) {
    return {};
  }
  let { qualifiers } = identifier;
  return {
    qualifiers: qualifiers.map(({ key }) => key),
    unicode: qualifiers.some(({ value }) => value.some((byte) => byte >= 0x80)),
    percentEncoding: qualifiers.some(({ value }) => percentEncode(value).includes("%")),
  };
}

export type Support =
  | { readonly supported: true }
  | { readonly supported: false; readonly reason: string };

/**
 * Decide before launching anything whether an invocation should be
 * attempted. An unsupported request becomes a skip, never a failure.
 */
export function checkSupport(
  descriptor: CapabilityDescriptor,
  request: SupportRequest,
): Support {
  if (!descriptor.types.includes(request.type)) {
    return {
      supported: false,
      reason: `object type ${request.type} is not supported`,
    };
  }
  if (!descriptor.variants.includes(request.variant)) {
    return {
      supported: false,
      reason: `variant ${request.variant} is not supported`,
    };
  }
  let missing = request.qualifiers?.find((key) =>
    !descriptor.qualifiers.some((supported) => supported === key)
  );
  if (missing !== undefined) {
    return {
      supported: false,
      reason: `qualifier ${missing} is not supported`,
    };
  }
  if (request.unicode && !descriptor.supportsUnicode) {
    return {
      supported: false,
      reason: "names or qualifier values outside ASCII are not supported",
    };
  }
  if (request.percentEncoding && !descriptor.supportsPercentEncoding) {
    return {
      supported: false,
      reason: "percent-encoded qualifier values are not supported",
    };
  }
  let { maxPayloadMb } = descriptor;
  if (
    maxPayloadMb !== undefined && request.payloadBytes !== undefined &&
    request.payloadBytes > maxPayloadMb * 1024 * 1024
  ) {
    return {
      supported: false,
      reason: `payload of ${request.payloadBytes} bytes exceeds ${maxPayloadMb}MB`,
    };
  }
  return { supported: true };
}

/**
 * Narrow a descriptor, e.g. to the types an input mode can carry.
 */
export function restrictTypes(
  descriptor: CapabilityDescriptor,
  types: readonly ObjectType[],
): CapabilityDescriptor {
  return {
    ...descriptor,
    types: descriptor.types.filter((type) => types.includes(type)),
  };
}
