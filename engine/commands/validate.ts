import { command } from "zod-opts";
import {
  isVariantKey,
  OBJECT_TYPES,
  type ObjectType,
  parse,
  qualifierText,
  type Requested,
  serialize,
  toObjectType,
  validate,
  type VariantKey,
} from "@swhid-conformance/identifier";
import { UsageError } from "../errors.ts";
import { ValidateFlagsSchema, type ValidateFlags } from "../types.ts";

export interface ValidationReport {
  ok: boolean;
  lines: string[];
}

function typeOf(value: string | undefined): ObjectType | undefined {
  if (value === undefined) {
    return undefined;
  }
  let type = toObjectType(value);
  if (!type) {
    throw new UsageError(`unknown object type '${value}'`);
  }
  return type;
}

function variantOf(value: string | undefined): VariantKey | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isVariantKey(value)) {
    throw new UsageError(`unknown variant '${value}'`);
  }
  return value;
}

/**
 * Check one identifier the way implementation output is checked, and
 * describe what was found.
 */
export function validateIdentifier(flags: ValidateFlags): ValidationReport {
  let requested: Requested = {
    type: typeOf(flags.type),
    variant: variantOf(flags.variant),
  };
  let parsed = parse(flags.identifier);
  if (!parsed.ok) {
    return { ok: false, lines: [`PARSE_ERROR: ${parsed.error.message}`] };
  }
  let identifier = parsed.value;
  let lines = [
    `scheme: ${identifier.scheme}`,
    `version: ${identifier.version}`,
    `type: ${identifier.type} (${OBJECT_TYPES[identifier.type]})`,
    `hash: ${identifier.hashText}`,
    `variant: ${identifier.variant?.key ?? "unknown"}`,
    ...identifier.qualifiers.map(({ key, value }) =>
      `qualifier: ${key}=${qualifierText(value)}`
    ),
  ];
  if (!identifier.canonical) {
    lines.push(`canonical: ${serialize(identifier)}`);
    lines.push(...identifier.issues.map((issue) => `NORMALIZE_ERROR: ${issue.message}`));
  }
  let issues = validate(identifier, requested);
  lines.push(...issues.map((issue) => `VALIDATION_ERROR: ${issue.message}`));

  let ok = identifier.canonical && issues.length === 0;
  lines.push(ok ? "valid" : "invalid");
  return { ok, lines };
}

export const validateCommandDefinition = command("validate")
  .description("Parse and check a single identifier")
  .args([
    {
      name: "identifier",
      type: ValidateFlagsSchema.shape.identifier,
      description: "Identifier to check",
    },
  ])
  .options({
    verbose: {
      type: ValidateFlagsSchema.shape.verbose,
      alias: "v",
      description: "Print debugging output",
    },
    type: {
      type: ValidateFlagsSchema.shape.type,
      alias: "t",
      description: "Object type the identifier should have",
    },
    variant: {
      type: ValidateFlagsSchema.shape.variant,
      description: "Variant the identifier should use",
    },
  });
