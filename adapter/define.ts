import type { Operation } from "effection";
import { z } from "zod";
import type { CapabilityInput } from "@swhid-conformance/capability";
import { isObjectType, isVariantKey } from "@swhid-conformance/identifier";
import type { ImplementationInfo } from "./types.ts";

/**
 * What an in-process implementation is asked to compute. Everything in it
 * crosses a thread boundary, so it is plain data.
 */
export const ModuleRequestSchema = z.object({
  payloadPath: z.string(),
  type: z.string().refine(isObjectType),
  variant: z.string().refine(isVariantKey),
  commit: z.string().optional(),
  tag: z.string().optional(),
});

export type ModuleRequest = z.output<typeof ModuleRequestSchema>;

export interface ModuleImplementation {
  info?: Partial<Omit<ImplementationInfo, "name">>;
  capabilities: CapabilityInput;
  /** returns the identifier text */
  compute(request: ModuleRequest): Operation<string>;
}

/**
 * Declare the default export of an in-process implementation module.
 *
 * @example
 * ```ts
 * export default defineImplementation({
 *   capabilities: { types: ["cnt"], variants: ["v1-sha1-hex"] },
 *   *compute(request) {
 *     return yield* hashFile(request.payloadPath);
 *   },
 * });
 * ```
 */
export function defineImplementation(
  implementation: ModuleImplementation,
): ModuleImplementation {
  return implementation;
}

export function isModuleImplementation(
  value: unknown,
): value is ModuleImplementation {
  return typeof value === "object" && value !== null &&
    "compute" in value && typeof value.compute === "function" &&
    "capabilities" in value && typeof value.capabilities === "object";
}
