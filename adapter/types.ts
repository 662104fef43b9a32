import type { CapabilityDescriptor } from "@swhid-conformance/capability";
import type { ObjectType, Variant } from "@swhid-conformance/identifier";
import type { Limits, RawOutcome } from "@swhid-conformance/sandbox";
import type { Operation } from "effection";

export interface ImplementationInfo {
  name: string;
  version: string;
  language?: string;
  description?: string;
}

export type Availability =
  | { available: true; location?: string }
  | { available: false; reason: string };

/**
 * A payload as handed to implementations: a path on disk that the engine
 * treats as read-only.
 */
export interface ResolvedPayload {
  /** what the implementation is given */
  path: string;
  /** what the test case named, e.g. the archive it was extracted from */
  source: string;
  kind: "file" | "directory";
  sizeBytes: number;
  /** a name inside the payload has a byte outside ASCII */
  unicodeNames?: boolean;
}

export interface ComputeRequest {
  payload: ResolvedPayload;
  type: ObjectType;
  variant: Variant;
  /** full object id, already resolved */
  commit?: string;
  /** full object id of an annotated tag, already resolved */
  tag?: string;
}

/**
 * Every implementation, whatever runs it, is driven through these four
 * operations. `compute()` returns the raw outcome; classification is the
 * caller's business.
 */
export interface Implementation {
  readonly name: string;
  readonly kind: "external" | "in-process";
  describe(): Operation<ImplementationInfo>;
  probe(): Operation<Availability>;
  capabilities(): Operation<CapabilityDescriptor>;
  compute(request: ComputeRequest, limits: Limits): Operation<RawOutcome>;
}
