import { Buffer } from "node:buffer";
import { z } from "zod";
import { crashed, type RawOutcome } from "@swhid-conformance/sandbox";

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const TAB = 0x09;

/**
 * Line protocol: the implementation prints one identifier, optionally
 * followed by a tab and the name of what it identified, and one line
 * terminator. The identifier bytes are passed on unchanged.
 */
export function readIdentifierLine(outcome: RawOutcome): RawOutcome {
  if (outcome.type === "crashed" && outcome.cause === "exit" &&
    outcome.detail.trim() !== "") {
    return { ...outcome, cause: "reported" };
  }
  if (outcome.type !== "success") {
    return outcome;
  }

  let bytes = outcome.stdout;
  let end = bytes.length;
  if (end > 0 && bytes[end - 1] === NEWLINE) {
    end--;
    if (end > 0 && bytes[end - 1] === CARRIAGE_RETURN) {
      end--;
    }
  }
  let line = bytes.subarray(0, end);
  if (line.length === 0) {
    return crashed("protocol", "no identifier on stdout", outcome.metrics);
  }
  let lines = line.filter((byte) => byte === NEWLINE).length + 1;
  if (lines > 1) {
    return crashed(
      "protocol",
      `expected exactly one line on stdout, got ${lines}`,
      outcome.metrics,
    );
  }
  let tab = line.indexOf(TAB);
  return {
    ...outcome,
    stdout: tab < 0 ? line.slice() : line.slice(0, tab),
  };
}

export const ComputeResponseSchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), swhid: z.string() }),
  z.object({
    ok: z.literal(false),
    error: z.object({
      code: z.string().default("COMPUTE_ERROR"),
      message: z.string(),
    }),
  }),
]);

function readJson(bytes: Uint8Array): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(Buffer.from(bytes).toString("utf8")) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * JSON protocol: one response object on stdout.
 */
export function readComputeResponse(outcome: RawOutcome): RawOutcome {
  if (outcome.type === "crashed" && outcome.cause === "exit" &&
    outcome.detail.trim() !== "") {
    return { ...outcome, cause: "reported" };
  }
  if (outcome.type !== "success") {
    return outcome;
  }
  let json = readJson(outcome.stdout);
  if (!json.ok) {
    return crashed("protocol", `response is not JSON: ${json.message}`, outcome.metrics);
  }
  let response = ComputeResponseSchema.safeParse(json.value);
  if (!response.success) {
    return crashed("protocol", `unexpected response: ${response.error.message}`, outcome.metrics);
  }
  if (!response.data.ok) {
    return crashed("reported", response.data.error.message, outcome.metrics, {
      errorName: response.data.error.code,
    });
  }
  return {
    ...outcome,
    stdout: new Uint8Array(Buffer.from(response.data.swhid, "utf8")),
  };
}

/**
 * Decode a discovery response (`capabilities`, `info`, `describe`) and
 * check it against `schema`.
 */
export function readDiscoveryResponse<T>(
  outcome: RawOutcome,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T {
  if (outcome.type !== "success") {
    let detail = outcome.type === "crashed" ? outcome.detail : outcome.type;
    throw new Error(`discovery failed: ${detail}`);
  }
  let json = readJson(outcome.stdout);
  if (!json.ok) {
    throw new Error(`discovery response is not JSON: ${json.message}`);
  }
  return schema.parse(json.value);
}
