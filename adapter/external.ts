import { readFile } from "node:fs/promises";
import { Buffer } from "node:buffer";
import { call, type Operation, until } from "effection";
import { z } from "zod";
import {
  type CapabilityDescriptor,
  CapabilitySchema,
  restrictTypes,
} from "@swhid-conformance/capability";
import { OBJECT_TYPES } from "@swhid-conformance/identifier";
import {
  type Limits,
  type ProcessLaunch,
  type RawOutcome,
  run,
} from "@swhid-conformance/sandbox";
import { cleanEnvironment, which } from "./environment.ts";
import {
  readComputeResponse,
  readDiscoveryResponse,
  readIdentifierLine,
} from "./protocol.ts";
import type {
  Availability,
  ComputeRequest,
  Implementation,
  ImplementationInfo,
} from "./types.ts";
import { useWorkDir } from "./workdir.ts";

export type ExternalProtocol = "line" | "json";
export type InputMode = "path" | "stdin";

export interface ExternalOptions {
  name: string;
  /** executable followed by any fixed leading arguments */
  command: [string, ...string[]];
  /**
   * Argument template appended to `command`. Placeholders: `{type}`,
   * `{typeCode}`, `{version}`, `{algorithm}`, `{encoding}`, `{variant}`,
   * `{payload}`, `{commit}`, `{tag}`. An argument whose placeholder has no
   * value for the request is left out.
   */
  arguments?: string[];
  protocol?: ExternalProtocol;
  input?: InputMode;
  /** working directory; a fresh scratch directory per invocation if unset */
  cwd?: string;
  /** variables added to the clean environment */
  env?: Record<string, string>;
  /** declared capabilities; discovered over the JSON protocol if unset */
  capabilities?: CapabilityDescriptor;
  info?: Partial<Omit<ImplementationInfo, "name">>;
  /** budget for discovery requests */
  discoveryTimeoutMs?: number;
}

export const DEFAULT_ARGUMENTS = [
  "--type",
  "{type}",
  "--version",
  "{version}",
  "--hash",
  "{algorithm}",
  "{payload}",
];

const PLACEHOLDER = /\{(\w+)\}/g;

function placeholders(request: ComputeRequest, input: InputMode) {
  let values: Record<string, string | undefined> = {
    type: OBJECT_TYPES[request.type],
    typeCode: request.type,
    version: String(request.variant.version),
    algorithm: request.variant.algorithm,
    encoding: request.variant.encoding,
    variant: request.variant.key,
    payload: input === "stdin" ? "-" : request.payload.path,
    commit: request.commit,
    tag: request.tag,
  };
  return values;
}

export function expandArguments(
  template: readonly string[],
  request: ComputeRequest,
  input: InputMode = "path",
): string[] {
  let values = placeholders(request, input);
  let expanded: string[] = [];
  for (let argument of template) {
    let missing = false;
    let text = argument.replace(PLACEHOLDER, (match, name: string) => {
      if (!(name in values)) {
        return match;
      }
      let value = values[name];
      if (value === undefined) {
        missing = true;
        return "";
      }
      return value;
    });
    if (!missing) {
      expanded.push(text);
    }
  }
  return expanded;
}

const DiscoveredCapabilities = z.object({
  ok: z.literal(true),
  capabilities: z.object({
    supported_types: z.array(z.string()),
    supported_variants: z.array(z.string()).optional(),
    supported_qualifiers: z.array(z.string()).default([]),
    max_payload_size_mb: z.number().nullish(),
    supports_unicode: z.boolean().default(true),
    supports_percent_encoding: z.boolean().default(true),
  }),
}).transform(({ capabilities }) =>
  CapabilitySchema.parse({
    types: capabilities.supported_types,
    variants: capabilities.supported_variants,
    qualifiers: capabilities.supported_qualifiers,
    maxPayloadMb: capabilities.max_payload_size_mb ?? undefined,
    supportsUnicode: capabilities.supports_unicode,
    supportsPercentEncoding: capabilities.supports_percent_encoding,
  })
);

const DiscoveredInfo = z.object({
  ok: z.literal(true),
  info: z.object({
    version: z.string().default("unknown"),
    language: z.string().optional(),
    description: z.string().optional(),
  }),
}).transform(({ info }) => info);

/**
 * An implementation that is a separate program. It is handed the payload
 * by path or on stdin and answers on stdout, either with a single line
 * holding the identifier or with a JSON response.
 */
export function external(options: ExternalOptions): Implementation {
  let protocol = options.protocol ?? "line";
  let input = options.input ?? "path";
  let template = options.arguments ??
    (protocol === "json" ? [] : DEFAULT_ARGUMENTS);
  let [executable, ...leading] = options.command;
  let discoveryLimits: Limits = {
    timeoutMs: options.discoveryTimeoutMs ?? 10_000,
  };

  function* launch(
    args: string[],
    stdin: Uint8Array | undefined,
    limits: Limits,
  ): Operation<RawOutcome> {
    return yield* call(function* () {
      let cwd = options.cwd ?? (yield* useWorkDir());
      let proc: ProcessLaunch = {
        type: "process",
        command: executable,
        arguments: [...leading, ...args],
        cwd,
        env: cleanEnvironment(options.env),
        stdin,
      };
      return yield* run(proc, limits);
    });
  }

  function* discover<T>(
    op: "capabilities" | "info",
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Operation<T> {
    let request = Buffer.from(JSON.stringify({ op }), "utf8");
    let outcome = yield* launch(template, new Uint8Array(request), discoveryLimits);
    return readDiscoveryResponse(outcome, schema);
  }

  let declared: CapabilityDescriptor | undefined;

  return {
    name: options.name,
    kind: "external",
    *describe() {
      let info = protocol === "json" && !options.info
        ? yield* discover("info", DiscoveredInfo)
        : options.info ?? {};
      return { version: "unknown", ...info, name: options.name };
    },
    *probe(): Operation<Availability> {
      return yield* which(executable, { cwd: options.cwd });
    },
    *capabilities() {
      if (!declared) {
        let descriptor = options.capabilities;
        if (!descriptor) {
          if (protocol !== "json") {
            throw new Error(
              `${options.name}: capabilities must be declared for the line protocol`,
            );
          }
          descriptor = yield* discover("capabilities", DiscoveredCapabilities);
        }
        // stdin carries the bytes of a single file
        declared = input === "stdin"
          ? restrictTypes(descriptor, ["cnt"])
          : descriptor;
      }
      return declared;
    },
    *compute(request, limits) {
      let args = expandArguments(template, request, input);
      if (protocol === "json") {
        let body = JSON.stringify({
          op: "compute",
          payload_path: request.payload.path,
          obj_type: OBJECT_TYPES[request.type],
          version: request.variant.version,
          hash_algo: request.variant.algorithm,
          encoding: request.variant.encoding,
          commit: request.commit,
          tag: request.tag,
        });
        let outcome = yield* launch(
          args,
          new Uint8Array(Buffer.from(body, "utf8")),
          limits,
        );
        return readComputeResponse(outcome);
      }
      let stdin = input === "stdin"
        ? new Uint8Array(yield* until(readFile(request.payload.path)))
        : undefined;
      let outcome = yield* launch(args, stdin, limits);
      return readIdentifierLine(outcome);
    },
  };
}
