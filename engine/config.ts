import { readFile } from "node:fs/promises";
import { availableParallelism } from "node:os";
import { dirname, isAbsolute, resolve } from "node:path";
import { type Operation, until } from "effection";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  external,
  type Implementation,
  inProcess,
} from "@swhid-conformance/adapter";
import {
  CapabilitySchema,
  ObjectTypeSchema,
  VariantKeySchema,
} from "@swhid-conformance/capability";
import { type Identifier, parse } from "@swhid-conformance/identifier";
import { REFERENCE_MODULE } from "@swhid-conformance/reference";
import { errnoCode, type Limits } from "@swhid-conformance/sandbox";
import { ERROR_KINDS } from "@swhid-conformance/taxonomy";
import { ConfigError } from "./errors.ts";

export const GoldenSchema = z.string().transform((text, ctx): Identifier => {
  let parsed = parse(text);
  if (!parsed.ok) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `invalid identifier: ${parsed.error.message}`,
    });
    return z.NEVER;
  }
  return parsed.value;
});

export const ExpectedSchema = z.record(VariantKeySchema, GoldenSchema)
  .superRefine((expected, ctx) => {
    for (let [key, identifier] of Object.entries(expected)) {
      if (identifier && identifier.variant?.key !== key) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${identifier.text} is not a ${key} identifier`,
        });
      }
    }
  });

export const ExpectedRefsSchema = z.object({
  branches: z.record(z.string(), GoldenSchema).default({}),
  tags: z.record(z.string(), GoldenSchema).default({}),
});

export const PayloadSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
  objectType: ObjectTypeSchema,
  description: z.string().optional(),
  expected: ExpectedSchema.default({}),
  /** makes this a negative case; `any` accepts every kind of rejection */
  expectedError: z.union([z.enum(ERROR_KINDS), z.literal("any")]).optional(),
  /** repository to resolve `commit` and `tag` in; the payload itself if unset */
  repository: z.string().optional(),
  commit: z.string().optional(),
  tag: z.string().optional(),
  discoverBranches: z.boolean().default(false),
  discoverTags: z.boolean().default(false),
  expectedRefs: ExpectedRefsSchema.default({}),
});

export type PayloadEntry = z.output<typeof PayloadSchema>;

const InfoSchema = z.object({
  version: z.string().optional(),
  language: z.string().optional(),
  description: z.string().optional(),
});

const ExternalSchema = z.object({
  name: z.string().min(1),
  type: z.literal("external"),
  command: z.union([
    z.string().min(1).transform((command): [string] => [command]),
    z.array(z.string()).nonempty(),
  ]),
  arguments: z.array(z.string()).optional(),
  protocol: z.enum(["line", "json"]).default("line"),
  input: z.enum(["path", "stdin"]).default("path"),
  cwd: z.string().optional(),
  env: z.record(z.string(), z.string()).default({}),
  capabilities: CapabilitySchema.optional(),
  info: InfoSchema.optional(),
});

const InProcessSchema = z.object({
  name: z.string().min(1),
  type: z.literal("in-process"),
  module: z.string().min(1),
  capabilities: CapabilitySchema.optional(),
});

const ReferenceSchema = z.object({
  name: z.string().min(1).default("reference"),
  type: z.literal("reference"),
});

export const ImplementationSchema = z.discriminatedUnion("type", [
  ExternalSchema,
  InProcessSchema,
  ReferenceSchema,
]);

export type ImplementationEntry = z.output<typeof ImplementationSchema>;

export const SettingsSchema = z.object({
  concurrency: z.number().int().min(1).default(() => availableParallelism()),
  timeoutMs: z.number().int().positive().default(30_000),
  cpuMs: z.number().int().positive().optional(),
  memoryMb: z.number().int().positive().optional(),
  addressSpaceMb: z.number().int().positive().optional(),
  variants: z.array(VariantKeySchema).min(1).default(["v1-sha1-hex"]),
});

export type Settings = z.output<typeof SettingsSchema>;

function duplicates(names: string[]): string[] {
  return [...new Set(names.filter((name, i) => names.indexOf(name) !== i))];
}

export const ConfigSchema = z.object({
  settings: SettingsSchema.default({}),
  implementations: z.array(ImplementationSchema).min(1),
  payloads: z.record(z.string(), z.array(PayloadSchema)),
}).superRefine((config, ctx) => {
  for (let name of duplicates(config.implementations.map((i) => i.name))) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["implementations"],
      message: `implementation '${name}' is defined more than once`,
    });
  }
  for (let [category, payloads] of Object.entries(config.payloads)) {
    for (let name of duplicates(payloads.map((p) => p.name))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["payloads", category],
        message: `payload '${name}' is defined more than once`,
      });
    }
  }
});

export type Config = z.output<typeof ConfigSchema>;

export function limitsOf(settings: Settings): Limits {
  return {
    timeoutMs: settings.timeoutMs,
    cpuMs: settings.cpuMs,
    memoryMb: settings.memoryMb,
    addressSpaceMb: settings.addressSpaceMb,
  };
}

function issues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/**
 * Validate a configuration object. Relative paths are resolved against
 * `baseDir`.
 */
export function parseConfig(value: unknown, baseDir: string, source?: string): Config {
  let parsed = ConfigSchema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ConfigError("invalid configuration", source, issues(parsed.error));
  }
  let config = parsed.data;
  let local = (path: string) => isAbsolute(path) ? path : resolve(baseDir, path);

  return {
    ...config,
    implementations: config.implementations.map((entry) => {
      switch (entry.type) {
        case "external": {
          let [executable, ...rest] = entry.command;
          // bare command names are looked up on PATH
          let command: [string, ...string[]] = [
            executable.includes("/") ? local(executable) : executable,
            ...rest,
          ];
          return {
            ...entry,
            command,
            cwd: entry.cwd ? local(entry.cwd) : undefined,
          };
        }
        case "in-process":
          return { ...entry, module: local(entry.module) };
        case "reference":
          return entry;
      }
    }),
    payloads: Object.fromEntries(
      Object.entries(config.payloads).map(([category, payloads]) => [
        category,
        payloads.map((payload) => ({
          ...payload,
          path: local(payload.path),
          repository: payload.repository ? local(payload.repository) : undefined,
        })),
      ]),
    ),
  };
}

export function* loadConfig(path: string): Operation<Config> {
  let text: string;
  try {
    text = yield* until(readFile(path, "utf8"));
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      throw new ConfigError("configuration file not found", path);
    }
    throw error;
  }
  let value: unknown;
  try {
    value = parseYaml(text);
  } catch (error) {
    throw new ConfigError(
      `invalid YAML: ${error instanceof Error ? error.message : error}`,
      path,
    );
  }
  return parseConfig(value, dirname(resolve(path)), path);
}

export function createImplementation(entry: ImplementationEntry): Implementation {
  switch (entry.type) {
    case "external":
      return external({
        name: entry.name,
        command: entry.command,
        arguments: entry.arguments,
        protocol: entry.protocol,
        input: entry.input,
        cwd: entry.cwd,
        env: entry.env,
        capabilities: entry.capabilities,
        info: entry.info,
      });
    case "in-process":
      return inProcess({
        name: entry.name,
        module: entry.module,
        capabilities: entry.capabilities,
      });
    case "reference":
      return inProcess({ name: entry.name, module: REFERENCE_MODULE });
  }
}

export function createImplementations(config: Config): Implementation[] {
  return config.implementations.map(createImplementation);
}
