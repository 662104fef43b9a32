import { all, type Operation } from "effection";
import type {
  Availability,
  Implementation,
  ImplementationInfo,
} from "@swhid-conformance/adapter";
import type { CapabilityDescriptor } from "@swhid-conformance/capability";
import { ConfigError } from "./errors.ts";
import { log } from "./logger.ts";

export interface RegisteredImplementation {
  readonly implementation: Implementation;
  readonly info: ImplementationInfo;
  readonly availability: Availability;
  /** present whenever the implementation is available */
  readonly capabilities?: CapabilityDescriptor;
}

/**
 * Everything known about the implementations of one run, built once at
 * startup and handed to whoever needs it.
 */
export interface Registry {
  readonly entries: readonly RegisteredImplementation[];
  get(name: string): RegisteredImplementation | undefined;
}

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function* register(implementation: Implementation): Operation<RegisteredImplementation> {
  let { name } = implementation;
  let fallback: ImplementationInfo = { name, version: "unknown" };

  let availability = yield* implementation.probe();
  if (!availability.available) {
    yield* log.warn(`${name} is unavailable: ${availability.reason}`);
    return { implementation, info: fallback, availability };
  }

  try {
    let capabilities = yield* implementation.capabilities();
    let info = yield* implementation.describe();
    yield* log.debug(
      `${name} ${info.version}: ${capabilities.types.join(",")} / ${capabilities.variants.join(",")}`,
    );
    return { implementation, info, availability, capabilities };
  } catch (error) {
    let reason = `discovery failed: ${message(error)}`;
    yield* log.warn(`${name} is unavailable: ${reason}`);
    return {
      implementation,
      info: fallback,
      availability: { available: false, reason },
    };
  }
}

export function* createRegistry(
  implementations: readonly Implementation[],
): Operation<Registry> {
  let names = implementations.map((i) => i.name);
  let duplicate = names.find((name, i) => names.indexOf(name) !== i);
  if (duplicate !== undefined) {
    throw new ConfigError(`implementation '${duplicate}' is registered more than once`);
  }

  let entries = yield* all(implementations.map((i) => register(i)));
  return {
    entries,
    get: (name) => entries.find((entry) => entry.implementation.name === name),
  };
}
