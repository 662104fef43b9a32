import { access, constants } from "node:fs/promises";
import { delimiter, isAbsolute, join, resolve } from "node:path";
import process from "node:process";
import { type Operation, until } from "effection";
import type { Availability } from "./types.ts";

const PASSTHROUGH = /^(PATH|HOME|LANG|LANGUAGE|LC_[A-Z_]+|TZ|TMPDIR|SYSTEMROOT)$/;

/**
 * The environment implementations run in: locale, search path and home
 * from the harness, nothing else unless configured.
 */
export function cleanEnvironment(
  extra: Record<string, string> = {},
): Record<string, string> {
  let env: Record<string, string> = {};
  for (let [key, value] of Object.entries(process.env)) {
    if (value !== undefined && PASSTHROUGH.test(key)) {
      env[key] = value;
    }
  }
  return { ...env, ...extra };
}

function* executable(path: string): Operation<boolean> {
  try {
    yield* until(access(path, constants.X_OK));
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate a command the way the shell would, without running it.
 */
export function* which(
  command: string,
  options: { cwd?: string; path?: string } = {},
): Operation<Availability> {
  if (command.includes("/") || isAbsolute(command)) {
    let location = resolve(options.cwd ?? process.cwd(), command);
    return (yield* executable(location))
      ? { available: true, location }
      : { available: false, reason: `${location} is not an executable file` };
  }
  let search = options.path ?? process.env.PATH ?? "";
  for (let dir of search.split(delimiter).filter(Boolean)) {
    let location = join(dir, command);
    if (yield* executable(location)) {
      return { available: true, location };
    }
  }
  return { available: false, reason: `${command} not found on PATH` };
}
