import process from "node:process";
import type { ProcessLaunch } from "../src/api.ts";

export function fixture(name: string): string {
  return new URL(`./fixtures/${name}`, import.meta.url).pathname;
}

export function node(
  script: string,
  args: string[] = [],
  stdin?: Uint8Array,
): ProcessLaunch {
  return {
    type: "process",
    command: process.execPath,
    arguments: [fixture(script), ...args],
    stdin,
  };
}

export const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes);
