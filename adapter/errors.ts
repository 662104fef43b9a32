import type { RawOutcome } from "@swhid-conformance/sandbox";

export class CommandError extends Error {
  override name = "CommandError";

  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly outcome: RawOutcome,
    readonly cwd?: string,
  ) {
    super();
  }

  override get message(): string {
    let { outcome } = this;
    let status = outcome.type === "crashed"
      ? [
        outcome.exitCode !== undefined ? `code: ${outcome.exitCode}` : null,
        outcome.signal ? `signal: ${outcome.signal}` : null,
        outcome.detail.trim() || null,
      ]
      : [outcome.type];
    let cwd = this.cwd ? `cwd: ${this.cwd}` : null;
    let command = `$ ${this.command} ${this.args.join(" ")}`.trim();
    return [...status, cwd, command].filter((item) => !!item).join("\n");
  }
}

export class PayloadError extends Error {
  override name = "PayloadError";

  constructor(readonly path: string, reason: string) {
    super(`payload ${path}: ${reason}`);
  }
}

export class ReferenceResolutionError extends Error {
  override name = "ReferenceResolutionError";

  constructor(readonly repository: string, readonly ref: string, reason: string) {
    super(`cannot resolve '${ref}' in ${repository}: ${reason}`);
  }
}

/**
 * Raised inside an in-process worker when the implementation module
 * cannot be loaded.
 */
export class ImplementationUnavailable extends Error {
  override name = "ImplementationUnavailable";
}
