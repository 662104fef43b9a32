export class ConfigError extends Error {
  override name = "ConfigError";

  constructor(
    message: string,
    readonly source?: string,
    readonly issues: readonly string[] = [],
  ) {
    super();
    this.message = [
      source ? `${source}: ${message}` : message,
      ...issues.map((issue) => `  - ${issue}`),
    ].join("\n");
  }
}

export class RecordVersionError extends Error {
  override name = "RecordVersionError";

  constructor(readonly found: string, readonly supported: string) {
    super(
      `result record has schema version ${found}, which is incompatible with ${supported}`,
    );
  }
}

/** command line arguments that parse but make no sense */
export class UsageError extends Error {
  override name = "UsageError";
}
