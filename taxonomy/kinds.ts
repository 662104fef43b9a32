export const ERROR_KINDS = [
  "PARSE_ERROR",
  "NORMALIZE_ERROR",
  "VALIDATION_ERROR",
  "COMPUTE_ERROR",
  "TIMEOUT",
  "RESOURCE_LIMIT",
  "IO_ERROR",
  "MISMATCH_ERROR",
] as const;

export type ErrorKind = typeof ERROR_KINDS[number];

export function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.some((kind) => kind === value);
}

/**
 * Exactly one kind per failed result, never combined.
 */
export interface Failure {
  readonly kind: ErrorKind;
  /** finer grained reason within the kind, e.g. `unavailable` */
  readonly subtype: string;
  readonly message: string;
  readonly context?: Readonly<Record<string, string | number>>;
}

/**
 * The implementation answered, but the answer is unusable or wrong.
 */
export function isAnswerFailure(kind: ErrorKind): boolean {
  return kind === "PARSE_ERROR" || kind === "NORMALIZE_ERROR" ||
    kind === "VALIDATION_ERROR" || kind === "MISMATCH_ERROR";
}

/**
 * The implementation could not be started. Kept apart from runtime
 * failures in every count.
 */
export function isUnavailable(failure: Failure | undefined): boolean {
  return failure?.kind === "IO_ERROR" && failure.subtype === "unavailable";
}
