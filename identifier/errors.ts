/**
 * Raised (or returned inside a `Result`) when text does not match the
 * identifier grammar.
 */
export class IdentifierSyntaxError extends Error {
  override name = "IdentifierSyntaxError";

  constructor(
    readonly reason: string,
    readonly input: string,
    readonly position?: number,
  ) {
    super();
  }

  override get message(): string {
    let at = this.position !== undefined ? ` at offset ${this.position}` : "";
    return `${this.reason}${at}: ${JSON.stringify(this.input)}`;
  }
}
