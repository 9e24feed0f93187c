export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export type ScorerFailureReason = "timeout" | "unreachable" | "malformed";

export class ExternalScorerFailure extends Error {
  constructor(
    readonly reason: ScorerFailureReason,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ExternalScorerFailure";
  }
}
