export type CoachErrorCode =
  | "InvalidConfiguration"
  | "InvalidState"
  | "OutOfOrderSubmission"
  | "InsufficientContext"
  | "UnsupportedFormat"
  | "ExtractionFailure"
  | "NotCompleted"
  | "SessionNotFound";

export class CoachError extends Error {
  constructor(
    readonly code: CoachErrorCode,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CoachError";
  }
}

export function isCoachError(error: unknown, code?: CoachErrorCode): error is CoachError {
  if (!(error instanceof CoachError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
