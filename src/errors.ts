import type { ZodIssue } from "zod";

export type ErrorCode =
  | "auth_error"
  | "validation_error"
  | "not_found"
  | "duplicate_user"
  | "stage_parse_error"
  | "stage_unavailable"
  | "collaborator_unavailable";

abstract class HedgeDeskError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing, unknown or revoked API key. */
export class AuthError extends HedgeDeskError {
  readonly code = "auth_error";
}

/** Malformed request body or query. */
export class ValidationError extends HedgeDeskError {
  readonly code = "validation_error";

  constructor(message: string, readonly issues: readonly ZodIssue[] = []) {
    super(message);
  }
}

/** Unknown record, or one the caller does not own. Never says which. */
export class NotFoundError extends HedgeDeskError {
  readonly code = "not_found";
}

export class DuplicateUserError extends HedgeDeskError {
  readonly code = "duplicate_user";
}

/** Capability response could not be coerced into the stage's typed output. */
export class StageParseError extends HedgeDeskError {
  readonly code = "stage_parse_error";

  constructor(message: string, readonly rawResponse: string = "") {
    super(message);
  }
}

/** Capability or market-data call itself failed (network, timeout, quota). */
export class StageUnavailableError extends HedgeDeskError {
  readonly code = "stage_unavailable";
}

/** A collaborator is unreachable before any per-stock work starts. */
export class CollaboratorUnavailableError extends HedgeDeskError {
  readonly code = "collaborator_unavailable";
}

export function httpStatusFor(err: unknown): number {
  if (err instanceof AuthError) return 401;
  if (err instanceof ValidationError) return 422;
  if (err instanceof NotFoundError) return 404;
  if (err instanceof DuplicateUserError) return 409;
  return 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
