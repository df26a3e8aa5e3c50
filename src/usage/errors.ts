import type { ZodError } from "zod";

export type LedgerErrorCode = "invalid_request" | "quota_exceeded" | "store_unavailable";

/** Base class for every typed rejection the ledger returns. */
export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;
}

/** Missing or malformed input. Raised before any store access. */
export class InvalidRequestError extends LedgerError {
  readonly code = "invalid_request";
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InvalidRequestError";
    this.issues = issues;
  }

  /** One message per issue, prefixed with the field's wire name (`seconds_credited: must be positive`). */
  static fromZodError(error: ZodError): InvalidRequestError {
    const issues = error.issues.map((i) =>
      i.path.length ? `${i.path.map(wireName).join(".")}: ${i.message}` : i.message,
    );
    return new InvalidRequestError(issues[0] ?? "Invalid request", issues);
  }
}

function wireName(segment: string | number): string {
  return String(segment).replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

/** A Book asked for more than the combined subscription and top-up balance. Nothing was written. */
export class QuotaExceededError extends LedgerError {
  readonly code = "quota_exceeded";
  readonly requestedSeconds: number;
  readonly remainingSeconds: number;

  constructor(requestedSeconds: number, remainingSeconds: number) {
    super(`Quota exceeded: requested ${requestedSeconds}s, ${remainingSeconds}s remaining`);
    this.name = "QuotaExceededError";
    this.requestedSeconds = requestedSeconds;
    this.remainingSeconds = remainingSeconds;
  }
}

/**
 * Persistence failed or a contended write ran out of attempts.
 * Callers treat the operation as not applied and may retry.
 */
export class StoreUnavailableError extends LedgerError {
  readonly code = "store_unavailable";

  constructor(operation: string, cause?: unknown) {
    super(`Usage store unavailable during ${operation}`, { cause });
    this.name = "StoreUnavailableError";
  }
}
