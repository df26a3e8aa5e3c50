import type { Context, ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";
import { InvalidRequestError, LedgerError, type LedgerErrorCode, QuotaExceededError } from "../usage/errors.js";

export const LEDGER_ERROR_STATUS = {
  invalid_request: 400,
  quota_exceeded: 402,
  store_unavailable: 503,
} as const satisfies Record<LedgerErrorCode, number>;

/** `{ error: { code, message, ...details } }`, the envelope every failure shares. */
export function ledgerErrorBody(err: LedgerError): { error: Record<string, unknown> } {
  const error: Record<string, unknown> = { code: err.code, message: err.message };
  if (err instanceof QuotaExceededError) {
    error.requested_seconds = err.requestedSeconds;
    error.remaining_seconds = err.remainingSeconds;
  } else if (err instanceof InvalidRequestError && err.issues.length > 1) {
    error.issues = err.issues;
  }
  return { error };
}

function ledgerErrorResponse(c: Context, err: LedgerError): Response {
  if (err.code === "store_unavailable") {
    captureError(err.cause ?? err, { route: c.req.path, source: "usage-store" });
  }
  return c.json(ledgerErrorBody(err), LEDGER_ERROR_STATUS[err.code]);
}

/**
 * Global error handler. Ledger errors map to their status codes; anything
 * else is logged, reported and answered with 500.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof LedgerError) {
    return ledgerErrorResponse(c, err);
  }
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });
  captureError(err, { route: c.req.path, source: "http" });

  return c.json({ error: { code: "internal_error", message: "An unexpected error occurred" } }, 500);
};
