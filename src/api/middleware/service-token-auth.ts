import { timingSafeEqual } from "node:crypto";
import type { Context, MiddlewareHandler } from "hono";
import { logger } from "../../config/logger.js";

/** Header accepted as an alternative to `Authorization: Bearer`. */
export const LEDGER_TOKEN_HEADER = "x-ledger-token";

/**
 * Extract the bearer token from an Authorization header value.
 * Returns `null` if the header is missing, empty, or not a Bearer scheme.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const trimmed = header.trim();
  if (!trimmed.toLowerCase().startsWith("bearer ")) return null;
  const token = trimmed.slice(7).trim();
  return token || null;
}

function presentedToken(c: Context): string | null {
  const bearer = extractBearerToken(c.req.header("Authorization"));
  if (bearer) return bearer;
  const header = c.req.header(LEDGER_TOKEN_HEADER)?.trim();
  return header || null;
}

function matchesAny(candidate: string, tokens: readonly Buffer[]): boolean {
  const a = Buffer.from(candidate);
  let matched = false;
  for (const b of tokens) {
    if (a.length === b.length && timingSafeEqual(a, b)) matched = true;
  }
  return matched;
}

function unauthorized(c: Context, message: string) {
  return c.json({ error: { code: "unauthorized", message } }, 401);
}

/**
 * Shared-secret auth for the usage routes. Runs before the body is read, so a
 * rejected request never reaches the ledger. With no tokens configured every
 * request is rejected.
 */
export function serviceTokenAuth(apiTokens: readonly string[]): MiddlewareHandler {
  const tokens = apiTokens.filter((t) => t.length > 0).map((t) => Buffer.from(t));
  if (tokens.length === 0) {
    logger.warn("No ledger API tokens configured; all usage requests will be rejected");
  }

  return async (c, next) => {
    const token = presentedToken(c);
    if (!token) {
      return unauthorized(c, "Missing service token");
    }

    if (!matchesAny(token, tokens)) {
      logger.warn("Invalid service token attempted", {
        keyPrefix: `${token.slice(0, 4)}...`,
        path: c.req.path,
      });
      return unauthorized(c, "Invalid service token");
    }

    await next();
  };
}
