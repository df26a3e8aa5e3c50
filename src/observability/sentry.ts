import * as Sentry from "@sentry/node";

let enabled = false;

/**
 * Initialize Sentry. Call once at process start, before the server accepts
 * requests. No-op when dsn is absent or empty.
 */
export function initSentry(dsn: string | undefined, environment = "development"): void {
  if (!dsn) {
    enabled = false;
    return;
  }

  Sentry.init({
    dsn,
    environment,
    release: process.env.SENTRY_RELEASE ?? undefined,
    tracesSampleRate: environment === "production" ? 0.1 : 1.0,
    integrations: [Sentry.dedupeIntegration()],
    // Strip query params that might contain tokens
    beforeBreadcrumb(breadcrumb) {
      if (breadcrumb.category === "http" && typeof breadcrumb.data?.url === "string") {
        try {
          const url = new URL(breadcrumb.data.url);
          url.search = "";
          breadcrumb.data.url = url.toString();
        } catch {
          // not an absolute URL; nothing to strip
        }
      }
      return breadcrumb;
    },
  });
  enabled = true;
}

/** Report an exception with optional request context. No-op when Sentry is disabled. */
export function captureError(
  error: unknown,
  context?: {
    route?: string;
    userKey?: string;
    source?: string;
    extra?: Record<string, unknown>;
  },
): void {
  if (!enabled) return;
  Sentry.captureException(error, {
    tags: {
      ...(context?.route && { route: context.route }),
      ...(context?.source && { source: context.source }),
    },
    extra: {
      ...(context?.userKey && { userKey: context.userKey }),
      ...context?.extra,
    },
  });
}
