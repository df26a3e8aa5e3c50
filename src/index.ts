import { serve } from "@hono/node-server";
import pg from "pg";
import { createApp } from "./api/app.js";
import { dbProbe } from "./api/routes/health.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createDb } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import { captureError, initSentry } from "./observability/sentry.js";
import { createUsageLedger } from "./usage/usage-ledger.js";

/** Grace period for in-flight requests before a signal forces exit. */
const SHUTDOWN_TIMEOUT_MS = 10_000;

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
  captureError(reason instanceof Error ? reason : new Error(String(reason)), {
    source: "unhandledRejection",
  });
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  captureError(err, { source: "uncaughtException", extra: { origin } });
  // Winston Console transport is synchronous, so the log line is out before exit.
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

// No-op when SENTRY_DSN is absent
initSentry(config.sentryDsn, config.nodeEnv);

async function main(): Promise<void> {
  const pool = new pg.Pool({ connectionString: config.databaseUrl });
  pool.on("error", (err) => {
    logger.error("Idle Postgres client error", { error: err.message });
  });

  await runMigrations(pool);
  logger.info("Database migrations applied");

  const db = createDb(pool);
  const ledger = createUsageLedger(db, { maxWriteAttempts: config.ledger.maxWriteAttempts });
  const app = createApp({
    ledger,
    apiTokens: config.apiTokens,
    corsOrigins: config.corsOrigins,
    probe: dbProbe(db),
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`usage-ledger listening on http://0.0.0.0:${info.port}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });

    setTimeout(() => {
      logger.error("Shutdown timed out; forcing exit", { timeoutMs: SHUTDOWN_TIMEOUT_MS });
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    server.close((closeErr) => {
      if (closeErr) {
        logger.error("HTTP server close failed", { error: closeErr.message });
      }
      pool.end().then(
        () => process.exit(closeErr ? 1 : 0),
        (poolErr: unknown) => {
          logger.error("Postgres pool close failed", {
            error: poolErr instanceof Error ? poolErr.message : String(poolErr),
          });
          process.exit(1);
        },
      );
    });
  };

  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

main().catch((err: unknown) => {
  logger.error("Failed to start usage-ledger", {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  captureError(err, { source: "startup" });
  process.exit(1);
});
