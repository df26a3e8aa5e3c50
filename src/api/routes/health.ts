import { sql } from "drizzle-orm";
import { Hono } from "hono";
import { logger } from "../../config/logger.js";
import type { DrizzleDb } from "../../db/index.js";

export const SERVICE_NAME = "usage-ledger";

/** Resolves when the store answers; rejects otherwise. */
export type StoreProbe = () => Promise<void>;

export function dbProbe(db: DrizzleDb): StoreProbe {
  return async () => {
    await db.execute(sql`select 1`);
  };
}

// Public, unauthenticated, used by load balancers and monitoring.
export function createHealthRoutes(probe: StoreProbe): Hono {
  const routes = new Hono();

  routes.get("/", async (c) => {
    try {
      await probe();
      return c.json({ status: "ok", service: SERVICE_NAME });
    } catch (err) {
      logger.warn("Health check store probe failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      return c.json({ status: "degraded", service: SERVICE_NAME }, 503);
    }
  });

  return routes;
}
