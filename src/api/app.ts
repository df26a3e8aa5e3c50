import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import type { IUsageLedger } from "../usage/usage-ledger.js";
import { errorHandler } from "./error-handler.js";
import { createHealthRoutes, type StoreProbe } from "./routes/health.js";
import { createUsageRoutes } from "./routes/usage.js";

/** Usage bodies are a handful of scalar fields. */
export const MAX_BODY_BYTES = 16 * 1024;

export interface AppDeps {
  ledger: IUsageLedger;
  apiTokens: readonly string[];
  corsOrigins: readonly string[];
  probe: StoreProbe;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.use(
    "/*",
    cors({
      origin: deps.corsOrigins.includes("*") ? "*" : [...deps.corsOrigins],
      allowMethods: ["GET", "POST"],
      allowHeaders: ["Content-Type", "Authorization", "x-ledger-token"],
    }),
  );
  app.use(
    "/*",
    secureHeaders({
      contentSecurityPolicy: { defaultSrc: ["'none'"], frameAncestors: ["'none'"] },
      strictTransportSecurity: "max-age=31536000; includeSubDomains; preload",
      xFrameOptions: "DENY",
    }),
  );
  app.use(
    "/usage/*",
    bodyLimit({
      maxSize: MAX_BODY_BYTES,
      onError: (c) =>
        c.json({ error: { code: "payload_too_large", message: `Request body exceeds ${MAX_BODY_BYTES} bytes` } }, 413),
    }),
  );

  app.route("/health", createHealthRoutes(deps.probe));
  app.route("/usage", createUsageRoutes({ ledger: deps.ledger, apiTokens: deps.apiTokens }));

  app.notFound((c) => c.json({ error: { code: "not_found", message: `No route for ${c.req.method} ${c.req.path}` } }, 404));
  app.onError(errorHandler);

  return app;
}
