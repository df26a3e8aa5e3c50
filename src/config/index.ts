import { z } from "zod";

/** Split a comma-separated env value into trimmed, non-empty entries. */
function parseList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

const configSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).default(3100),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Postgres connection string for the usage ledger. */
  databaseUrl: z.string().min(1).default("postgres://localhost:5432/usage_ledger"),

  /** Shared service credentials accepted on /usage/* routes. Empty = reject everything. */
  apiTokens: z.array(z.string().min(1)).default([]),

  /** Allowed CORS origins; "*" allows any. */
  corsOrigins: z.array(z.string().min(1)).default(["*"]),

  sentryDsn: z.string().optional(),

  ledger: z
    .object({
      /** Compare-and-set attempts before a contended write gives up with store_unavailable. */
      maxWriteAttempts: z.coerce.number().int().min(1).max(100).default(10),
    })
    .default({ maxWriteAttempts: 10 }),
});

export type Config = z.infer<typeof configSchema>;

/** Parse configuration from an environment map. Throws a ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    databaseUrl: env.DATABASE_URL || undefined,
    apiTokens: parseList(env.LEDGER_API_TOKENS),
    corsOrigins: parseList(env.CORS_ORIGINS),
    sentryDsn: env.SENTRY_DSN || undefined,
    ledger: {
      maxWriteAttempts: env.LEDGER_MAX_WRITE_ATTEMPTS,
    },
  });
}

export const config = loadConfig(process.env);
