/**
 * MIGRATION CONVENTIONS
 *
 * Every migration MUST be backward-compatible with the PREVIOUS release's code.
 * The deploy sequence is: migrate DB -> roll out new code. If the new code crashes,
 * the old code must still work with the migrated schema.
 *
 * SAFE: CREATE TABLE, ADD COLUMN (nullable or with DEFAULT), CREATE INDEX.
 * UNSAFE (expand-contract only): DROP TABLE, DROP COLUMN, RENAME COLUMN, new NOT NULL.
 *
 * After changing src/db/schema/, run `npm run db:generate` and review the SQL
 * before committing. Hand-written migrations (CHECK constraints) are created
 * with `drizzle-kit generate --custom`.
 */
import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: ["./src/db/schema/usage-records.ts", "./src/db/schema/topup-purchases.ts"],
  out: "./drizzle/migrations",
  dialect: "postgresql",
  dbCredentials: { url: process.env.DATABASE_URL || "postgres://localhost:5432/usage_ledger" },
});
