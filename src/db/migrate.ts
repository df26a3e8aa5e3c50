import path from "node:path";
import { fileURLToPath } from "node:url";
import { drizzle } from "drizzle-orm/node-postgres";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import type { Pool } from "pg";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Absolute path of the SQL migrations folder.
 *
 * __dirname is <root>/dist/db in production and <root>/src/db in dev/test;
 * both resolve to <root>/drizzle/migrations.
 */
export const MIGRATIONS_FOLDER = path.resolve(__dirname, "../../drizzle/migrations");

/** Apply all pending Drizzle migrations. */
export async function runMigrations(pool: Pool): Promise<void> {
  await migrate(drizzle(pool), { migrationsFolder: MIGRATIONS_FOLDER });
}
