import path from "node:path";
import { fileURLToPath } from "node:url";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import { drizzle } from "drizzle-orm/node-postgres";
import type { Pool } from "pg";
import * as schema from "./schema/index.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Resolve the migrations folder from this file: compiled JS lives in
 * dist/db/, sources in src/db/, and both sit two levels under the root.
 */
export const migrationsFolder = path.resolve(__dirname, "../../drizzle/migrations");

/** Apply all pending Drizzle migrations. Already-applied ones are skipped. */
export async function runMigrations(pool: Pool): Promise<void> {
  const db: NodePgDatabase<typeof schema> = drizzle(pool, { schema });
  await migrate(db, { migrationsFolder });
}
