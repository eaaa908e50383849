/**
 * Apply pending database migrations and exit.
 *
 * Usage:
 *   DATABASE_URL=postgres://... npx tsx scripts/migrate.ts
 */

import { Pool } from "pg";
import { config } from "../src/config/index.js";
import { logger } from "../src/config/logger.js";
import { runMigrations } from "../src/db/migrate.js";

const pool = new Pool({ connectionString: config.databaseUrl });
try {
  await runMigrations(pool);
  logger.info("Migrations applied");
} catch (err) {
  logger.error("Migration failed", { err });
  process.exitCode = 1;
} finally {
  await pool.end();
}
