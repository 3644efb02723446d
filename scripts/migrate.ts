/**
 * Creates the schema (tables only; indexes are applied after each load).
 * Run: npx tsx scripts/migrate.ts
 */
import "dotenv/config";
import { loadConfig } from "../src/config.ts";
import { createPool } from "../src/db/client.ts";
import { PgJobStore } from "../src/db/pg-store.ts";
import { logger } from "../src/utils/logger.ts";

async function migrate(): Promise<void> {
  const config = loadConfig();
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL environment variable is not set");
  }

  const store = new PgJobStore(createPool({ connectionString: config.databaseUrl, ssl: config.databaseSsl }));
  try {
    logger.info("Starting database migration...");
    await store.applySchema();
    logger.info("Database migration completed successfully");
  } finally {
    await store.close();
  }
}

migrate().catch((err) => {
  logger.error("Database migration failed", err);
  process.exitCode = 1;
});
