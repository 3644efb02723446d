import { Pool } from "pg";
import type { PoolClient } from "pg";
import { logger } from "../utils/logger.ts";

export interface PoolOptions {
  connectionString: string;
  ssl: boolean;
  max?: number;
}

export function createPool(options: PoolOptions): Pool {
  // Drop sslmode & co. from the URL so the explicit ssl setting wins
  let connectionString = options.connectionString;
  try {
    const url = new URL(options.connectionString);
    for (const param of ["sslmode", "ssl", "sslcert", "sslkey", "sslrootcert"]) {
      url.searchParams.delete(param);
    }
    connectionString = url.toString();
  } catch {
    logger.debug("DATABASE_URL is not a URL; passing it to pg unchanged");
  }

  const pool = new Pool({
    connectionString,
    ssl: options.ssl ? { rejectUnauthorized: false } : false,
    max: options.max ?? 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });

  pool.on("error", (err) => {
    logger.error("Unexpected error on idle database client", err);
  });

  return pool;
}

export async function withTransaction<T>(
  pool: Pool,
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await callback(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackError) {
      logger.warn("ROLLBACK failed", rollbackError);
    }
    throw error;
  } finally {
    client.release();
  }
}
