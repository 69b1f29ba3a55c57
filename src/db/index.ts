import fs from "fs/promises";
import path from "path";
import { Pool } from "pg";
import type { AppConfig } from "../config";
import { logger } from "../lib/logger";

export const SCHEMA_PATH = path.resolve(__dirname, "..", "..", "db", "schema.sql");

export function createPool(config: Pick<AppConfig, "databaseUrl">): Pool {
  const pool = new Pool({
    connectionString: config.databaseUrl,
  });

  // Idle clients can error when the server drops them; log instead of crashing
  pool.on("error", (err) => {
    logger.error("Postgres pool error", { error: err.message });
  });

  return pool;
}

export async function applySchema(pool: Pool, schemaPath = SCHEMA_PATH) {
  const ddl = await fs.readFile(schemaPath, "utf8");
  await pool.query(ddl);
  logger.info("Database schema applied", { schema: schemaPath });
}
