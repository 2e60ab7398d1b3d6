import fs from "fs";
import path from "path";
import { Pool } from "pg";
import { logger } from "../utils/logger";

const SCHEMA_FILE = path.resolve(__dirname, "../../db/schema.sql");

export const REQUIRED_TABLES = [
  "jobs",
  "contacts",
  "email_templates",
  "email_logs",
  "email_accounts",
];

export function createPool(connectionString: string): Pool {
  const pool = new Pool({ connectionString, max: 4 });
  pool.on("error", (error) => {
    logger.error("Idle database client error", error);
  });
  return pool;
}

/**
 * Verify the database exists and has every table the services need.
 */
export async function verifyDatabase(pool: Pool): Promise<boolean> {
  try {
    const result = await pool.query<{ table_name: string }>(
      `SELECT table_name FROM information_schema.tables
       WHERE table_schema = current_schema() AND table_name = ANY($1)`,
      [REQUIRED_TABLES]
    );

    const present = result.rows.map((row) => row.table_name);
    const missing = REQUIRED_TABLES.filter((t) => !present.includes(t));

    if (missing.length > 0) {
      logger.error(`Database is missing tables: ${missing.join(", ")}`);
      logger.info("Run `outreach init-db` to create the schema");
      return false;
    }

    logger.info("Database verified successfully");
    return true;
  } catch (error) {
    logger.error("Failed to verify database", error);
    return false;
  }
}

export async function applySchema(pool: Pool): Promise<void> {
  const sql = fs.readFileSync(SCHEMA_FILE, "utf-8");
  await pool.query(sql);
  logger.info("Database schema applied");
}
