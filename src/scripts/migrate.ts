// Applies db/init.sql to DATABASE_URL. The schema is idempotent.
import fs from "fs";
import path from "path";

import { config } from "@config/index";
import { createPool } from "@infra/database/db";
import { describeError, logger } from "@infra/logging/Logger";

async function migrate(): Promise<void> {
  if (!config.db.url) {
    logger.log("error", "DATABASE_URL is empty; nothing to migrate");
    process.exitCode = 1;
    return;
  }

  const schemaPath = path.join(process.cwd(), "db", "init.sql");
  const sql = fs.readFileSync(schemaPath, "utf-8");
  const pool = createPool(config.db, logger);

  try {
    await pool.query(sql);
    logger.log("info", "Schema applied", { schemaPath });
  } catch (err: unknown) {
    logger.log("error", "Schema migration failed", describeError(err));
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void migrate();
