import "dotenv/config";
import { Pool } from "pg";
import { loadApiConfig } from "./config.js";
import { createLogger, serializeError } from "./logger.js";
import { applySchema } from "./storage/schema.js";

const config = loadApiConfig();
const logger = createLogger(config.logLevel);

if (!config.databaseUrl) {
  logger.error({ event: "db.migrate.skipped" }, "DATABASE_URL is required to apply the schema");
  process.exit(1);
}

const pool = new Pool({ connectionString: config.databaseUrl });

try {
  await applySchema(pool);
  logger.info({ event: "db.migrate.applied" }, "Database schema applied");
} catch (error) {
  logger.error({ event: "db.migrate.failed", error: serializeError(error) }, "Schema apply failed");
  process.exitCode = 1;
} finally {
  await pool.end();
}
