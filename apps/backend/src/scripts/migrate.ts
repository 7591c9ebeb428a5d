/**
 * Apply pending SQL migrations to SQLITE_DB and exit.
 *
 * Usage: npm run migrate
 */

import { createLogger, runtimeConfig } from "../app/context";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../migrate";

const logger = createLogger(runtimeConfig);
const db = openDatabase(runtimeConfig.sqlitePath);

try {
  const result = runMigrations(db, logger);
  logger.info({ sqlitePath: runtimeConfig.sqlitePath, ...result }, "Migrations complete");
} catch (error) {
  logger.fatal({ err: error }, "Migration failed");
  process.exitCode = 1;
} finally {
  db.close();
}
