import { createDb, runMigrations, closeDb, DbClient } from "@chirp/db";
import { config } from "./config.js";
import { log } from "./log.js";

/**
 * Opens the connection pool for the process lifetime. The handle is passed to
 * `buildServer` and released through `closeStore` on shutdown.
 */
export const openStore = async (options: { databaseUrl?: string; migrate?: boolean } = {}) => {
  const db = createDb(options.databaseUrl ?? config.DATABASE_URL);
  if (options.migrate ?? config.AUTO_MIGRATE) {
    await runMigrations(db);
    log.info("migrations.applied");
  }
  return db;
};

export const closeStore = async (db: DbClient) => {
  await closeDb(db);
};

export const pingStore = async (db: DbClient) => {
  try {
    await db.raw("select 1");
    return true;
  } catch (error) {
    log.warn("db.ping_failed", { error });
    return false;
  }
};
