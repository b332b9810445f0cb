// packages/tracker/src/db.ts
import Database from "better-sqlite3";
import { ensureTemporalTable, StorageUnavailableError } from "@company-tracker/temporal";

import type { TrackerConfig } from "./config.js";
import { companyEntity } from "./entities/company.js";
import { metricEntity } from "./entities/metric.js";
import { productEntity } from "./entities/product.js";
import { shareEntity } from "./entities/share.js";

export function migrateTrackerSchema(db: Database.Database): void {
  ensureTemporalTable(db, companyEntity);
  ensureTemporalTable(db, metricEntity);
  ensureTemporalTable(db, productEntity);
  ensureTemporalTable(db, shareEntity);
}

/**
 * Open (or create) the tracker database and make sure every entity table exists.
 * The caller owns the returned handle and closes it.
 */
export function openTrackerDatabase(
  config: Pick<TrackerConfig, "databasePath" | "busyTimeoutMs">
): Database.Database {
  let db: Database.Database;
  try {
    db = new Database(config.databasePath);
  } catch (e) {
    throw new StorageUnavailableError(
      `STORAGE_UNAVAILABLE: cannot open database at ${config.databasePath}`,
      e
    );
  }

  try {
    if (config.databasePath !== ":memory:") db.pragma("journal_mode = WAL");
    db.pragma(`busy_timeout = ${Math.trunc(config.busyTimeoutMs)}`);
    db.pragma("foreign_keys = ON");
    migrateTrackerSchema(db);
  } catch (e) {
    db.close();
    throw new StorageUnavailableError(
      `STORAGE_UNAVAILABLE: cannot prepare database at ${config.databasePath}`,
      e
    );
  }
  return db;
}
