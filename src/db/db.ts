/**
 * Guildforge — src/db/db.ts
 * WHAT: SQLite connection bootstrap for the stores.
 * FLOWS:
 *  - openDatabase(path) → set PRAGMAs → handle
 *  - getDb() → lazily open env.DB_PATH and ensure the schema once
 *  - closeDatabase() → close handle, flush Sentry
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous by design; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { ensureSchema } from "./ensure.js";

const DB_BUSY_TIMEOUT_MS = 5000;

export type Db = Database.Database;

/**
 * Open a database with the PRAGMAs every store expects. ":memory:" is accepted
 * for tests and skips directory creation.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath, { fileMustExist: false });
  // WAL journaling improves concurrency for readers/writers
  db.pragma("journal_mode = WAL");
  // Reduce fsync frequency vs FULL
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");
  // Fail soft during brief contention rather than throwing immediately
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
  logger.info({ evt: "db_opened", dbPath }, "SQLite opened");
  return db;
}

let processDb: Db | null = null;

/** The process database at env.DB_PATH, opened and migrated on first use. */
export function getDb(): Db {
  if (!processDb) {
    processDb = openDatabase(env.DB_PATH);
    ensureSchema(processDb);
  }
  return processDb;
}

export async function closeDatabase(): Promise<void> {
  // Never crash on shutdown; prefer logs over throws here.
  if (processDb) {
    logger.info("Closing database connection...");
    try {
      processDb.close();
      logger.info("Database closed successfully");
    } catch (err) {
      logger.error({ err }, "Error closing database");
    }
    processDb = null;
  }

  try {
    const { flushSentry } = await import("../lib/sentry.js");
    await flushSentry();
  } catch (err) {
    logger.warn({ err }, "Failed to flush Sentry events");
  }
}
