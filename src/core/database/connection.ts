/**
 * Database connection management
 */

import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { DB_CONSTANTS } from "../constants/index";
import type { DbHandles } from "../types";
import { initSchema } from "./schema";

export const IN_MEMORY_DB = ":memory:";

/**
 * Opens a database connection and initializes the schema
 * @param dbPath - Path to the SQLite file, or ":memory:"
 */
export function openDb(dbPath: string): DbHandles {
  if (dbPath !== IN_MEMORY_DB) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  if (dbPath !== IN_MEMORY_DB) {
    db.pragma(`journal_mode = ${DB_CONSTANTS.JOURNAL_MODE}`);
  }
  db.pragma(`synchronous = ${DB_CONSTANTS.SYNCHRONOUS}`);
  db.pragma("foreign_keys = ON");
  db.pragma(`cache_size = ${DB_CONSTANTS.CACHE_SIZE}`);
  initSchema(db);
  return { db };
}

export function closeDb(h: DbHandles): void {
  if (h.db.open) h.db.close();
}
