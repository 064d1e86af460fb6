/**
 * Database schema initialization
 */

import type Database from "better-sqlite3";

/**
 * Creates the entity, change-log and crawl-state tables when missing
 * @param db - Database connection to initialize
 */
export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS books (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      url TEXT NOT NULL UNIQUE,
      title TEXT NOT NULL,
      description TEXT,
      category TEXT NOT NULL,
      price_excl_tax REAL NOT NULL CHECK (price_excl_tax > 0),
      price_incl_tax REAL NOT NULL CHECK (price_incl_tax > 0),
      availability TEXT NOT NULL,
      num_reviews INTEGER NOT NULL DEFAULT 0 CHECK (num_reviews >= 0),
      image_url TEXT NOT NULL,
      rating INTEGER NOT NULL CHECK (rating BETWEEN 1 AND 5),
      crawl_timestamp TEXT NOT NULL,
      content_hash TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'active',
      raw_html TEXT
    );

    CREATE TABLE IF NOT EXISTS changes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      entity_id INTEGER,
      entity_url TEXT NOT NULL,
      change_type TEXT NOT NULL CHECK (change_type IN (
        'new_book', 'price_change', 'availability_change', 'rating_change', 'reviews_change'
      )),
      old_value TEXT,
      new_value TEXT,
      changed_at TEXT NOT NULL,
      source_url TEXT NOT NULL,
      detected_by TEXT NOT NULL,
      FOREIGN KEY (entity_id) REFERENCES books(id)
    );

    CREATE TABLE IF NOT EXISTS crawl_state (
      state_type TEXT PRIMARY KEY,
      last_category TEXT,
      last_page INTEGER NOT NULL DEFAULT 1,
      last_entity_url TEXT,
      total_crawled INTEGER NOT NULL DEFAULT 0,
      started_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('in_progress', 'completed'))
    );

    CREATE INDEX IF NOT EXISTS idx_books_category ON books(category);
    CREATE INDEX IF NOT EXISTS idx_changes_changed_at ON changes(changed_at DESC);
    CREATE INDEX IF NOT EXISTS idx_changes_entity_url ON changes(entity_url);
  `);
}
