/**
 * Crawl-state persistence, one row per crawl type
 */

import type Database from "better-sqlite3";
import type { CrawlState, CrawlStateRow } from "../types";

function rowToState(r: CrawlStateRow): CrawlState {
  return {
    stateType: r.state_type,
    lastCategory: r.last_category,
    lastPage: r.last_page,
    lastEntityUrl: r.last_entity_url,
    totalCrawled: r.total_crawled,
    startedAt: r.started_at,
    updatedAt: r.updated_at,
    status: r.status === "completed" ? "completed" : "in_progress",
  };
}

export function getCrawlState(
  db: Database.Database,
  stateType: string,
): CrawlState | null {
  const row = db
    .prepare<[string], CrawlStateRow>(
      `SELECT * FROM crawl_state WHERE state_type = ?`,
    )
    .get(stateType);
  return row ? rowToState(row) : null;
}

export function upsertCrawlState(
  db: Database.Database,
  state: CrawlState,
): void {
  db.prepare<CrawlStateRow>(
    `INSERT INTO crawl_state (
      state_type, last_category, last_page, last_entity_url, total_crawled, started_at, updated_at, status
    ) VALUES (
      @state_type, @last_category, @last_page, @last_entity_url, @total_crawled, @started_at, @updated_at, @status
    )
    ON CONFLICT(state_type) DO UPDATE SET
      last_category=excluded.last_category,
      last_page=excluded.last_page,
      last_entity_url=excluded.last_entity_url,
      total_crawled=excluded.total_crawled,
      started_at=excluded.started_at,
      updated_at=excluded.updated_at,
      status=excluded.status`,
  ).run({
    state_type: state.stateType,
    last_category: state.lastCategory,
    last_page: state.lastPage,
    last_entity_url: state.lastEntityUrl,
    total_crawled: state.totalCrawled,
    started_at: state.startedAt,
    updated_at: state.updatedAt,
    status: state.status,
  });
}

export function deleteCrawlState(
  db: Database.Database,
  stateType: string,
): boolean {
  return (
    db
      .prepare<[string]>(`DELETE FROM crawl_state WHERE state_type = ?`)
      .run(stateType).changes > 0
  );
}
