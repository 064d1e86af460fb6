/**
 * Database-related types. Column names are the stable external field names.
 */

import type Database from "better-sqlite3";

export interface DbHandles {
  db: Database.Database;
}

export interface EntityRow {
  id: number;
  url: string;
  title: string;
  description: string | null;
  category: string;
  price_excl_tax: number;
  price_incl_tax: number;
  availability: string;
  num_reviews: number;
  image_url: string;
  rating: number;
  crawl_timestamp: string;
  content_hash: string;
  status: string;
  raw_html: string | null;
}

export interface ChangeRow {
  id: number;
  entity_id: number | null;
  entity_url: string;
  change_type: string;
  old_value: string | null;
  new_value: string | null;
  changed_at: string;
  source_url: string;
  detected_by: string;
}

export interface CrawlStateRow {
  state_type: string;
  last_category: string | null;
  last_page: number;
  last_entity_url: string | null;
  total_crawled: number;
  started_at: string;
  updated_at: string;
  status: string;
}
