/**
 * Crawl progress and outcome types
 */

export type CrawlStatus = "in_progress" | "completed";

/** Durable resume marker, one per crawl type */
export interface CrawlState {
  stateType: string;
  lastCategory: string | null;
  lastPage: number;
  lastEntityUrl: string | null;
  totalCrawled: number;
  startedAt: string; // ISO
  updatedAt: string; // ISO
  status: CrawlStatus;
}

export type CrawlPhase =
  | "idle"
  | "fetching_categories"
  | "crawling_category"
  | "crawling_page"
  | "fetching_batch"
  | "completed"
  | "interrupted";

export interface CategoryLink {
  name: string;
  url: string;
}

export interface CrawlCounters {
  fetched: number;
  stored: number;
  duplicates: number;
  failed: number;
}

export interface CrawlSummary extends CrawlCounters {
  status: "completed" | "interrupted";
  resumed: boolean;
  categoriesVisited: number;
  categoriesSkipped: number;
  pagesCrawled: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  error?: string;
}

export interface CrawlOptions {
  /** Continue from the stored crawl state (default: true) */
  resume?: boolean;
  /** Stops the run between pages; state stays intact */
  signal?: AbortSignal;
}
