/**
 * Application constants
 */

// Database constants
export const DB_CONSTANTS = {
  CACHE_SIZE: -200000,
  JOURNAL_MODE: "WAL",
  SYNCHRONOUS: "NORMAL",
} as const;

// Site layout constants
export const CATALOGUE_DIR = "catalogue";
export const DEFAULT_TARGET_URL = "https://books.toscrape.com";

// Crawl constants
export const CRAWL_CONSTANTS = {
  DEFAULT_CONCURRENCY: 10,
  DEFAULT_TIMEOUT_MS: 30000,
  DEFAULT_MAX_ATTEMPTS: 3,
  DEFAULT_RETRY_DELAY_MS: 2000,
  DEFAULT_BACKOFF_FACTOR: 2,
  DEFAULT_STATE_TYPE: "catalog",
} as const;

// HTTP constants
export const HTTP_CONSTANTS = {
  USER_AGENT: "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36",
  ACCEPT_HEADER: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
} as const;

// Extraction constants
export const RATING_WORDS = {
  One: 1,
  Two: 2,
  Three: 3,
  Four: 4,
  Five: 5,
} as const;

// Report constants
export const REPORT_CONSTANTS = {
  DEFAULT_LIMIT: 100,
  CSV_HEADER: [
    "Change Type",
    "Book URL",
    "Old Value",
    "New Value",
    "Changed At",
  ],
} as const;
