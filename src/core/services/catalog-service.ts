/**
 * Catalog service - wires the crawler, detector and store for one process.
 * Used from the CLI and from queue workers.
 */

import { ChangeDetector, generateChangeReport } from "../changes/index";
import type { AppConfig } from "../config/index";
import { SqliteGateway, type PersistenceGateway } from "../database/index";
import { CatalogCrawler } from "../execution/index";
import { HttpClient, type FetchImpl } from "../http/index";
import type {
  ChangeDetectionStats,
  ChangeRecord,
  CrawlOptions,
  CrawlState,
  CrawlSummary,
  ReportFormat,
} from "../types";

export interface RunCrawlOptions extends CrawlOptions {
  /** Log a new_book change for every entity stored by this run */
  recordNew?: boolean;
}

export interface CatalogServiceDeps {
  config: AppConfig;
  gateway: PersistenceGateway;
  http: HttpClient;
  now?: () => Date;
}

export interface OpenOverrides {
  fetchImpl?: FetchImpl;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export class CatalogService {
  readonly crawler: CatalogCrawler;
  readonly detector: ChangeDetector;
  private readonly config: AppConfig;
  private readonly gateway: PersistenceGateway;
  private readonly now: () => Date;
  private running: string | null = null;

  constructor(deps: CatalogServiceDeps) {
    this.config = deps.config;
    this.gateway = deps.gateway;
    this.now = deps.now ?? (() => new Date());
    const shared = {
      gateway: deps.gateway,
      http: deps.http,
      config: deps.config.crawler,
      now: this.now,
    };
    this.crawler = new CatalogCrawler(shared);
    this.detector = new ChangeDetector(shared);
  }

  /**
   * Opens the SQLite store and an HTTP client from configuration
   */
  static open(config: AppConfig, overrides: OpenOverrides = {}): CatalogService {
    const http = new HttpClient({
      userAgent: config.crawler.userAgent,
      timeoutMs: config.crawler.timeoutMs,
      retry: config.crawler.retry,
      fetchImpl: overrides.fetchImpl,
      sleep: overrides.sleep,
    });
    return new CatalogService({
      config,
      gateway: SqliteGateway.open(config.dbPath),
      http,
      now: overrides.now,
    });
  }

  async runCrawl(options: RunCrawlOptions = {}): Promise<CrawlSummary> {
    return this.exclusive("crawl", async () => {
      if (options.recordNew) this.detector.resetStatistics();
      return this.crawler.crawl({
        resume: options.resume,
        signal: options.signal,
        sink: options.recordNew ? this.detector : undefined,
      });
    });
  }

  async runChangeDetectionCycle(): Promise<ChangeDetectionStats> {
    return this.exclusive("detect", () =>
      this.detector.runChangeDetectionCycle(),
    );
  }

  async recentChanges(limit = this.config.reportLimit): Promise<ChangeRecord[]> {
    return this.gateway.listRecentChanges(limit);
  }

  async changeReport(
    format: ReportFormat,
    limit = this.config.reportLimit,
  ): Promise<string> {
    return generateChangeReport(await this.recentChanges(limit), format, this.now());
  }

  async crawlState(): Promise<CrawlState | null> {
    return this.gateway.getCrawlState(this.config.crawler.stateType);
  }

  async entityCount(): Promise<number> {
    return this.gateway.countEntities();
  }

  async close(): Promise<void> {
    await this.gateway.close();
  }

  private async exclusive<T>(name: string, run: () => Promise<T>): Promise<T> {
    if (this.running) {
      throw new Error(`Cannot start ${name}: ${this.running} is already running`);
    }
    this.running = name;
    try {
      return await run();
    } finally {
      this.running = null;
    }
  }
}
