/**
 * Catalogue crawl: categories -> listing pages -> detail pages, with a
 * per-page checkpoint so an interrupted run resumes where it stopped.
 */

import pLimit from "p-limit";
import type { CrawlerConfig } from "../config/index";
import type { PersistenceGateway } from "../database/index";
import {
  nextPageUrl,
  parse,
  parseCategoryIndex,
  parseIndexPage,
} from "../extraction/index";
import type { HttpClient } from "../http/index";
import type {
  CatalogEntity,
  CategoryLink,
  CrawlCounters,
  CrawlOptions,
  CrawlPhase,
  CrawlState,
  CrawlSummary,
} from "../types";
import { categoryPageUrl, resolvePageUrl } from "../utils/url";
import { Logger } from "../utils/logger";
import { toError } from "../utils/retry";
import { ValidationError } from "../validation/index";
import { CrawlInterruptedError, FatalCrawlError } from "./errors";

/**
 * Receives freshly parsed entities from the crawl
 */
export interface EntitySink {
  /** Stores the entity; false when its URL was already stored */
  storeNew(entity: CatalogEntity): Promise<boolean>;
}

export interface CrawlRunOptions extends CrawlOptions {
  /** Where new entities go (default: plain insert through the gateway) */
  sink?: EntitySink;
}

export interface CatalogCrawlerDeps {
  gateway: PersistenceGateway;
  http: HttpClient;
  config: CrawlerConfig;
  now?: () => Date;
}

type UrlOutcome = "stored" | "duplicate" | "failed";

interface RunContext {
  sink: EntitySink;
  counters: CrawlCounters;
  progress: CrawlState;
  signal?: AbortSignal;
  pagesCrawled: number;
}

export class CatalogCrawler {
  private readonly gateway: PersistenceGateway;
  private readonly http: HttpClient;
  private readonly config: CrawlerConfig;
  private readonly now: () => Date;
  private currentPhase: CrawlPhase = "idle";

  constructor(deps: CatalogCrawlerDeps) {
    this.gateway = deps.gateway;
    this.http = deps.http;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
  }

  get phase(): CrawlPhase {
    return this.currentPhase;
  }

  /**
   * Runs one crawl to completion or interruption
   * @returns Summary; `status` is "interrupted" when the site root or a
   * category page could not be fetched, a checkpoint could not be written,
   * or the signal fired. The stored state is left at the last durable page.
   */
  async crawl(options: CrawlRunOptions = {}): Promise<CrawlSummary> {
    const resume = options.resume ?? true;
    const started = this.now();
    const { stateType, targetUrl } = this.config;
    this.currentPhase = "idle";

    let stored: CrawlState | null = null;
    if (resume) {
      const existing = await this.gateway.getCrawlState(stateType);
      if (existing?.status === "in_progress") stored = existing;
    } else {
      await this.gateway.deleteCrawlState(stateType);
    }
    const resumed = stored !== null;

    const progress: CrawlState = stored ?? {
      stateType,
      lastCategory: null,
      lastPage: 1,
      lastEntityUrl: null,
      totalCrawled: 0,
      startedAt: started.toISOString(),
      updatedAt: started.toISOString(),
      status: "in_progress",
    };
    if (!resumed) await this.gateway.upsertCrawlState(progress);

    const ctx: RunContext = {
      sink: options.sink ?? {
        storeNew: async (entity) =>
          (await this.gateway.insertEntity(entity)) !== null,
      },
      counters: { fetched: 0, stored: 0, duplicates: 0, failed: 0 },
      progress,
      signal: options.signal,
      pagesCrawled: 0,
    };
    let categoriesVisited = 0;
    let categoriesSkipped = 0;

    const summarize = (
      status: CrawlSummary["status"],
      error?: string,
    ): CrawlSummary => {
      const finished = this.now();
      return {
        status,
        resumed,
        categoriesVisited,
        categoriesSkipped,
        pagesCrawled: ctx.pagesCrawled,
        ...ctx.counters,
        startedAt: started.toISOString(),
        finishedAt: finished.toISOString(),
        durationMs: finished.getTime() - started.getTime(),
        ...(error === undefined ? {} : { error }),
      };
    };

    Logger.info(resumed ? "Resuming crawl" : "Starting crawl", {
      url: targetUrl,
      category: progress.lastCategory ?? undefined,
      page: progress.lastPage,
    });

    try {
      const categories = await this.fetchCategories();

      let skipping = resumed && progress.lastCategory !== null;
      for (const category of categories) {
        let startPage = 1;
        if (skipping) {
          if (category.name !== progress.lastCategory) {
            categoriesSkipped++;
            continue;
          }
          skipping = false;
          startPage = Math.max(1, progress.lastPage);
        }
        this.checkAbort(ctx.signal);
        await this.crawlCategory(category, startPage, ctx);
        categoriesVisited++;
      }

      if (skipping) {
        // Category order or names changed since the checkpoint
        Logger.warn("Stored category not found; every category was skipped", {
          category: progress.lastCategory ?? undefined,
        });
      }

      await this.gateway.deleteCrawlState(stateType);
      this.currentPhase = "completed";
      const summary = summarize("completed");
      Logger.info("Crawl completed", { ...summary });
      return summary;
    } catch (error) {
      this.currentPhase = "interrupted";
      if (
        error instanceof FatalCrawlError ||
        error instanceof CrawlInterruptedError
      ) {
        Logger.error("Crawl interrupted", error, {
          url: error instanceof FatalCrawlError ? error.url : undefined,
        });
        return summarize("interrupted", error.message);
      }
      Logger.error("Crawl failed", error);
      return summarize("interrupted", toError(error).message);
    }
  }

  private async fetchCategories(): Promise<CategoryLink[]> {
    const { targetUrl } = this.config;
    this.currentPhase = "fetching_categories";
    const root = await this.http.fetch(targetUrl);
    if (!root.ok) {
      throw new FatalCrawlError(
        `Failed to fetch site root: ${root.error.message}`,
        targetUrl,
        root.error,
      );
    }
    const categories = parseCategoryIndex(root.body, targetUrl);
    if (categories.length === 0) {
      throw new FatalCrawlError("No categories found on site root", targetUrl);
    }
    Logger.info(`Found ${categories.length} categories`, {
      count: categories.length,
    });
    return categories;
  }

  private async crawlCategory(
    category: CategoryLink,
    startPage: number,
    ctx: RunContext,
  ): Promise<void> {
    this.currentPhase = "crawling_category";
    Logger.info(`Crawling category: ${category.name}`, {
      category: category.name,
      page: startPage,
    });

    let page = startPage;
    let pageUrl: string | null = categoryPageUrl(category.url, startPage);

    while (pageUrl) {
      this.checkAbort(ctx.signal);
      this.currentPhase = "crawling_page";

      const listing = await this.http.fetch(pageUrl);
      if (
        !listing.ok &&
        listing.error.status === 404 &&
        page === startPage &&
        startPage > 1
      ) {
        // The category shrank below the checkpointed page
        Logger.warn("Resume page unavailable; ending category", {
          category: category.name,
          page,
          url: pageUrl,
        });
        break;
      }
      if (!listing.ok) {
        throw new FatalCrawlError(
          `Failed to fetch category page: ${listing.error.message}`,
          pageUrl,
          listing.error,
        );
      }

      const urls = parseIndexPage(listing.body, this.config.targetUrl);
      if (urls.length === 0) break;

      this.currentPhase = "fetching_batch";
      const storedInBatch = await this.processBatch(urls, ctx);
      ctx.pagesCrawled++;

      const at = this.now().toISOString();
      ctx.progress = {
        ...ctx.progress,
        lastCategory: category.name,
        lastPage: page,
        lastEntityUrl: urls[urls.length - 1] ?? null,
        totalCrawled: ctx.progress.totalCrawled + storedInBatch,
        updatedAt: at,
      };
      await this.gateway.upsertCrawlState(ctx.progress);
      Logger.pageProgress(category.name, page, urls.length, ctx.counters.stored);

      const next = nextPageUrl(listing.body);
      pageUrl = next ? resolvePageUrl(pageUrl, next) : null;
      page++;
    }
  }

  /**
   * Fetches, parses and stores every URL of one listing page. Resolves once
   * the whole batch has settled.
   * @returns Number of entities stored
   */
  private async processBatch(urls: string[], ctx: RunContext): Promise<number> {
    const limit = pLimit(Math.max(1, this.config.concurrency));
    const results = await Promise.allSettled(
      urls.map((url) => limit(() => this.processUrl(url, ctx))),
    );

    let stored = 0;
    for (const r of results) {
      if (r.status === "fulfilled" && r.value === "stored") {
        ctx.counters.stored++;
        stored++;
      } else if (r.status === "fulfilled" && r.value === "duplicate") {
        ctx.counters.duplicates++;
      } else {
        ctx.counters.failed++;
      }
    }
    return stored;
  }

  /** Never rejects; every error ends as "failed" for this URL */
  private async processUrl(url: string, ctx: RunContext): Promise<UrlOutcome> {
    try {
      if (await this.gateway.findEntityByUrl(url)) return "duplicate";

      const res = await this.http.fetch(url);
      if (!res.ok) return "failed";
      ctx.counters.fetched++;

      const parsed = parse(res.body, url, {
        baseUrl: this.config.targetUrl,
        crawledAt: this.now(),
      });
      if (!parsed.success) {
        Logger.warn(`Parse failed: ${parsed.error}`, { url });
        return "failed";
      }

      const isNew = await ctx.sink.storeNew(parsed.entity);
      if (!isNew) return "duplicate";
      Logger.entityStored(url, parsed.entity.title, parsed.entity.priceInclTax);
      return "stored";
    } catch (error) {
      if (error instanceof ValidationError) {
        Logger.warn(`Rejected entity: ${error.message}`, { url });
      } else {
        Logger.error("Failed to process entity", error, { url });
      }
      return "failed";
    }
  }

  private checkAbort(signal?: AbortSignal): void {
    if (signal?.aborted) throw new CrawlInterruptedError("Crawl aborted");
  }
}
