import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { CrawlerConfig } from "../core/config/app-config";
import { SqliteGateway } from "../core/database/gateway";
import { CatalogCrawler } from "../core/execution/crawler";
import { HttpClient, type FetchImpl } from "../core/http/fetcher";
import type { CrawlState } from "../core/types";
import {
  bookUrl,
  categoryUrl,
  FakeSite,
  makeBook,
  SITE_BASE,
  type FakeCategory,
} from "./helpers/site";

const retry = { maxAttempts: 2, initialDelayMs: 0, backoffFactor: 2 };

const config: CrawlerConfig = {
  targetUrl: SITE_BASE,
  concurrency: 3,
  timeoutMs: 1000,
  userAgent: "test-agent/1.0",
  retry,
  stateType: "catalog",
};

function catalogue(): FakeCategory[] {
  return [
    {
      name: "Travel",
      slug: "travel_2",
      pages: [[makeBook("road-one_1"), makeBook("road-two_2")], [makeBook("road-three_3")]],
    },
    {
      name: "Mystery",
      slug: "mystery_3",
      pages: [[makeBook("clue-one_4"), makeBook("clue-two_5")]],
    },
  ];
}

function storedState(overrides: Partial<CrawlState>): CrawlState {
  return {
    stateType: "catalog",
    lastCategory: null,
    lastPage: 1,
    lastEntityUrl: null,
    totalCrawled: 0,
    startedAt: "2026-01-31T00:00:00.000Z",
    updatedAt: "2026-01-31T00:00:00.000Z",
    status: "in_progress",
    ...overrides,
  };
}

describe("CatalogCrawler", () => {
  let site: FakeSite;
  let gateway: SqliteGateway;
  let crawler: CatalogCrawler;

  beforeEach(() => {
    site = new FakeSite(catalogue());
    gateway = SqliteGateway.open(":memory:");
    const http = new HttpClient({
      fetchImpl: site.fetch,
      retry,
      sleep: () => Promise.resolve(),
    });
    crawler = new CatalogCrawler({
      gateway,
      http,
      config,
      now: () => new Date("2026-02-01T00:00:00.000Z"),
    });
  });

  afterEach(async () => {
    await gateway.close();
  });

  it("stores every entity across categories and pages, then clears the state", async () => {
    const summary = await crawler.crawl();

    expect(summary).toMatchObject({
      status: "completed",
      resumed: false,
      categoriesVisited: 2,
      categoriesSkipped: 0,
      pagesCrawled: 3,
      fetched: 5,
      stored: 5,
      duplicates: 0,
      failed: 0,
    });
    expect(summary.error).toBeUndefined();
    expect(crawler.phase).toBe("completed");
    expect(await gateway.countEntities()).toBe(5);
    expect(await gateway.getCrawlState("catalog")).toBeNull();

    const stored = await gateway.findEntityByUrl(bookUrl("road-three_3"));
    expect(stored?.category).toBe("Travel");
    expect(stored?.priceInclTax).toBe(10.5);
  });

  it("creates no duplicates when run twice against the same catalogue", async () => {
    await crawler.crawl();
    const second = await crawler.crawl();

    expect(second).toMatchObject({ stored: 0, duplicates: 5, fetched: 0, failed: 0 });
    expect(await gateway.countEntities()).toBe(5);
    expect(site.requestsFor(bookUrl("road-one_1"))).toBe(1);
  });

  it("counts unavailable and unparsable pages as failed and keeps going", async () => {
    site.failing.add(bookUrl("road-two_2"));
    site.setPage(bookUrl("clue-one_4"), "<html><body>maintenance</body></html>");

    const summary = await crawler.crawl();

    expect(summary).toMatchObject({ status: "completed", stored: 3, failed: 2, fetched: 4 });
    expect(site.requestsFor(bookUrl("road-two_2"))).toBe(2);
    expect(await gateway.findEntityByUrl(bookUrl("clue-one_4"))).toBeNull();
  });

  it("stops on a category page failure and resumes from the last page", async () => {
    site.failing.add(categoryUrl("mystery_3"));

    const interrupted = await crawler.crawl();

    expect(interrupted.status).toBe("interrupted");
    expect(interrupted.error).toBe(
      `Failed to fetch category page: HTTP 503 for ${categoryUrl("mystery_3")}`,
    );
    expect(crawler.phase).toBe("interrupted");
    expect(await gateway.getCrawlState("catalog")).toMatchObject({
      lastCategory: "Travel",
      lastPage: 2,
      lastEntityUrl: bookUrl("road-three_3"),
      totalCrawled: 3,
      status: "in_progress",
    });

    site.failing.clear();
    const resumed = await crawler.crawl();

    expect(resumed).toMatchObject({
      status: "completed",
      resumed: true,
      categoriesSkipped: 0,
      categoriesVisited: 2,
      pagesCrawled: 2,
      stored: 2,
      duplicates: 1,
    });
    expect(site.requestsFor(categoryUrl("travel_2"))).toBe(1);
    expect(site.requestsFor(categoryUrl("travel_2", 2))).toBe(2);
    expect(await gateway.countEntities()).toBe(5);
    expect(await gateway.getCrawlState("catalog")).toBeNull();
  });

  it("skips categories listed before the stored one", async () => {
    await gateway.upsertCrawlState(storedState({ lastCategory: "Mystery", lastPage: 1 }));

    const summary = await crawler.crawl();

    expect(summary).toMatchObject({
      resumed: true,
      categoriesSkipped: 1,
      categoriesVisited: 1,
      stored: 2,
    });
    expect(site.requestsFor(categoryUrl("travel_2"))).toBe(0);
  });

  it("ignores the stored state for a fresh run", async () => {
    await gateway.upsertCrawlState(storedState({ lastCategory: "Mystery", lastPage: 1 }));

    const summary = await crawler.crawl({ resume: false });

    expect(summary).toMatchObject({ resumed: false, categoriesSkipped: 0, stored: 5 });
  });

  it("does not resume from a completed state", async () => {
    await gateway.upsertCrawlState(
      storedState({ lastCategory: "Mystery", status: "completed" }),
    );

    const summary = await crawler.crawl();

    expect(summary).toMatchObject({ resumed: false, categoriesVisited: 2, stored: 5 });
  });

  it("reports a root failure as interrupted without touching the catalogue", async () => {
    site.failing.add(SITE_BASE);

    const summary = await crawler.crawl();

    expect(summary.status).toBe("interrupted");
    expect(summary.error).toBe(`Failed to fetch site root: HTTP 503 for ${SITE_BASE}`);
    expect(summary.pagesCrawled).toBe(0);
    expect(await gateway.getCrawlState("catalog")).toMatchObject({
      lastCategory: null,
      status: "in_progress",
    });
  });

  it("stops between pages when the signal fires", async () => {
    const controller = new AbortController();

    const summary = await crawler.crawl({
      signal: controller.signal,
      sink: {
        storeNew: async (entity) => {
          controller.abort();
          return (await gateway.insertEntity(entity)) !== null;
        },
      },
    });

    expect(summary).toMatchObject({
      status: "interrupted",
      error: "Crawl aborted",
      pagesCrawled: 1,
      stored: 2,
    });
    expect(await gateway.getCrawlState("catalog")).toMatchObject({
      lastCategory: "Travel",
      lastPage: 1,
    });
  });

  it("counts a storage error as one failed URL and finishes the run", async () => {
    const summary = await crawler.crawl({
      sink: {
        storeNew: async (entity) => {
          if (entity.url === bookUrl("road-two_2")) {
            throw new Error("SQLITE_BUSY: database is locked");
          }
          return (await gateway.insertEntity(entity)) !== null;
        },
      },
    });

    expect(summary).toMatchObject({
      status: "completed",
      pagesCrawled: 3,
      fetched: 5,
      stored: 4,
      failed: 1,
    });
    expect(await gateway.findEntityByUrl(bookUrl("road-three_3"))).not.toBeNull();
    expect(await gateway.getCrawlState("catalog")).toBeNull();
  });

  it("reports a checkpoint write failure as interrupted", async () => {
    vi.spyOn(gateway, "upsertCrawlState")
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new Error("disk I/O error"));

    const summary = await crawler.crawl();

    expect(summary).toMatchObject({
      status: "interrupted",
      error: "disk I/O error",
      pagesCrawled: 1,
      stored: 2,
    });
    expect(crawler.phase).toBe("interrupted");
  });

  it("ends a category whose checkpointed page no longer exists", async () => {
    await gateway.upsertCrawlState(storedState({ lastCategory: "Travel", lastPage: 3 }));

    const summary = await crawler.crawl();

    expect(summary).toMatchObject({
      status: "completed",
      resumed: true,
      categoriesVisited: 2,
      categoriesSkipped: 0,
      pagesCrawled: 1,
      stored: 2,
    });
    expect(site.requestsFor(categoryUrl("travel_2", 3))).toBe(2);
    expect(await gateway.findEntityByUrl(bookUrl("clue-one_4"))).not.toBeNull();
    expect(await gateway.getCrawlState("catalog")).toBeNull();
  });

  it("keeps the checkpoint when the resume page fails with a server error", async () => {
    await gateway.upsertCrawlState(storedState({ lastCategory: "Travel", lastPage: 2 }));
    site.failing.add(categoryUrl("travel_2", 2));

    const summary = await crawler.crawl();

    expect(summary.status).toBe("interrupted");
    expect(await gateway.getCrawlState("catalog")).toMatchObject({
      lastCategory: "Travel",
      lastPage: 2,
    });
  });

  it("never runs more detail fetches at once than the pool width", async () => {
    const books = Array.from({ length: 7 }, (_, i) => makeBook(`wide-${i}_${i + 10}`));
    const wide = new FakeSite([{ name: "Travel", slug: "travel_2", pages: [books] }]);
    let inFlight = 0;
    let peak = 0;
    const fetchImpl: FetchImpl = async (input, init) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return wide.fetch(input, init);
    };
    const pooled = new CatalogCrawler({
      gateway,
      http: new HttpClient({ fetchImpl, retry }),
      config,
    });

    const summary = await pooled.crawl();

    expect(summary.stored).toBe(7);
    expect(peak).toBe(config.concurrency);
  });
});
