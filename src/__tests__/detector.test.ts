import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ChangeDetector } from "../core/changes/detector";
import { SqliteGateway } from "../core/database/gateway";
import { CatalogCrawler } from "../core/execution/crawler";
import { HttpClient } from "../core/http/fetcher";
import type { EntityRecord } from "../core/types";
import { bookUrl, FakeSite, makeBook, SITE_BASE, type FakeBook } from "./helpers/site";

const retry = { maxAttempts: 1, initialDelayMs: 0, backoffFactor: 2 };
const NOW = new Date("2026-02-10T12:00:00.000Z");

describe("ChangeDetector", () => {
  let a: FakeBook;
  let b: FakeBook;
  let c: FakeBook;
  let site: FakeSite;
  let gateway: SqliteGateway;
  let detector: ChangeDetector;

  async function stored(book: FakeBook): Promise<EntityRecord> {
    const record = await gateway.findEntityByUrl(bookUrl(book.slug));
    if (!record) throw new Error(`not stored: ${book.slug}`);
    return record;
  }

  beforeEach(async () => {
    a = makeBook("alpha_1", { price: 10.99, rating: "Four", reviews: 2 });
    b = makeBook("beta_2", { price: 20 });
    c = makeBook("gamma_3", { price: 5.5 });
    site = new FakeSite([{ name: "Travel", slug: "travel_2", pages: [[a, b, c]] }]);
    gateway = SqliteGateway.open(":memory:");
    const http = new HttpClient({ fetchImpl: site.fetch, retry });
    const config = {
      targetUrl: SITE_BASE,
      concurrency: 2,
      timeoutMs: 1000,
      userAgent: "test-agent/1.0",
      retry,
      stateType: "catalog",
    };
    await new CatalogCrawler({ gateway, http, config }).crawl();
    detector = new ChangeDetector({ gateway, http, config, now: () => NOW });
  });

  afterEach(async () => {
    await gateway.close();
  });

  describe("compareAndLog", () => {
    it("returns nothing when no tracked field differs", async () => {
      const previous = await stored(a);

      const changes = await detector.compareAndLog(previous, {
        ...previous,
        description: "rewritten blurb",
      });

      expect(changes).toEqual([]);
      expect(detector.statistics.totalChanges).toBe(0);
    });

    it("logs a single price change", async () => {
      const previous = await stored(a);

      const changes = await detector.compareAndLog(previous, {
        ...previous,
        priceInclTax: 8.99,
      });

      expect(changes).toHaveLength(1);
      expect(changes[0]).toMatchObject({
        entityId: previous.id,
        entityUrl: bookUrl("alpha_1"),
        changeType: "price_change",
        oldValue: 10.99,
        newValue: 8.99,
        changedAt: NOW.toISOString(),
        detectedBy: "detector",
      });
      expect(detector.statistics.priceChanges).toBe(1);
      expect(await gateway.listRecentChanges(10)).toHaveLength(1);
    });

    it("logs one record per differing field in comparison order", async () => {
      const previous = await stored(a);

      const changes = await detector.compareAndLog(previous, {
        ...previous,
        priceInclTax: 8.99,
        availability: "Out of stock",
        rating: 2,
      });

      expect(changes.map((ch) => [ch.changeType, ch.oldValue, ch.newValue])).toEqual([
        ["price_change", 10.99, 8.99],
        ["availability_change", "In stock (5 available)", "Out of stock"],
        ["rating_change", 4, 2],
      ]);
      expect(detector.statistics).toMatchObject({
        priceChanges: 1,
        availabilityChanges: 1,
        ratingChanges: 1,
        reviewsChanges: 0,
        totalChanges: 3,
      });
    });
  });

  describe("runChangeDetectionCycle", () => {
    it("records changes, replaces changed entities and skips unavailable ones", async () => {
      const before = await stored(a);
      a.price = 8.99;
      a.reviews = 3;
      b.availability = "Out of stock";
      site.build();
      site.failing.add(bookUrl("gamma_3"));

      const stats = await detector.runChangeDetectionCycle();

      expect(stats).toMatchObject({
        checked: 3,
        changed: 2,
        unchanged: 0,
        unavailable: 1,
        parseFailures: 0,
        priceChanges: 1,
        availabilityChanges: 1,
        ratingChanges: 0,
        reviewsChanges: 1,
        totalChanges: 3,
      });

      const after = await stored(a);
      expect(after.id).toBe(before.id);
      expect(after.priceInclTax).toBe(8.99);
      expect(after.numReviews).toBe(3);
      expect(after.contentHash).not.toBe(before.contentHash);
      expect((await stored(c)).priceInclTax).toBe(5.5);
    });

    it("leaves an entity untouched when its page no longer parses", async () => {
      const before = await stored(b);
      site.setPage(bookUrl("beta_2"), "<html><body>gone</body></html>");

      const stats = await detector.runChangeDetectionCycle();

      expect(stats).toMatchObject({ checked: 3, parseFailures: 1, unchanged: 2, totalChanges: 0 });
      expect(await stored(b)).toEqual(before);
    });

    it("does not replace an entity whose hash moved without a compared field changing", async () => {
      a.title = "Renamed Book";
      site.build();

      const stats = await detector.runChangeDetectionCycle();

      expect(stats).toMatchObject({ changed: 0, unchanged: 3, totalChanges: 0 });
      expect((await stored(a)).title).toBe("Book alpha_1");
    });

    it("starts every cycle from zeroed counters", async () => {
      a.price = 8.99;
      site.build();
      await detector.runChangeDetectionCycle();

      const second = await detector.runChangeDetectionCycle();

      expect(second).toMatchObject({ checked: 3, changed: 0, unchanged: 3, totalChanges: 0 });
    });
  });

  describe("detectNewEntity", () => {
    it("stores the entity and logs a new_book summary once", async () => {
      const template = await stored(a);
      const fresh = {
        ...template,
        url: bookUrl("delta_4"),
        title: "Fresh Arrival",
        category: "Poetry",
        priceInclTax: 14.25,
      };

      const change = await detector.detectNewEntity(fresh);
      const again = await detector.detectNewEntity(fresh);

      expect(change).toMatchObject({
        changeType: "new_book",
        entityUrl: bookUrl("delta_4"),
        oldValue: null,
        newValue: { title: "Fresh Arrival", category: "Poetry", price: 14.25 },
        detectedBy: "crawler",
      });
      expect(change?.entityId).toBe((await gateway.findEntityByUrl(bookUrl("delta_4")))?.id);
      expect(again).toBeNull();
      expect(detector.statistics.newBooks).toBe(1);
    });
  });
});
