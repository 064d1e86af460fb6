import { readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";

import { contentHash } from "../core/entity/hash";
import {
  nextPageUrl,
  parse,
  parseCategoryIndex,
  parseIndexPage,
} from "../core/extraction/parser";

const detail = readFileSync(
  new URL("./fixtures/book-detail.html", import.meta.url),
  "utf8",
);
const SOURCE = "https://books.toscrape.com/catalogue/the-quiet-orchard_42/index.html";
const crawledAt = new Date("2026-03-01T08:00:00.000Z");

describe("parse", () => {
  it("extracts every field of a detail page", () => {
    const result = parse(detail, SOURCE, { crawledAt });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.url).toBe(SOURCE);
    expect(result.entity).toMatchObject({
      url: SOURCE,
      title: "The Quiet Orchard",
      description: "A slow book about apples.",
      category: "Poetry",
      priceExclTax: 45.17,
      priceInclTax: 51.77,
      availability: "In stock (22 available)",
      numReviews: 3,
      rating: 3,
      imageUrl: "https://books.toscrape.com/catalogue/media/cache/fe/72/quiet-orchard.jpg",
      crawlTimestamp: "2026-03-01T08:00:00.000Z",
      status: "active",
      rawHtml: detail,
    });
    expect(result.entity.contentHash).toBe(
      contentHash({
        title: "The Quiet Orchard",
        priceExclTax: 45.17,
        priceInclTax: 51.77,
        availability: "In stock (22 available)",
        numReviews: 3,
        rating: 3,
      }),
    );
  });

  it("drops the markup when asked to", () => {
    const result = parse(detail, SOURCE, { keepRawHtml: false });
    expect(result.success && result.entity.rawHtml).toBeNull();
  });

  it("falls back to the displayed price and availability", () => {
    const markup = `<ul class="breadcrumb"><li><a>Home</a></li><li><a>Books</a></li><li><a>Travel</a></li></ul>
      <h1>Road Notes</h1>
      <p class="price_color">£12.00</p>
      <p class="instock availability">In stock</p>
      <p class="star-rating Two"></p>
      <table class="table table-striped"><tr><th>Price (excl. tax)</th><td>£10.00</td></tr></table>`;

    const result = parse(markup, "https://books.test/catalogue/road-notes_1/index.html");

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.entity.priceInclTax).toBe(12);
    expect(result.entity.availability).toBe("In stock");
    expect(result.entity.numReviews).toBe(0);
    expect(result.entity.description).toBeNull();
    expect(result.entity.imageUrl).toBe("");
  });

  it("names every missing required field", () => {
    const result = parse("<html><body><p>nothing here</p></body></html>", SOURCE);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.entity).toBeNull();
    expect(result.missingFields).toEqual(["title", "category", "price_incl_tax", "rating"]);
    expect(result.error).toBe(
      "Missing required fields: title, category, price_incl_tax, rating",
    );
  });

  it("reports only the fields that are missing", () => {
    const markup = detail.replace('class="star-rating Three"', 'class="star-rating"');
    const result = parse(markup, SOURCE);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.missingFields).toEqual(["rating"]);
  });

  it("fails validation when the price before tax is missing", () => {
    const markup = detail.replace("<td>£45.17</td>", "<td>n/a</td>");
    const result = parse(markup, SOURCE);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe("price_excl_tax must be greater than 0");
    expect(result.missingFields).toEqual([]);
  });

  it("does not throw on garbage input", () => {
    expect(() => parse("<<<>>>", "not a url")).not.toThrow();
    expect(parse("", SOURCE).success).toBe(false);
  });
});

describe("parseIndexPage", () => {
  const listing = `<ol>
    <li><article class="product_pod"><h3><a href="../../../a_1/index.html">A</a></h3></article></li>
    <li><article class="product_pod"><h3><a href="../../../b_2/index.html">B</a></h3></article></li>
    <li><article class="product_pod"><h3><a href="../../../a_1/index.html">A again</a></h3></article></li>
  </ol>`;

  it("returns links in page order without duplicates", () => {
    expect(parseIndexPage(listing)).toEqual([
      "../../../a_1/index.html",
      "../../../b_2/index.html",
    ]);
  });

  it("resolves links against the site base", () => {
    expect(parseIndexPage(listing, "https://books.test")).toEqual([
      "https://books.test/catalogue/a_1/index.html",
      "https://books.test/catalogue/b_2/index.html",
    ]);
  });

  it("returns an empty list for a page without products", () => {
    expect(parseIndexPage("<html></html>")).toEqual([]);
  });
});

describe("nextPageUrl", () => {
  it("returns the next link or null", () => {
    expect(nextPageUrl('<ul class="pager"><li class="next"><a href="page-3.html">next</a></li></ul>')).toBe(
      "page-3.html",
    );
    expect(nextPageUrl('<ul class="pager"><li class="previous"><a href="page-1.html">prev</a></li></ul>')).toBeNull();
  });
});

describe("parseCategoryIndex", () => {
  const home = `<ul class="nav nav-list">
    <li><a href="catalogue/category/books_1/index.html">Books</a>
      <ul>
        <li><a href="catalogue/category/books/travel_2/index.html">
          Travel
        </a></li>
        <li><a href="catalogue/category/books/mystery_3/index.html">Mystery</a></li>
      </ul>
    </li>
  </ul>`;

  it("skips the umbrella link and keeps listed order", () => {
    expect(parseCategoryIndex(home, "https://books.test")).toEqual([
      { name: "Travel", url: "https://books.test/catalogue/category/books/travel_2/index.html" },
      { name: "Mystery", url: "https://books.test/catalogue/category/books/mystery_3/index.html" },
    ]);
  });
});
