/**
 * Markup parsing for catalogue pages. Pure: no I/O.
 */

import { load as loadHtml, type CheerioAPI } from "cheerio";
import type { CategoryLink, EntityCandidate, ParseResult } from "../types";
import { buildAbsoluteUrl } from "../utils/url";
import { uniq } from "../utils/array";
import { ValidationError, validateEntity } from "../validation/index";
import { cleanText, extractNumber, extractPrice, extractRating } from "./fields";

export interface ParseOptions {
  /** Site base used to absolutize the cover image (default: origin of the source URL) */
  baseUrl?: string;
  crawledAt?: Date;
  /** Keep the markup on the entity (default: true) */
  keepRawHtml?: boolean;
}

/**
 * Reads the product information table into a header -> value map
 */
function productTable($: CheerioAPI): Map<string, string> {
  const rows = new Map<string, string>();
  $("table.table-striped tr").each((_, el) => {
    const key = cleanText($(el).find("th").first().text());
    if (key) rows.set(key, cleanText($(el).find("td").first().text()));
  });
  return rows;
}

function tableValue(rows: Map<string, string>, label: string): string | null {
  for (const [key, value] of rows) {
    if (key.includes(label)) return value;
  }
  return null;
}

function originOf(url: string): string {
  try {
    return new URL(url).origin;
  } catch {
    return url;
  }
}

/**
 * Extracts the raw candidate fields from a detail page
 */
export function extractCandidate(
  markup: string,
  sourceUrl: string,
  options: ParseOptions = {},
): EntityCandidate {
  const $ = loadHtml(markup);
  const rows = productTable($);
  const baseUrl = options.baseUrl ?? originOf(sourceUrl);

  const description = cleanText(
    $("#product_description").nextAll("p").first().text(),
  );
  const imageSrc = $("#product_gallery img").first().attr("src");

  return {
    url: sourceUrl,
    title: cleanText($("h1").first().text()),
    description: description || null,
    category: cleanText($("ul.breadcrumb a").eq(2).text()),
    priceExclTax: extractPrice(tableValue(rows, "Price (excl. tax)")),
    priceInclTax: extractPrice(
      tableValue(rows, "Price (incl. tax)") ??
        $("p.price_color").first().text(),
    ),
    availability:
      tableValue(rows, "Availability") ||
      cleanText($("p.instock.availability").first().text()) ||
      "Unknown",
    numReviews: extractNumber(tableValue(rows, "Number of reviews")),
    imageUrl: imageSrc ? buildAbsoluteUrl(baseUrl, imageSrc) : "",
    rating: extractRating($("p.star-rating").first().attr("class")),
    rawHtml: options.keepRawHtml === false ? null : markup,
  };
}

export function missingRequiredFields(candidate: EntityCandidate): string[] {
  const missing: string[] = [];
  if (!candidate.title) missing.push("title");
  if (!candidate.category) missing.push("category");
  if (!(candidate.priceInclTax > 0)) missing.push("price_incl_tax");
  if (!(candidate.rating > 0)) missing.push("rating");
  return missing;
}

/**
 * Parses a detail page into an entity. Never throws.
 * @param markup - Page markup
 * @param sourceUrl - URL the markup was fetched from; becomes the entity identity
 */
export function parse(
  markup: string,
  sourceUrl: string,
  options: ParseOptions = {},
): ParseResult {
  try {
    const candidate = extractCandidate(markup, sourceUrl, options);
    const missing = missingRequiredFields(candidate);
    if (missing.length > 0) {
      return {
        success: false,
        entity: null,
        error: `Missing required fields: ${missing.join(", ")}`,
        missingFields: missing,
        url: sourceUrl,
      };
    }
    return {
      success: true,
      entity: validateEntity(candidate, options.crawledAt),
      error: null,
      url: sourceUrl,
    };
  } catch (error) {
    return {
      success: false,
      entity: null,
      error:
        error instanceof ValidationError
          ? error.message
          : `Parse error: ${error instanceof Error ? error.message : String(error)}`,
      missingFields: [],
      url: sourceUrl,
    };
  }
}

/**
 * Entity links of a listing page, in page order, without duplicates.
 * Links are resolved against `baseUrl` when one is given.
 */
export function parseIndexPage(markup: string, baseUrl?: string): string[] {
  const $ = loadHtml(markup);
  const hrefs = $("article.product_pod h3 a")
    .toArray()
    .map((el) => $(el).attr("href")?.trim() ?? "")
    .filter(Boolean)
    .map((href) => (baseUrl ? buildAbsoluteUrl(baseUrl, href) : href));
  return uniq(hrefs);
}

/** Relative link of the next listing page, or null on the last page */
export function nextPageUrl(markup: string): string | null {
  const $ = loadHtml(markup);
  return $("li.next a").first().attr("href")?.trim() || null;
}

/**
 * Categories listed in the side navigation, in listed order. The first
 * link is the umbrella "all books" entry and is skipped.
 */
export function parseCategoryIndex(
  markup: string,
  baseUrl?: string,
): CategoryLink[] {
  const $ = loadHtml(markup);
  return $("ul.nav-list a")
    .toArray()
    .slice(1)
    .map((el) => ({
      name: cleanText($(el).text()),
      href: $(el).attr("href")?.trim() ?? "",
    }))
    .filter((c) => c.name && c.href)
    .map((c) => ({
      name: c.name,
      url: baseUrl ? buildAbsoluteUrl(baseUrl, c.href) : c.href,
    }));
}
