/**
 * URL manipulation utilities
 */

import { CATALOGUE_DIR } from "../constants/index";

/**
 * Joins a relative catalogue link onto the site base.
 * Links that climb directories ("../") lose every "../" segment and are
 * re-rooted under the catalogue directory.
 * @param baseUrl - Site base, e.g. "https://books.toscrape.com"
 * @param relativeUrl - Link as found in the markup
 */
export function buildAbsoluteUrl(baseUrl: string, relativeUrl: string): string {
  if (/^https?:\/\//i.test(relativeUrl)) return relativeUrl;

  const base = baseUrl.replace(/\/+$/, "");
  let rel = relativeUrl.trim().replace(/^\/+/, "");

  if (rel.startsWith("../")) {
    rel = rel.split("../").join("");
    if (!rel.includes(CATALOGUE_DIR)) {
      rel = `${CATALOGUE_DIR}/${rel}`;
    }
  }

  return `${base}/${rel}`;
}

/**
 * Resolves a pagination link against the directory of the current page
 * @param currentUrl - URL of the page the link was found on
 * @param relative - Link target, e.g. "page-2.html"
 */
export function resolvePageUrl(currentUrl: string, relative: string): string {
  if (/^https?:\/\//i.test(relative)) return relative;
  const dir = currentUrl.split("/").slice(0, -1).join("/");
  return `${dir}/${relative.replace(/^\/+/, "")}`;
}

/**
 * URL of a given page of a category listing (page 1 is the index itself)
 */
export function categoryPageUrl(categoryUrl: string, page: number): string {
  if (page <= 1) return categoryUrl;
  return resolvePageUrl(categoryUrl, `page-${page}.html`);
}

/**
 * Returns the URL if it is an absolute http(s) URL, null otherwise
 */
export function sanitizeUrl(url: string): string | null {
  try {
    const parsed = new URL(url);
    if (!["http:", "https:"].includes(parsed.protocol)) {
      return null;
    }
    return parsed.toString();
  } catch {
    return null;
  }
}
