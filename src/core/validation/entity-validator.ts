/**
 * Entity validation utilities
 */

import type { CatalogEntity, EntityCandidate, Rating } from "../types";
import { contentHash } from "../entity/hash";
import { sanitizeUrl } from "../utils/url";

export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export function isRating(value: number): value is Rating {
  return Number.isInteger(value) && value >= 1 && value <= 5;
}

export function roundPrice(value: number): number {
  return Math.round(value * 100) / 100;
}

function requirePrice(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${field} must be greater than 0`, field);
  }
  return roundPrice(value);
}

function requireText(value: string, field: string): string {
  const text = value.trim();
  if (!text) {
    throw new ValidationError(`${field} is required`, field);
  }
  return text;
}

/**
 * Builds a closed entity from parsed fields
 * @param candidate - Fields extracted from a detail page
 * @param crawledAt - Crawl time (default: now)
 * @throws ValidationError if an invariant does not hold
 */
export function validateEntity(
  candidate: EntityCandidate,
  crawledAt: Date = new Date(),
): CatalogEntity {
  if (!sanitizeUrl(candidate.url)) {
    throw new ValidationError("url must be an absolute http(s) URL", "url");
  }

  if (!isRating(candidate.rating)) {
    throw new ValidationError("rating must be an integer from 1 to 5", "rating");
  }
  if (!Number.isInteger(candidate.numReviews) || candidate.numReviews < 0) {
    throw new ValidationError(
      "num_reviews must be a non-negative integer",
      "num_reviews",
    );
  }

  const tracked = {
    title: requireText(candidate.title, "title"),
    priceExclTax: requirePrice(candidate.priceExclTax, "price_excl_tax"),
    priceInclTax: requirePrice(candidate.priceInclTax, "price_incl_tax"),
    availability: candidate.availability.trim() || "Unknown",
    numReviews: candidate.numReviews,
    rating: candidate.rating,
  };

  return {
    ...tracked,
    url: candidate.url,
    description: candidate.description?.trim() || null,
    category: requireText(candidate.category, "category"),
    imageUrl: candidate.imageUrl,
    crawlTimestamp: crawledAt.toISOString(),
    contentHash: contentHash(tracked),
    status: "active",
    rawHtml: candidate.rawHtml,
  };
}

/**
 * Re-checks an entity that is about to be written and returns it with a
 * freshly computed hash
 * @throws ValidationError if an invariant does not hold
 */
export function assertValidEntity<T extends CatalogEntity>(entity: T): T {
  if (!isRating(entity.rating)) {
    throw new ValidationError("rating must be an integer from 1 to 5", "rating");
  }
  requireText(entity.title, "title");
  requireText(entity.category, "category");
  requireText(entity.url, "url");
  if (!Number.isInteger(entity.numReviews) || entity.numReviews < 0) {
    throw new ValidationError(
      "num_reviews must be a non-negative integer",
      "num_reviews",
    );
  }
  return {
    ...entity,
    priceExclTax: requirePrice(entity.priceExclTax, "price_excl_tax"),
    priceInclTax: requirePrice(entity.priceInclTax, "price_incl_tax"),
    contentHash: contentHash({
      ...entity,
      priceExclTax: roundPrice(entity.priceExclTax),
      priceInclTax: roundPrice(entity.priceInclTax),
    }),
  };
}
