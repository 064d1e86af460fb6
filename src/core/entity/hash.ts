import { createHash } from "node:crypto";
import type { TrackedFields } from "../types";

/**
 * SHA-256 hex digest over the tracked fields, serialized with sorted
 * snake_case keys.
 */
export function contentHash(fields: TrackedFields): string {
  const payload = {
    availability: fields.availability,
    num_reviews: fields.numReviews,
    price_excl_tax: fields.priceExclTax,
    price_incl_tax: fields.priceInclTax,
    rating: fields.rating,
    title: fields.title,
  };
  return createHash("sha256").update(JSON.stringify(payload)).digest("hex");
}
