/**
 * Catalogue entity types
 */

export type Rating = 1 | 2 | 3 | 4 | 5;

export type EntityStatus = "active";

/** Fields covered by the content hash */
export interface TrackedFields {
  title: string;
  priceExclTax: number;
  priceInclTax: number;
  availability: string;
  numReviews: number;
  rating: Rating;
}

/** One catalogue item, identified by its canonical URL */
export interface CatalogEntity extends TrackedFields {
  url: string;
  description: string | null;
  category: string;
  imageUrl: string;
  crawlTimestamp: string; // ISO
  contentHash: string;
  status: EntityStatus;
  rawHtml: string | null;
}

/** Persisted entity */
export interface EntityRecord extends CatalogEntity {
  id: number;
}

/** Fields a parse yields before validation */
export interface EntityCandidate {
  url: string;
  title: string;
  description: string | null;
  category: string;
  priceExclTax: number;
  priceInclTax: number;
  availability: string;
  numReviews: number;
  imageUrl: string;
  rating: number;
  rawHtml: string | null;
}

export type ParseResult =
  | { success: true; entity: CatalogEntity; error: null; url: string }
  | {
      success: false;
      entity: null;
      error: string;
      missingFields: string[];
      url: string;
    };
