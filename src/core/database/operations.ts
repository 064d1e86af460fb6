/**
 * Database operations for catalogue entities
 */

import type Database from "better-sqlite3";
import type { CatalogEntity, EntityRecord, EntityRow } from "../types";
import { isRating, ValidationError } from "../validation/index";

type EntityParams = Omit<EntityRow, "id">;

function toParams(entity: CatalogEntity): EntityParams {
  return {
    url: entity.url,
    title: entity.title,
    description: entity.description,
    category: entity.category,
    price_excl_tax: entity.priceExclTax,
    price_incl_tax: entity.priceInclTax,
    availability: entity.availability,
    num_reviews: entity.numReviews,
    image_url: entity.imageUrl,
    rating: entity.rating,
    crawl_timestamp: entity.crawlTimestamp,
    content_hash: entity.contentHash,
    status: entity.status,
    raw_html: entity.rawHtml,
  };
}

export function rowToEntity(r: EntityRow): EntityRecord {
  if (!isRating(r.rating)) {
    throw new ValidationError(`Stored rating ${r.rating} is out of range`, "rating");
  }
  return {
    id: r.id,
    url: r.url,
    title: r.title,
    description: r.description,
    category: r.category,
    priceExclTax: r.price_excl_tax,
    priceInclTax: r.price_incl_tax,
    availability: r.availability,
    numReviews: r.num_reviews,
    imageUrl: r.image_url,
    rating: r.rating,
    crawlTimestamp: r.crawl_timestamp,
    contentHash: r.content_hash,
    status: "active",
    rawHtml: r.raw_html,
  };
}

/**
 * Inserts an entity unless its URL is already stored
 * @returns The stored record, or null when the URL already existed
 */
export function insertEntity(
  db: Database.Database,
  entity: CatalogEntity,
): EntityRecord | null {
  const info = db
    .prepare<EntityParams>(
      `INSERT INTO books (
        url, title, description, category, price_excl_tax, price_incl_tax, availability,
        num_reviews, image_url, rating, crawl_timestamp, content_hash, status, raw_html
      ) VALUES (
        @url, @title, @description, @category, @price_excl_tax, @price_incl_tax, @availability,
        @num_reviews, @image_url, @rating, @crawl_timestamp, @content_hash, @status, @raw_html
      )
      ON CONFLICT(url) DO NOTHING`,
    )
    .run(toParams(entity));
  if (info.changes === 0) return null;
  return { ...entity, id: Number(info.lastInsertRowid) };
}

export function findEntityByUrl(
  db: Database.Database,
  url: string,
): EntityRecord | null {
  const row = db
    .prepare<[string], EntityRow>(`SELECT * FROM books WHERE url = ?`)
    .get(url);
  return row ? rowToEntity(row) : null;
}

/**
 * All stored entities in insertion order
 */
export function listAllEntities(db: Database.Database): EntityRecord[] {
  return db
    .prepare<[], EntityRow>(`SELECT * FROM books ORDER BY id`)
    .all()
    .map(rowToEntity);
}

export function countEntities(db: Database.Database): number {
  const row = db
    .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM books`)
    .get();
  return row?.n ?? 0;
}

/**
 * Replaces every mutable field of the entity stored under `entity.url`.
 * The URL and row id are kept.
 * @returns false when no entity is stored under that URL
 */
export function replaceEntity(
  db: Database.Database,
  entity: CatalogEntity,
): boolean {
  const info = db
    .prepare<EntityParams>(
      `UPDATE books SET
        title=@title,
        description=@description,
        category=@category,
        price_excl_tax=@price_excl_tax,
        price_incl_tax=@price_incl_tax,
        availability=@availability,
        num_reviews=@num_reviews,
        image_url=@image_url,
        rating=@rating,
        crawl_timestamp=@crawl_timestamp,
        content_hash=@content_hash,
        status=@status,
        raw_html=@raw_html
      WHERE url=@url`,
    )
    .run(toParams(entity));
  return info.changes > 0;
}
