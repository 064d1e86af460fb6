/**
 * Append-only change log
 */

import type Database from "better-sqlite3";
import type {
  ChangeRecord,
  ChangeRow,
  ChangeSource,
  ChangeType,
  ChangeValue,
  NewChangeRecord,
} from "../types";

const CHANGE_TYPES: readonly ChangeType[] = [
  "new_book",
  "price_change",
  "availability_change",
  "rating_change",
  "reviews_change",
];

export function isChangeType(value: string): value is ChangeType {
  return CHANGE_TYPES.some((t) => t === value);
}

function toSource(value: string): ChangeSource {
  return value === "crawler" ? "crawler" : "detector";
}

function encodeValue(value: ChangeValue): string | null {
  return value === null ? null : JSON.stringify(value);
}

function decodeValue(raw: string | null): ChangeValue {
  if (raw === null) return null;
  const value: unknown = JSON.parse(raw);
  if (typeof value === "number" || typeof value === "string") return value;
  if (
    value !== null &&
    typeof value === "object" &&
    "title" in value &&
    "category" in value &&
    "price" in value &&
    typeof value.title === "string" &&
    typeof value.category === "string" &&
    typeof value.price === "number"
  ) {
    return { title: value.title, category: value.category, price: value.price };
  }
  return null;
}

function rowToChange(r: ChangeRow): ChangeRecord {
  if (!isChangeType(r.change_type)) {
    throw new Error(`Unknown change type "${r.change_type}" in change ${r.id}`);
  }
  return {
    id: r.id,
    entityId: r.entity_id,
    entityUrl: r.entity_url,
    changeType: r.change_type,
    oldValue: decodeValue(r.old_value),
    newValue: decodeValue(r.new_value),
    changedAt: r.changed_at,
    sourceUrl: r.source_url,
    detectedBy: toSource(r.detected_by),
  };
}

export function appendChange(
  db: Database.Database,
  change: NewChangeRecord,
): ChangeRecord {
  const info = db
    .prepare<Omit<ChangeRow, "id">>(
      `INSERT INTO changes (
        entity_id, entity_url, change_type, old_value, new_value, changed_at, source_url, detected_by
      ) VALUES (
        @entity_id, @entity_url, @change_type, @old_value, @new_value, @changed_at, @source_url, @detected_by
      )`,
    )
    .run({
      entity_id: change.entityId,
      entity_url: change.entityUrl,
      change_type: change.changeType,
      old_value: encodeValue(change.oldValue),
      new_value: encodeValue(change.newValue),
      changed_at: change.changedAt,
      source_url: change.sourceUrl,
      detected_by: change.detectedBy,
    });
  return { ...change, id: Number(info.lastInsertRowid) };
}

/**
 * Most recent changes first; ties keep reverse append order
 */
export function listRecentChanges(
  db: Database.Database,
  limit: number,
): ChangeRecord[] {
  return db
    .prepare<[number], ChangeRow>(
      `SELECT * FROM changes ORDER BY changed_at DESC, id DESC LIMIT ?`,
    )
    .all(Math.max(0, Math.floor(limit)))
    .map(rowToChange);
}
