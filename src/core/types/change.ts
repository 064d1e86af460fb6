/**
 * Change-log types
 */

export type ChangeType =
  | "new_book"
  | "price_change"
  | "availability_change"
  | "rating_change"
  | "reviews_change";

export type ChangeSource = "crawler" | "detector";

export interface NewEntitySummary {
  title: string;
  category: string;
  price: number;
}

export type ChangeValue = number | string | NewEntitySummary | null;

/** Change as handed to the store */
export interface NewChangeRecord {
  entityId: number | null;
  entityUrl: string;
  changeType: ChangeType;
  oldValue: ChangeValue;
  newValue: ChangeValue;
  changedAt: string; // ISO
  sourceUrl: string;
  detectedBy: ChangeSource;
}

/** Appended change; immutable */
export interface ChangeRecord extends NewChangeRecord {
  id: number;
}

export interface ChangeDetectionStats {
  checked: number;
  unchanged: number;
  changed: number;
  unavailable: number;
  parseFailures: number;
  newBooks: number;
  priceChanges: number;
  availabilityChanges: number;
  ratingChanges: number;
  reviewsChanges: number;
  totalChanges: number;
  durationMs: number;
}

export type ReportFormat = "json" | "csv";
