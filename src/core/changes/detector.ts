/**
 * Field-level change detection against the stored snapshot
 */

import type { CrawlerConfig } from "../config/index";
import type { PersistenceGateway } from "../database/index";
import type { EntitySink } from "../execution/index";
import { parse } from "../extraction/index";
import type { HttpClient } from "../http/index";
import type {
  CatalogEntity,
  ChangeDetectionStats,
  ChangeRecord,
  ChangeType,
  ChangeValue,
  EntityRecord,
  NewChangeRecord,
} from "../types";
import { Logger } from "../utils/logger";

export interface ChangeDetectorDeps {
  gateway: PersistenceGateway;
  http: HttpClient;
  config: Pick<CrawlerConfig, "targetUrl">;
  now?: () => Date;
}

type StatCounter =
  | "priceChanges"
  | "availabilityChanges"
  | "ratingChanges"
  | "reviewsChanges";

interface TrackedComparison {
  changeType: ChangeType;
  counter: StatCounter;
  read: (entity: CatalogEntity) => number | string;
}

/** Compared in this order; records are appended in the same order */
const COMPARED_FIELDS: readonly TrackedComparison[] = [
  {
    changeType: "price_change",
    counter: "priceChanges",
    read: (e) => e.priceInclTax,
  },
  {
    changeType: "availability_change",
    counter: "availabilityChanges",
    read: (e) => e.availability,
  },
  { changeType: "rating_change", counter: "ratingChanges", read: (e) => e.rating },
  {
    changeType: "reviews_change",
    counter: "reviewsChanges",
    read: (e) => e.numReviews,
  },
];

export function emptyDetectionStats(): ChangeDetectionStats {
  return {
    checked: 0,
    unchanged: 0,
    changed: 0,
    unavailable: 0,
    parseFailures: 0,
    newBooks: 0,
    priceChanges: 0,
    availabilityChanges: 0,
    ratingChanges: 0,
    reviewsChanges: 0,
    totalChanges: 0,
    durationMs: 0,
  };
}

export class ChangeDetector implements EntitySink {
  private readonly gateway: PersistenceGateway;
  private readonly http: HttpClient;
  private readonly baseUrl: string;
  private readonly now: () => Date;
  private stats: ChangeDetectionStats = emptyDetectionStats();

  constructor(deps: ChangeDetectorDeps) {
    this.gateway = deps.gateway;
    this.http = deps.http;
    this.baseUrl = deps.config.targetUrl;
    this.now = deps.now ?? (() => new Date());
  }

  /** Counters since the last reset */
  get statistics(): ChangeDetectionStats {
    return { ...this.stats };
  }

  resetStatistics(): void {
    this.stats = emptyDetectionStats();
  }

  /**
   * One unsaved change record per tracked field that differs, in
   * comparison order
   */
  diff(previous: EntityRecord, fresh: CatalogEntity): NewChangeRecord[] {
    const changedAt = this.now().toISOString();
    return COMPARED_FIELDS.filter(
      (field) => field.read(previous) !== field.read(fresh),
    ).map((field): NewChangeRecord => ({
      entityId: previous.id,
      entityUrl: previous.url,
      changeType: field.changeType,
      oldValue: field.read(previous),
      newValue: field.read(fresh),
      changedAt,
      sourceUrl: fresh.url,
      detectedBy: "detector",
    }));
  }

  /**
   * Appends one change record per tracked field that differs
   * @param previous - Stored snapshot
   * @param fresh - Freshly parsed entity for the same URL
   * @returns Appended records, in comparison order
   */
  async compareAndLog(
    previous: EntityRecord,
    fresh: CatalogEntity,
  ): Promise<ChangeRecord[]> {
    const records: ChangeRecord[] = [];
    for (const change of this.diff(previous, fresh)) {
      records.push(await this.gateway.appendChange(change));
    }
    this.count(records);
    return records;
  }

  private count(records: readonly ChangeRecord[]): void {
    for (const record of records) {
      const field = COMPARED_FIELDS.find((f) => f.changeType === record.changeType);
      if (field) this.stats[field.counter]++;
      this.stats.totalChanges++;
      Logger.changeDetected(
        record.entityUrl,
        record.changeType,
        record.oldValue,
        record.newValue,
      );
    }
  }

  /**
   * Stores an entity seen for the first time and logs a new_book change
   * @returns The change, or null when the URL was already stored
   */
  async detectNewEntity(entity: CatalogEntity): Promise<ChangeRecord | null> {
    const inserted = await this.gateway.insertEntity(entity);
    if (!inserted) return null;

    const summary: ChangeValue = {
      title: inserted.title,
      category: inserted.category,
      price: inserted.priceInclTax,
    };
    const change = await this.gateway.appendChange({
      entityId: inserted.id,
      entityUrl: inserted.url,
      changeType: "new_book",
      oldValue: null,
      newValue: summary,
      changedAt: this.now().toISOString(),
      sourceUrl: inserted.url,
      detectedBy: "crawler",
    });
    this.stats.newBooks++;
    this.stats.totalChanges++;
    Logger.changeDetected(inserted.url, "new_book", null, summary);
    return change;
  }

  async storeNew(entity: CatalogEntity): Promise<boolean> {
    return (await this.detectNewEntity(entity)) !== null;
  }

  /**
   * Re-fetches one stored entity and records what changed. Fetch or parse
   * failures leave the stored entity untouched.
   */
  async checkEntity(entity: EntityRecord): Promise<ChangeRecord[]> {
    this.stats.checked++;

    const res = await this.http.fetch(entity.url);
    if (!res.ok) {
      this.stats.unavailable++;
      return [];
    }

    const parsed = parse(res.body, entity.url, {
      baseUrl: this.baseUrl,
      crawledAt: this.now(),
    });
    if (!parsed.success) {
      this.stats.parseFailures++;
      Logger.warn(`Parse failed during detection: ${parsed.error}`, {
        url: entity.url,
      });
      return [];
    }

    if (parsed.entity.contentHash === entity.contentHash) {
      this.stats.unchanged++;
      return [];
    }

    const pending = this.diff(entity, parsed.entity);
    if (pending.length === 0) {
      this.stats.unchanged++;
      return [];
    }

    const changes = await this.gateway.recordEntityChanges(parsed.entity, pending);
    this.count(changes);
    this.stats.changed++;
    return changes;
  }

  /**
   * Checks every stored entity once, sequentially
   */
  async runChangeDetectionCycle(): Promise<ChangeDetectionStats> {
    this.resetStatistics();
    const started = this.now().getTime();
    const entities = await this.gateway.listAllEntities();
    Logger.info(`Checking ${entities.length} entities for changes`, {
      count: entities.length,
    });

    for (const entity of entities) {
      await this.checkEntity(entity);
    }

    this.stats.durationMs = this.now().getTime() - started;
    Logger.info("Change detection completed", { ...this.stats });
    return this.statistics;
  }
}
