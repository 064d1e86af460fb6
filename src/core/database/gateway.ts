/**
 * Persistence gateway consumed by the crawler and the change detector
 */

import type {
  CatalogEntity,
  ChangeRecord,
  CrawlState,
  DbHandles,
  EntityRecord,
  NewChangeRecord,
} from "../types";
import { assertValidEntity } from "../validation/index";
import { appendChange, listRecentChanges } from "./changes";
import { closeDb, openDb } from "./connection";
import {
  deleteCrawlState,
  getCrawlState,
  upsertCrawlState,
} from "./crawl-state";
import {
  countEntities,
  findEntityByUrl,
  insertEntity,
  listAllEntities,
  replaceEntity,
} from "./operations";

export interface PersistenceGateway {
  /** Inserts unless the URL exists; null signals the conflict */
  insertEntity(entity: CatalogEntity): Promise<EntityRecord | null>;
  findEntityByUrl(url: string): Promise<EntityRecord | null>;
  listAllEntities(): Promise<EntityRecord[]>;
  countEntities(): Promise<number>;
  /** Replaces mutable fields; identity is kept */
  replaceEntity(entity: CatalogEntity): Promise<boolean>;
  appendChange(change: NewChangeRecord): Promise<ChangeRecord>;
  /**
   * Replaces the entity and appends its change records as one unit.
   * Nothing is written when the entity is not stored.
   */
  recordEntityChanges(
    entity: CatalogEntity,
    changes: readonly NewChangeRecord[],
  ): Promise<ChangeRecord[]>;
  listRecentChanges(limit: number): Promise<ChangeRecord[]>;
  getCrawlState(stateType: string): Promise<CrawlState | null>;
  upsertCrawlState(state: CrawlState): Promise<void>;
  deleteCrawlState(stateType: string): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * better-sqlite3 backed gateway. Entities are re-validated and their hash
 * recomputed on every write.
 */
export class SqliteGateway implements PersistenceGateway {
  constructor(private readonly handles: DbHandles) {}

  static open(dbPath: string): SqliteGateway {
    return new SqliteGateway(openDb(dbPath));
  }

  async insertEntity(entity: CatalogEntity): Promise<EntityRecord | null> {
    return insertEntity(this.handles.db, assertValidEntity(entity));
  }

  async findEntityByUrl(url: string): Promise<EntityRecord | null> {
    return findEntityByUrl(this.handles.db, url);
  }

  async listAllEntities(): Promise<EntityRecord[]> {
    return listAllEntities(this.handles.db);
  }

  async countEntities(): Promise<number> {
    return countEntities(this.handles.db);
  }

  async replaceEntity(entity: CatalogEntity): Promise<boolean> {
    return replaceEntity(this.handles.db, assertValidEntity(entity));
  }

  async appendChange(change: NewChangeRecord): Promise<ChangeRecord> {
    return appendChange(this.handles.db, change);
  }

  async recordEntityChanges(
    entity: CatalogEntity,
    changes: readonly NewChangeRecord[],
  ): Promise<ChangeRecord[]> {
    const valid = assertValidEntity(entity);
    const { db } = this.handles;
    const tx = db.transaction(() => {
      if (!replaceEntity(db, valid)) {
        throw new Error(`No stored entity for ${valid.url}`);
      }
      return changes.map((change) => appendChange(db, change));
    });
    return tx();
  }

  async listRecentChanges(limit: number): Promise<ChangeRecord[]> {
    return listRecentChanges(this.handles.db, limit);
  }

  async getCrawlState(stateType: string): Promise<CrawlState | null> {
    return getCrawlState(this.handles.db, stateType);
  }

  async upsertCrawlState(state: CrawlState): Promise<void> {
    upsertCrawlState(this.handles.db, state);
  }

  async deleteCrawlState(stateType: string): Promise<boolean> {
    return deleteCrawlState(this.handles.db, stateType);
  }

  async close(): Promise<void> {
    closeDb(this.handles);
  }
}
