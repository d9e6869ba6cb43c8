/**
 * Watermark Store - append-only log of sync runs per entity type
 *
 * The most recent successful run of an entity type decides where the next
 * run starts reading. Failed and cancelled runs are logged for the audit
 * trail but never move that marker.
 */

import type {
  Database,
  SyncRunStatus,
  SyncWatermark,
} from "../../db/types.js";
import type { EntityCapability, EntityType } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Defaults
// ============================================================================

const DAY_MS = 86_400_000;

export const DEFAULT_LOOKBACK_DAYS: Record<EntityType, number> = {
  bills: 30,
  sponsors: 30,
  cosponsors: 7,
  votes: 7,
  committees: 0,
  donations: 30,
  embeddings: 3650,
};

export const ENTITY_CAPABILITIES: Record<EntityType, EntityCapability> = {
  bills: { windowing: "source-filtered", coversHistory: true },
  sponsors: { windowing: "store-filtered", coversHistory: true },
  cosponsors: { windowing: "store-filtered", coversHistory: true },
  votes: { windowing: "sequence-cursor", coversHistory: false },
  committees: { windowing: "snapshot", coversHistory: false },
  donations: { windowing: "store-filtered", coversHistory: true },
  embeddings: { windowing: "store-filtered", coversHistory: true },
};

// ============================================================================
// Types
// ============================================================================

export interface RecordRunOptions {
  /** When the run began; the default watermark for a successful run. */
  startedAt?: Date;
  /** Explicit high-water mark, when the job knows a tighter one. */
  syncedThrough?: Date;
}

export interface WatermarkStoreOptions {
  lookbackDays?: Partial<Record<EntityType, number>>;
  clock?: () => Date;
}

// ============================================================================
// Watermark Store
// ============================================================================

export class WatermarkStore {
  private readonly lookbackDays: Record<EntityType, number>;
  private readonly clock: () => Date;

  constructor(
    private db: Kysely<Database>,
    options: WatermarkStoreOptions = {}
  ) {
    this.lookbackDays = { ...DEFAULT_LOOKBACK_DAYS, ...options.lookbackDays };
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Start of the next fetch window for an entity type.
   *
   * Falls back to `now - lookbackDays[entityType]` when no run succeeded yet.
   */
  async lastSuccess(entityType: EntityType): Promise<Date> {
    const latest = await this.lastSuccessRecord(entityType);
    if (latest !== null) {
      return new Date(latest.synced_through);
    }
    return this.defaultWindowStart(entityType);
  }

  defaultWindowStart(entityType: EntityType): Date {
    return new Date(
      this.clock().getTime() - this.lookbackDays[entityType] * DAY_MS
    );
  }

  async lastSuccessRecord(
    entityType: EntityType
  ): Promise<SyncWatermark | null> {
    const row = await this.db
      .selectFrom("sync_watermarks")
      .selectAll()
      .where("entity_type", "=", entityType)
      .where("status", "=", "success")
      .orderBy("synced_through", "desc")
      .orderBy("id", "desc")
      .limit(1)
      .executeTakeFirst();

    return row ?? null;
  }

  /**
   * Append one run to the log.
   *
   * A successful run's mark is clamped to the previous success so the
   * sequence never goes backwards; other statuses keep the attempted mark,
   * which lastSuccess ignores.
   */
  async recordRun(
    entityType: EntityType,
    recordsAffected: number,
    status: SyncRunStatus,
    notes: string | null,
    options: RecordRunOptions = {}
  ): Promise<SyncWatermark> {
    const finishedAt = this.clock();
    const startedAt = options.startedAt ?? finishedAt;
    let syncedThrough = options.syncedThrough ?? startedAt;

    if (status === "success") {
      const previous = await this.lastSuccessRecord(entityType);
      if (previous !== null) {
        const previousMark = new Date(previous.synced_through);
        if (previousMark.getTime() > syncedThrough.getTime()) {
          syncedThrough = previousMark;
        }
      }
    }

    return await this.db
      .insertInto("sync_watermarks")
      .values({
        entity_type: entityType,
        synced_through: syncedThrough.toISOString(),
        records_affected: recordsAffected,
        status,
        notes,
        started_at: startedAt.toISOString(),
        finished_at: finishedAt.toISOString(),
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  }

  /**
   * Recent runs, newest first.
   */
  async history(
    options: { entityType?: EntityType; limit?: number } = {}
  ): Promise<SyncWatermark[]> {
    let query = this.db
      .selectFrom("sync_watermarks")
      .selectAll()
      .orderBy("id", "desc")
      .limit(options.limit ?? 20);

    if (options.entityType !== undefined) {
      query = query.where("entity_type", "=", options.entityType);
    }

    return await query.execute();
  }

  /**
   * Whether an entity type has ever completed a run.
   */
  async hasSucceeded(entityType: EntityType): Promise<boolean> {
    return (await this.lastSuccessRecord(entityType)) !== null;
  }
}
