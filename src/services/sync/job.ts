/**
 * Entity Sync Job - shared lifecycle of every entity job
 *
 * read-watermark -> run (fetch, normalize, resolve, upsert) -> record-watermark
 *
 * Record-level problems are counted as skips and never fail a job. Any
 * thrown error fails the job; an aborted signal cancels it. Either way
 * exactly one watermark row is written.
 */

import { errorMessage, isAbortError } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import {
  addMergeResults,
  EMPTY_MERGE_RESULT,
  UpsertEngine,
} from "./upsert.js";
import { ENTITY_CAPABILITIES, type WatermarkStore } from "./watermarks.js";

import type { AppConfig } from "../../config.js";
import type { Database, SyncRunStatus } from "../../db/types.js";
import type { PaginatedFetcher } from "../../scraper/fetcher.js";
import type { EntityCapability, SyncEntityType } from "../../types/index.js";
import type { MergeResult, MergeSpec, Row } from "./upsert.js";
import type { Kysely } from "kysely";
import type { Logger } from "pino";

// ============================================================================
// Skips
// ============================================================================

export type SkipReason =
  | "invalid-bill"
  | "invalid-cosponsor"
  | "missing-detail"
  | "unresolved-sponsor"
  | "unresolved-legislator"
  | "invalid-vote"
  | "no-bill"
  | "unresolved-bill"
  | "unresolved-voter"
  | "unresolved-committee"
  | "incomplete-member"
  | "invalid-row"
  | "before-window"
  | "untracked-recipient";

export class SkipCounter {
  private readonly counts = new Map<SkipReason, number>();

  add(reason: SkipReason, count = 1): void {
    if (count > 0) {
      this.counts.set(reason, (this.counts.get(reason) ?? 0) + count);
    }
  }

  get(reason: SkipReason): number {
    return this.counts.get(reason) ?? 0;
  }

  get total(): number {
    let total = 0;
    for (const count of this.counts.values()) {
      total += count;
    }
    return total;
  }

  toJSON(): Partial<Record<SkipReason, number>> {
    const tally: Partial<Record<SkipReason, number>> = {};
    for (const [reason, count] of this.counts) {
      tally[reason] = count;
    }
    return tally;
  }
}

// ============================================================================
// Types
// ============================================================================

export interface JobProgress {
  entityType: SyncEntityType;
  message: string;
}

export type JobProgressCallback = (progress: JobProgress) => void;

export interface JobContext {
  db: Kysely<Database>;
  config: AppConfig;
  fetcher: PaginatedFetcher;
  upsert: UpsertEngine;
  /** Start of the fetch window: last successful run or default lookback. */
  since: Date;
  startedAt: Date;
  signal: AbortSignal;
  log: Logger;
  skips: SkipCounter;
  /** Merge through the upsert engine and add the counts to the job result. */
  merge(rows: readonly Row[], spec: MergeSpec): Promise<MergeResult>;
  progress(message: string): void;
}

export interface SyncJob {
  entityType: SyncEntityType;
  run(context: JobContext): Promise<void>;
}

export interface JobResult {
  entityType: SyncEntityType;
  status: SyncRunStatus;
  recordsAffected: number;
  merged: MergeResult;
  skips: Partial<Record<SkipReason, number>>;
  since: string | null;
  durationMs: number;
  error: string | null;
}

export interface JobDependencies {
  db: Kysely<Database>;
  config: AppConfig;
  fetcher: PaginatedFetcher;
  watermarks: WatermarkStore;
  upsert?: UpsertEngine;
  clock?: () => Date;
  signal?: AbortSignal;
  onProgress?: JobProgressCallback;
}

export function capabilityOf(entityType: SyncEntityType): EntityCapability {
  return ENTITY_CAPABILITIES[entityType];
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Run one job to completion. Never throws: the outcome is in the result
 * and in the watermark row written for it.
 */
export async function runSyncJob(
  job: SyncJob,
  deps: JobDependencies
): Promise<JobResult> {
  const clock = deps.clock ?? (() => new Date());
  const signal = deps.signal ?? new AbortController().signal;
  const upsert = deps.upsert ?? new UpsertEngine(deps.db, { clock });
  const log = syncLogger.child({ entity: job.entityType });
  const skips = new SkipCounter();
  const startedAt = clock();

  let merged: MergeResult = { ...EMPTY_MERGE_RESULT };
  let since: Date | null = null;
  let status: SyncRunStatus = "success";
  let failure: string | null = null;

  log.info("Job started");

  try {
    since = await deps.watermarks.lastSuccess(job.entityType);
    log.debug({ since: since.toISOString() }, "Watermark read");

    const capability = capabilityOf(job.entityType);
    if (
      !capability.coversHistory &&
      !(await deps.watermarks.hasSucceeded(job.entityType))
    ) {
      log.warn(
        { windowing: capability.windowing },
        "First run of a source without history, earlier records are not recoverable"
      );
    }

    const context: JobContext = {
      db: deps.db,
      config: deps.config,
      fetcher: deps.fetcher,
      upsert,
      since,
      startedAt,
      signal,
      log,
      skips,
      merge: async (rows, spec) => {
        const result = await upsert.merge(rows, spec);
        merged = addMergeResults(merged, result);
        return result;
      },
      progress: (message) => {
        deps.onProgress?.({ entityType: job.entityType, message });
      },
    };

    await job.run(context);
  } catch (error) {
    if (signal.aborted || isAbortError(error)) {
      status = "cancelled";
      failure = errorMessage(signal.aborted ? signal.reason : error);
      log.warn({ reason: failure }, "Job cancelled");
    } else {
      status = "error";
      failure = errorMessage(error);
      log.error({ error }, "Job failed");
    }
  }

  const recordsAffected = merged.inserted + merged.updated;
  const notes =
    status === "success"
      ? skips.total > 0
        ? JSON.stringify({ skipped: skips.toJSON() })
        : null
      : failure;

  try {
    await deps.watermarks.recordRun(
      job.entityType,
      recordsAffected,
      status,
      notes,
      { startedAt }
    );
  } catch (error) {
    log.error({ error }, "Failed to record watermark");
    status = "error";
    failure = `Watermark not recorded: ${errorMessage(error)}`;
  }

  const durationMs = clock().getTime() - startedAt.getTime();
  log.info(
    {
      status,
      ...merged,
      skipped: skips.toJSON(),
      duration: `${String(durationMs)}ms`,
    },
    "Job finished"
  );

  return {
    entityType: job.entityType,
    status,
    recordsAffected,
    merged,
    skips: skips.toJSON(),
    since: since?.toISOString() ?? null,
    durationMs,
    error: failure,
  };
}
