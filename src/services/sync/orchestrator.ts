import { SyncCancelledError } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { PaginatedFetcher } from "../../scraper/fetcher.js";
import {
  runSyncJob,
  type JobProgress,
  type JobResult,
  type SyncJob,
} from "./job.js";
import { SYNC_JOBS } from "./jobs/index.js";
import { UpsertEngine } from "./upsert.js";
import { WatermarkStore } from "./watermarks.js";

import type { AppConfig } from "../../config.js";
import type { Database } from "../../db/types.js";
import type { SyncEntityType } from "../../types/index.js";
import type { Kysely } from "kysely";

// ============================================================================
// Types
// ============================================================================

export interface SyncRunOptions {
  /** Run only these entity types (still in dependency order). */
  entities?: readonly SyncEntityType[];
  /** Include donations in a full run; they run on their own cadence. */
  withDonations?: boolean;
  /** Run the bill chain, committees and donations as concurrent groups. */
  parallel?: boolean;
  /** Per-job time limit; defaults to the configured job timeout. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface SyncSummary {
  results: JobResult[];
  /** False when any job failed or was cancelled. */
  ok: boolean;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

export interface SyncProgress {
  entityType: SyncEntityType;
  phase: "start" | "progress" | "finish";
  message: string;
}

type ProgressCallback = (progress: SyncProgress) => void;

export interface OrchestratorOptions {
  fetcher?: PaginatedFetcher;
  clock?: () => Date;
  jobs?: Partial<Record<SyncEntityType, SyncJob>>;
}

/**
 * Dependency order. Sponsors, cosponsors and votes resolve against bills
 * stored by the bills job.
 */
export const SYNC_ORDER: readonly SyncEntityType[] = [
  "bills",
  "sponsors",
  "cosponsors",
  "votes",
  "committees",
  "donations",
];

const BILL_CHAIN: readonly SyncEntityType[] = [
  "bills",
  "sponsors",
  "cosponsors",
  "votes",
];

/**
 * Entity types a run covers, in execution order.
 */
export function selectEntities(options: SyncRunOptions): SyncEntityType[] {
  if (options.entities !== undefined && options.entities.length > 0) {
    const requested = new Set(options.entities);
    return SYNC_ORDER.filter((entityType) => requested.has(entityType));
  }
  return SYNC_ORDER.filter(
    (entityType) => entityType !== "donations" || options.withDonations === true
  );
}

/**
 * Independent groups: the bill chain, committees and donations never touch
 * each other's tables.
 */
export function groupEntities(
  entities: readonly SyncEntityType[]
): SyncEntityType[][] {
  const groups = [
    entities.filter((entityType) => BILL_CHAIN.includes(entityType)),
    entities.filter((entityType) => entityType === "committees"),
    entities.filter((entityType) => entityType === "donations"),
  ];
  return groups.filter((group) => group.length > 0);
}

// ============================================================================
// Sync Orchestrator
// ============================================================================

export class SyncOrchestrator {
  private readonly fetcher: PaginatedFetcher;
  private readonly clock: () => Date;
  private readonly jobs: Record<SyncEntityType, SyncJob>;
  private readonly watermarks: WatermarkStore;
  private readonly upsert: UpsertEngine;
  private onProgress?: ProgressCallback;

  constructor(
    private db: Kysely<Database>,
    private config: AppConfig,
    options: OrchestratorOptions = {}
  ) {
    this.fetcher =
      options.fetcher ?? new PaginatedFetcher({ policy: config.fetchPolicy });
    this.clock = options.clock ?? (() => new Date());
    this.jobs = { ...SYNC_JOBS, ...options.jobs };
    this.watermarks = new WatermarkStore(db, {
      lookbackDays: config.lookbackDays,
      clock: this.clock,
    });
    this.upsert = new UpsertEngine(db, { clock: this.clock });
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Run the selected jobs. A failed job is logged and recorded; the jobs
   * after it still run against whatever state the store is in.
   */
  async run(options: SyncRunOptions = {}): Promise<SyncSummary> {
    const startedAt = this.clock();
    const entities = selectEntities(options);
    const timeoutMs = options.timeoutMs ?? this.config.jobTimeoutMs;

    syncLogger.info(
      { entities, parallel: options.parallel === true, timeoutMs },
      "Sync run started"
    );

    const results: JobResult[] = [];
    if (options.parallel === true) {
      const groups = groupEntities(entities);
      const groupResults = await Promise.all(
        groups.map((group) =>
          this.runSequence(group, timeoutMs, options.signal)
        )
      );
      results.push(...groupResults.flat());
      results.sort(
        (a, b) =>
          SYNC_ORDER.indexOf(a.entityType) - SYNC_ORDER.indexOf(b.entityType)
      );
    } else {
      results.push(
        ...(await this.runSequence(entities, timeoutMs, options.signal))
      );
    }

    const finishedAt = this.clock();
    const summary: SyncSummary = {
      results,
      ok: results.every((result) => result.status === "success"),
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };

    syncLogger.info(
      {
        ok: summary.ok,
        durationMs: summary.durationMs,
        jobs: Object.fromEntries(
          results.map((result) => [result.entityType, result.status])
        ),
      },
      "Sync run finished"
    );

    return summary;
  }

  private async runSequence(
    entities: readonly SyncEntityType[],
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<JobResult[]> {
    const results: JobResult[] = [];
    for (const entityType of entities) {
      results.push(await this.runJob(this.jobs[entityType], timeoutMs, signal));
    }
    return results;
  }

  /**
   * One job under its own abort controller, aborted by the parent signal
   * or by the timeout, whichever comes first.
   */
  private async runJob(
    job: SyncJob,
    timeoutMs: number,
    parent?: AbortSignal
  ): Promise<JobResult> {
    const controller = new AbortController();
    const onParentAbort = (): void => {
      controller.abort(parent?.reason);
    };

    if (parent?.aborted === true) {
      controller.abort(parent.reason);
    } else {
      parent?.addEventListener("abort", onParentAbort, { once: true });
    }

    const timer = setTimeout(() => {
      const minutes = Math.round(timeoutMs / 60_000);
      controller.abort(
        new SyncCancelledError(
          `${job.entityType} timed out after ${String(minutes)} minutes`
        )
      );
    }, timeoutMs);

    this.emit({
      entityType: job.entityType,
      phase: "start",
      message: "Starting",
    });

    try {
      const result = await runSyncJob(job, {
        db: this.db,
        config: this.config,
        fetcher: this.fetcher,
        watermarks: this.watermarks,
        upsert: this.upsert,
        clock: this.clock,
        signal: controller.signal,
        onProgress: (progress: JobProgress) => {
          this.emit({ ...progress, phase: "progress" });
        },
      });

      this.emit({
        entityType: job.entityType,
        phase: "finish",
        message: result.status,
      });
      return result;
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  }

  private emit(progress: SyncProgress): void {
    this.onProgress?.(progress);
  }
}
