/**
 * Embedding Hydrator - bill text to the vector index
 *
 * Each candidate bill is embedded at the largest size tier the model
 * accepts. A context-length rejection moves to the next smaller tier; any
 * other failure, or running out of tiers, skips the bill for this run.
 */

import { sql, type Kysely } from "kysely";

import {
  EmbeddingInputTooLargeError,
  errorMessage,
  isAbortError,
} from "../../errors.js";
import { hydrateLogger } from "../../logger.js";
import { WatermarkStore } from "../sync/watermarks.js";

import type { AppConfig } from "../../config.js";
import type { Database, SyncRunStatus } from "../../db/types.js";
import type { Embedder } from "./embeddings.js";
import type { VectorIndex } from "./vector-index.js";

// ============================================================================
// Types
// ============================================================================

export const TRUNCATION_MARKER = " [TRUNCATED]";

const TITLE_LIMIT = 1000;
const PREVIEW_LIMIT = 500;

export type EmbedOutcome =
  | { ok: true; vector: number[]; tier: number; truncated: boolean }
  | { ok: false; reason: string };

export interface HydrateOptions {
  /** Ignore the watermark and consider every bill with a summary. */
  full?: boolean;
  limit?: number;
  signal?: AbortSignal;
}

export interface HydrateResult {
  status: SyncRunStatus;
  candidates: number;
  embedded: number;
  skipped: number;
  /** Bills embedded per size tier. */
  tierHits: Record<number, number>;
  error: string | null;
}

export interface HydrateProgress {
  current: number;
  total: number;
  billNumber: string;
}

type ProgressCallback = (progress: HydrateProgress) => void;

interface CandidateBill {
  id: number;
  bill_number: string;
  congress: number;
  title: string | null;
  summary: string;
  updated_at: string;
}

// ============================================================================
// Tiered Embedding
// ============================================================================

/**
 * Cut text to `ceiling` characters, marking the cut.
 */
export function truncateForEmbedding(text: string, ceiling: number): string {
  if (text.length <= ceiling) {
    return text;
  }
  return `${text.slice(0, ceiling)}${TRUNCATION_MARKER}`;
}

export function embeddingText(title: string | null, summary: string): string {
  return `${title ?? ""} \nSummary: ${summary}`;
}

/**
 * Try each tier from largest to smallest. Tiers that would send the same
 * input as a larger tier already rejected are not retried.
 */
export async function embedWithTruncation(
  embedder: Embedder,
  text: string,
  tiers: readonly number[],
  signal?: AbortSignal
): Promise<EmbedOutcome> {
  const ordered = [...new Set(tiers)].sort((a, b) => b - a);
  const attempted = new Set<string>();

  for (const tier of ordered) {
    const input = truncateForEmbedding(text, tier);
    if (attempted.has(input)) {
      continue;
    }
    attempted.add(input);

    try {
      const vector = await embedder.embed(input, signal);
      return { ok: true, vector, tier, truncated: input !== text };
    } catch (error) {
      if (isAbortError(error) || signal?.aborted === true) {
        throw error;
      }
      if (error instanceof EmbeddingInputTooLargeError) {
        hydrateLogger.debug(
          { tier, length: input.length },
          "Input too large, trying next tier"
        );
        continue;
      }
      return { ok: false, reason: errorMessage(error) };
    }
  }

  return { ok: false, reason: "Input too large at every tier" };
}

// ============================================================================
// Embedding Hydrator
// ============================================================================

export class EmbeddingHydrator {
  private readonly watermarks: WatermarkStore;
  private readonly clock: () => Date;
  private onProgress?: ProgressCallback;

  constructor(
    private db: Kysely<Database>,
    private config: AppConfig,
    private embedder: Embedder,
    private index: VectorIndex,
    options: { clock?: () => Date } = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.watermarks = new WatermarkStore(db, {
      lookbackDays: config.lookbackDays,
      clock: this.clock,
    });
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Bills with a usable summary, changed since the last successful run or
   * never embedded.
   */
  private async findCandidates(
    since: Date | null,
    limit?: number
  ): Promise<CandidateBill[]> {
    let query = this.db
      .selectFrom("bills")
      .select([
        "id",
        "bill_number",
        "congress",
        "title",
        "summary",
        "updated_at",
      ])
      .where("summary", "is not", null)
      .where(
        sql<number>`length(trim(${sql.ref("summary")}))`,
        ">",
        this.config.embeddings.minSummaryLength
      )
      .orderBy("updated_at", "asc")
      .orderBy("id", "asc");

    if (since !== null) {
      query = query.where((eb) =>
        eb.or([
          eb("updated_at", ">=", since.toISOString()),
          eb.not(
            eb.exists(
              eb
                .selectFrom("bill_embeddings")
                .select("bill_embeddings.vector_id")
                .whereRef("bill_embeddings.bill_id", "=", "bills.id")
            )
          ),
        ])
      );
    }
    if (limit !== undefined) {
      query = query.limit(limit);
    }

    const rows = await query.execute();
    return rows.flatMap((row) =>
      row.summary !== null ? [{ ...row, summary: row.summary.trim() }] : []
    );
  }

  async hydrate(options: HydrateOptions = {}): Promise<HydrateResult> {
    const startedAt = this.clock();
    const { signal } = options;
    const result: HydrateResult = {
      status: "success",
      candidates: 0,
      embedded: 0,
      skipped: 0,
      tierHits: {},
      error: null,
    };

    // A run cut short by `limit` only vouches for what it reached
    let syncedThrough: Date | undefined;

    try {
      const since =
        options.full === true
          ? null
          : await this.watermarks.lastSuccess("embeddings");
      const candidates = await this.findCandidates(since, options.limit);
      result.candidates = candidates.length;

      const last = candidates.at(-1);
      if (
        options.limit !== undefined &&
        last !== undefined &&
        candidates.length >= options.limit
      ) {
        syncedThrough = new Date(last.updated_at);
      }

      hydrateLogger.info(
        { candidates: candidates.length, since: since?.toISOString() ?? null },
        "Hydration started"
      );

      for (const [position, bill] of candidates.entries()) {
        signal?.throwIfAborted();
        this.onProgress?.({
          current: position + 1,
          total: candidates.length,
          billNumber: bill.bill_number,
        });

        const text = embeddingText(bill.title, bill.summary);
        const outcome = await embedWithTruncation(
          this.embedder,
          text,
          this.config.embeddings.tiers,
          signal
        );

        if (!outcome.ok) {
          result.skipped++;
          hydrateLogger.warn(
            {
              bill: bill.bill_number,
              congress: bill.congress,
              reason: outcome.reason,
            },
            "Bill skipped"
          );
          continue;
        }

        const vectorId = `${bill.bill_number}-${String(bill.congress)}`;
        await this.index.upsert(vectorId, {
          billId: bill.id,
          vector: outcome.vector,
          model: this.embedder.model,
          metadata: {
            billNumber: bill.bill_number,
            congress: bill.congress,
            title: (bill.title ?? "").slice(0, TITLE_LIMIT),
            preview: bill.summary.slice(0, PREVIEW_LIMIT),
          },
        });

        result.embedded++;
        result.tierHits[outcome.tier] =
          (result.tierHits[outcome.tier] ?? 0) + 1;
      }
    } catch (error) {
      if (signal?.aborted === true || isAbortError(error)) {
        result.status = "cancelled";
      } else {
        result.status = "error";
        hydrateLogger.error({ error }, "Hydration failed");
      }
      result.error = errorMessage(error);
    }

    try {
      await this.watermarks.recordRun(
        "embeddings",
        result.embedded,
        result.status,
        result.status === "success"
          ? JSON.stringify({
              skipped: result.skipped,
              tierHits: result.tierHits,
            })
          : result.error,
        { startedAt, syncedThrough }
      );
    } catch (error) {
      hydrateLogger.error({ error }, "Failed to record watermark");
      result.status = "error";
      result.error = `Watermark not recorded: ${errorMessage(error)}`;
    }

    hydrateLogger.info(
      {
        status: result.status,
        embedded: result.embedded,
        skipped: result.skipped,
        tierHits: result.tierHits,
      },
      "Hydration finished"
    );

    return result;
  }
}
