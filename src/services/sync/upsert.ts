/**
 * Upsert Engine - idempotent natural-key merge
 *
 * Writes canonical rows with INSERT ... ON CONFLICT so that re-ingesting
 * the same records never creates a duplicate. The SQL stays within what
 * PostgreSQL and SQLite both accept.
 */

import { sql, type Kysely, type RawBuilder } from "kysely";

import { dbLogger } from "../../logger.js";

import type { Database } from "../../db/types.js";

// ============================================================================
// Types
// ============================================================================

export type ColumnValue = string | number | boolean | null;

export type Row = Readonly<Record<string, ColumnValue>>;

export interface MergeSpec {
  table: keyof Database;
  /** Columns of the table's unique constraint. Never overwritten. */
  naturalKey: readonly string[];
  /** Overwritten on conflict unless the incoming value is null. */
  update?: readonly string[];
  /** Overwritten on conflict, null included. */
  overwrite?: readonly string[];
  /** "ignore" makes the merge insert-only (DO NOTHING on conflict). */
  conflict?: "update" | "ignore";
  /** Timestamp column set to the merge time on insert and update. */
  touch?: string;
}

export interface MergeResult {
  inserted: number;
  updated: number;
  ignored: number;
}

export interface UpsertEngineOptions {
  batchSize?: number;
  clock?: () => Date;
}

export const EMPTY_MERGE_RESULT: Readonly<MergeResult> = {
  inserted: 0,
  updated: 0,
  ignored: 0,
};

export function addMergeResults(a: MergeResult, b: MergeResult): MergeResult {
  return {
    inserted: a.inserted + b.inserted,
    updated: a.updated + b.updated,
    ignored: a.ignored + b.ignored,
  };
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Stable string form of a row's natural key; numbers and numeric strings
 * from different drivers compare equal.
 */
export function naturalKeyOf(row: Row, naturalKey: readonly string[]): string {
  return JSON.stringify(
    naturalKey.map((column) => {
      const value = row[column];
      return value === undefined || value === null ? null : String(value);
    })
  );
}

/**
 * Last occurrence wins, first-seen order is kept.
 */
export function dedupeByNaturalKey(
  rows: readonly Row[],
  naturalKey: readonly string[]
): Row[] {
  const byKey = new Map<string, Row>();
  for (const row of rows) {
    byKey.set(naturalKeyOf(row, naturalKey), row);
  }
  return [...byKey.values()];
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// ============================================================================
// Upsert Engine
// ============================================================================

export class UpsertEngine {
  private readonly batchSize: number;
  private readonly clock: () => Date;

  constructor(
    private db: Kysely<Database>,
    options: UpsertEngineOptions = {}
  ) {
    this.batchSize = options.batchSize ?? 500;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Merge rows into `spec.table`.
   *
   * Rows must share one column set. Rows missing a natural-key value are
   * rejected with an error: that is a caller bug, not a data problem.
   */
  async merge(rows: readonly Row[], spec: MergeSpec): Promise<MergeResult> {
    if (rows.length === 0) {
      return { ...EMPTY_MERGE_RESULT };
    }

    for (const row of rows) {
      for (const column of spec.naturalKey) {
        const value = row[column];
        if (value === undefined || value === null) {
          throw new Error(
            `Row for ${spec.table} is missing natural key column ${column}`
          );
        }
      }
    }

    const unique = dedupeByNaturalKey(rows, spec.naturalKey);
    const touchedAt = this.clock().toISOString();
    let result: MergeResult = { ...EMPTY_MERGE_RESULT };

    for (const batch of chunk(unique, this.batchSize)) {
      const batchResult = await this.db
        .transaction()
        .execute(async (trx) => this.mergeBatch(trx, batch, spec, touchedAt));
      result = addMergeResults(result, batchResult);
    }

    dbLogger.debug(
      { table: spec.table, rows: rows.length, ...result },
      "Merged rows"
    );

    return result;
  }

  private async mergeBatch(
    trx: Kysely<Database>,
    batch: Row[],
    spec: MergeSpec,
    touchedAt: string
  ): Promise<MergeResult> {
    const first = batch[0];
    if (first === undefined) {
      return { ...EMPTY_MERGE_RESULT };
    }

    const columns = Object.keys(first).filter(
      (column) => column !== spec.touch
    );
    const insertColumns =
      spec.touch !== undefined ? [...columns, spec.touch] : columns;

    const existing = await this.findExistingKeys(trx, batch, spec);

    const values = sql.join(
      batch.map((row) => {
        const cells: ColumnValue[] = columns.map(
          (column) => row[column] ?? null
        );
        if (spec.touch !== undefined) {
          cells.push(touchedAt);
        }
        return sql`(${sql.join(cells)})`;
      })
    );

    const columnList = sql.join(insertColumns.map((column) => sql.id(column)));
    const keyList = sql.join(spec.naturalKey.map((column) => sql.id(column)));

    await sql`
      INSERT INTO ${sql.table(spec.table)} (${columnList})
      VALUES ${values}
      ON CONFLICT (${keyList})
      ${this.conflictAction(spec)}
    `.execute(trx);

    const inserted = batch.length - existing;
    return spec.conflict === "ignore"
      ? { inserted, updated: 0, ignored: existing }
      : { inserted, updated: existing, ignored: 0 };
  }

  private conflictAction(spec: MergeSpec): RawBuilder<unknown> {
    if (spec.conflict === "ignore") {
      return sql`DO NOTHING`;
    }

    const table = sql.table(spec.table);
    const assignments = [
      ...(spec.update ?? []).map(
        (column) =>
          sql`${sql.id(column)} = COALESCE(excluded.${sql.id(column)}, ${table}.${sql.id(column)})`
      ),
      ...(spec.overwrite ?? []).map(
        (column) => sql`${sql.id(column)} = excluded.${sql.id(column)}`
      ),
    ];
    if (spec.touch !== undefined) {
      assignments.push(
        sql`${sql.id(spec.touch)} = excluded.${sql.id(spec.touch)}`
      );
    }

    // Nothing mutable: keep the row, still count it as seen
    if (assignments.length === 0) {
      return sql`DO NOTHING`;
    }
    return sql`DO UPDATE SET ${sql.join(assignments)}`;
  }

  private async findExistingKeys(
    trx: Kysely<Database>,
    batch: Row[],
    spec: MergeSpec
  ): Promise<number> {
    const predicates = batch.map(
      (row) =>
        sql`(${sql.join(
          spec.naturalKey.map(
            (column) => sql`${sql.id(column)} = ${row[column] ?? null}`
          ),
          sql` AND `
        )})`
    );

    const result = await sql<Record<string, ColumnValue>>`
      SELECT ${sql.join(spec.naturalKey.map((column) => sql.id(column)))}
      FROM ${sql.table(spec.table)}
      WHERE ${sql.join(predicates, sql` OR `)}
    `.execute(trx);

    const keys = new Set(
      result.rows.map((row) => naturalKeyOf(row, spec.naturalKey))
    );
    return keys.size;
  }
}
