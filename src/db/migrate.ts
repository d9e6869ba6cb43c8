import { readFileSync } from "node:fs";

import { sql } from "kysely";

import { dbLogger } from "../logger.js";
import { closeConnection, db, pool } from "./connection.js";

import type { Database } from "./types.js";

// Same relative location from src/db and dist/db
export const SCHEMA_PATH = new URL("../../sql/schema.sql", import.meta.url);

/**
 * Store tables, parents before children. `--fresh` drops them in reverse.
 */
export const STORE_TABLES: readonly (keyof Database)[] = [
  "legislators",
  "bills",
  "bill_cosponsors",
  "vote_roll_calls",
  "votes",
  "committees",
  "committee_assignments",
  "donors",
  "donations",
  "sync_watermarks",
  "bill_embeddings",
];

export interface TableStat {
  table: keyof Database;
  rows: number;
}

// ============================================================================
// Migration
// ============================================================================

/**
 * Apply sql/schema.sql in one transaction. The schema is idempotent, so
 * running it against an existing store only adds what is missing.
 */
export async function runMigration(options?: {
  fresh?: boolean;
}): Promise<void> {
  const schema = readFileSync(SCHEMA_PATH, "utf8");
  const client = await pool.connect();

  try {
    await client.query("BEGIN");

    if (options?.fresh === true) {
      for (const table of [...STORE_TABLES].reverse()) {
        await client.query(`DROP TABLE IF EXISTS ${table} CASCADE`);
      }
      dbLogger.warn({ tables: STORE_TABLES.length }, "Store tables dropped");
    }

    await client.query(schema);
    await client.query("COMMIT");

    dbLogger.info({ schema: SCHEMA_PATH.pathname }, "Schema applied");
  } catch (error) {
    await client.query("ROLLBACK");
    dbLogger.error({ error }, "Schema migration failed");
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Whether the store has been migrated; the watermark log is the last table
 * the sync engine can work without.
 */
export async function hasSchema(): Promise<boolean> {
  const result = await sql<{ present: boolean }>`
    SELECT to_regclass('public.sync_watermarks') IS NOT NULL AS present
  `.execute(db);
  return result.rows[0]?.present === true;
}

/**
 * Exact row count of every store table.
 */
export async function getTableStats(): Promise<TableStat[]> {
  const stats: TableStat[] = [];
  for (const table of STORE_TABLES) {
    const result = await sql<{ row_count: number }>`
      SELECT COUNT(*)::int AS row_count FROM ${sql.table(table)}
    `.execute(db);
    stats.push({ table, rows: result.rows[0]?.row_count ?? 0 });
  }
  return stats;
}

// ============================================================================
// Script Entry Point
// ============================================================================

async function main(): Promise<void> {
  const fresh = process.argv.slice(2).includes("--fresh");

  try {
    await runMigration({ fresh });
    const stats = await getTableStats();
    dbLogger.info(
      Object.fromEntries(stats.map((stat) => [stat.table, stat.rows])),
      "Store ready"
    );
  } catch (error) {
    dbLogger.error({ error }, "Migration failed");
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

// Only when run as `tsx src/db/migrate.ts`, never on import
if (/migrate\.[jt]s$/.test(process.argv[1] ?? "")) {
  await main();
}
