import { Kysely, PostgresDialect, sql, type RawBuilder } from "kysely";
import pg from "pg";

import { DEFAULT_DATABASE_URL } from "../config.js";
import { dbLogger } from "../logger.js";

import type { Database } from "./types.js";

const { Pool, types } = pg;

// ============================================================================
// Type Parsers
// ============================================================================

// Rows read from Postgres take the same shapes the SQLite test store returns:
// JSON as objects, dates and timestamps as ISO strings, numerics as numbers.
const parseJson = (val: string): unknown => JSON.parse(val);
types.setTypeParser(types.builtins.JSON, parseJson);
types.setTypeParser(types.builtins.JSONB, parseJson);

// A Date would shift calendar dates with the local zone
types.setTypeParser(types.builtins.DATE, (val: string) => val);

const parseTimestamp = types.getTypeParser(types.builtins.TIMESTAMPTZ);
types.setTypeParser(types.builtins.TIMESTAMPTZ, (val: string) => {
  const parsed: unknown = parseTimestamp(val);
  return parsed instanceof Date ? parsed.toISOString() : val;
});

// Donation amounts
types.setTypeParser(types.builtins.NUMERIC, (val: string) =>
  Number.parseFloat(val)
);

/**
 * Bind a value as JSONB; Kysely passes objects to pg unserialized.
 */
export function jsonb<T>(value: T): RawBuilder<T> {
  return sql<T>`${JSON.stringify(value)}::jsonb`;
}

// ============================================================================
// Pool and Kysely Instance
// ============================================================================

const DATABASE_URL = process.env.DATABASE_URL ?? DEFAULT_DATABASE_URL;

export const pool = new Pool({
  connectionString: DATABASE_URL,
  max: 10, // Jobs are sequential; parallel groups need a handful at most
  idleTimeoutMillis: 30_000,
  connectionTimeoutMillis: 5000,
});

pool.on("error", (error) => {
  dbLogger.error({ error }, "Idle client error");
});

export const db = new Kysely<Database>({
  dialect: new PostgresDialect({ pool }),
});

// ============================================================================
// Connection Management
// ============================================================================

export interface ConnectionHealth {
  connected: boolean;
  /** Installed pgvector version; null when the extension is missing. */
  vectorVersion: string | null;
}

/**
 * Round trip to the server, reporting whether pgvector is installed.
 */
export async function checkConnection(): Promise<ConnectionHealth> {
  try {
    const result = await sql<{ extversion: string }>`
      SELECT extversion FROM pg_extension WHERE extname = 'vector'
    `.execute(db);
    return {
      connected: true,
      vectorVersion: result.rows[0]?.extversion ?? null,
    };
  } catch (error) {
    dbLogger.warn({ error }, "Database health check failed");
    return { connected: false, vectorVersion: null };
  }
}

export async function closeConnection(): Promise<void> {
  // Destroying Kysely ends the pool as well
  await db.destroy();
  dbLogger.debug("Database connection closed");
}

/**
 * The database URL for display, password masked.
 */
export function getDatabaseUrl(): string {
  const url = new URL(DATABASE_URL);
  if (url.password !== "") {
    url.password = "****";
  }
  return url.toString();
}

export function getPoolStats(): {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
} {
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}
