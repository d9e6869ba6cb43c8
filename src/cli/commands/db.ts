import chalk from "chalk";
import ora from "ora";

import {
  checkConnection,
  closeConnection,
  db,
  getDatabaseUrl,
  getPoolStats,
} from "../../db/connection.js";
import {
  getTableStats,
  hasSchema,
  runMigration,
  type TableStat,
} from "../../db/migrate.js";
import { errorMessage } from "../../errors.js";
import { WatermarkStore } from "../../services/sync/watermarks.js";
import { displayStoreStats } from "../utils/display.js";

import type { Database, SyncWatermark } from "../../db/types.js";
import type { EntityType } from "../../types/index.js";
import type { Command } from "commander";

/**
 * The entity type whose job writes each table.
 */
const TABLE_WRITERS: Partial<Record<keyof Database, EntityType>> = {
  bills: "bills",
  bill_cosponsors: "cosponsors",
  vote_roll_calls: "votes",
  votes: "votes",
  committees: "committees",
  committee_assignments: "committees",
  donors: "donations",
  donations: "donations",
  bill_embeddings: "embeddings",
};

async function lastRunsByTable(
  stats: readonly TableStat[]
): Promise<Map<string, SyncWatermark>> {
  const watermarks = new WatermarkStore(db);
  const runs = new Map<string, SyncWatermark>();
  for (const stat of stats) {
    const writer = TABLE_WRITERS[stat.table];
    if (writer === undefined) {
      continue;
    }
    const run = await watermarks.lastSuccessRecord(writer);
    if (run !== null) {
      runs.set(stat.table, run);
    }
  }
  return runs;
}

// ============================================================================
// Database Commands
// ============================================================================

export function registerDbCommand(program: Command): void {
  const command = program
    .command("db")
    .description("Manage the legislative store");

  command
    .command("migrate")
    .description("Apply sql/schema.sql to the store")
    .option("--fresh", "Drop every store table first (destructive!)")
    .action(async (options: { fresh?: boolean }) => {
      const spinner = ora(
        options.fresh === true
          ? "Dropping store tables and applying schema..."
          : "Applying schema..."
      ).start();

      try {
        await runMigration({ fresh: options.fresh });
        spinner.succeed("Schema applied");
        displayStoreStats(await getTableStats(), new Map());
      } catch (error) {
        spinner.fail(`Migration failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });

  command
    .command("status")
    .description("Check the connection and show row counts per table")
    .action(async () => {
      const spinner = ora(`Connecting to ${getDatabaseUrl()}...`).start();

      try {
        const health = await checkConnection();
        if (!health.connected) {
          spinner.fail(`Cannot connect to ${getDatabaseUrl()}`);
          process.exitCode = 1;
          return;
        }

        const pool = getPoolStats();
        spinner.succeed(
          `Connected to ${getDatabaseUrl()} ` +
            chalk.dim(
              `(${String(pool.totalCount)} open, ${String(pool.idleCount)} idle, ${String(pool.waitingCount)} waiting)`
            )
        );

        if (health.vectorVersion === null) {
          console.log(
            chalk.yellow("pgvector is not installed; hydrate will fail")
          );
        }

        if (!(await hasSchema())) {
          console.log(
            chalk.yellow("\nStore not initialized, run 'legis-sync db migrate'")
          );
          return;
        }

        const stats = await getTableStats();
        displayStoreStats(stats, await lastRunsByTable(stats));
      } catch (error) {
        spinner.fail(`Status check failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await closeConnection();
      }
    });
}
