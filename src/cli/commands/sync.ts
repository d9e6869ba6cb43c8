import { InvalidArgumentError } from "commander";
import ora, { type Ora } from "ora";

import { loadConfig } from "../../config.js";
import { db, closeConnection } from "../../db/connection.js";
import { errorMessage } from "../../errors.js";
import {
  SyncOrchestrator,
  WatermarkStore,
  type SyncRunOptions,
} from "../../services/sync/index.js";
import {
  SYNC_ENTITY_TYPES,
  isSyncEntityType,
  type EntityType,
  type SyncEntityType,
} from "../../types/index.js";
import { displaySyncHistory, displaySyncSummary } from "../utils/display.js";

import type { Command } from "commander";

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parseEntityType(value: string): EntityType {
  if (value === "embeddings" || isSyncEntityType(value)) {
    return value;
  }
  throw new InvalidArgumentError(
    `Expected one of: ${[...SYNC_ENTITY_TYPES, "embeddings"].join(", ")}`
  );
}

/**
 * Ctrl+C cancels the running job instead of killing the process, so the
 * cancelled run is still written to the sync log.
 */
function cancelOnInterrupt(spinner: Ora): {
  signal: AbortSignal;
  release: () => void;
} {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    spinner.text = "Cancelling...";
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);
  return {
    signal: controller.signal,
    release: () => {
      process.removeListener("SIGINT", onInterrupt);
    },
  };
}

async function runSync(
  label: string,
  options: Omit<SyncRunOptions, "signal">
): Promise<void> {
  const spinner = ora(label).start();
  const interrupt = cancelOnInterrupt(spinner);

  try {
    const orchestrator = new SyncOrchestrator(db, loadConfig());
    orchestrator.setProgressCallback((progress) => {
      spinner.text = `${progress.entityType}: ${progress.message}`;
    });

    const summary = await orchestrator.run({
      ...options,
      signal: interrupt.signal,
    });

    if (summary.ok) {
      spinner.succeed("Sync completed");
    } else {
      spinner.warn("Sync finished with failures");
      process.exitCode = 1;
    }
    displaySyncSummary(summary);
  } catch (error) {
    spinner.fail(`Failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    interrupt.release();
    await closeConnection();
  }
}

// ============================================================================
// Sync Commands
// ============================================================================

export async function showSyncStatus(options: {
  entity?: EntityType;
  limit?: number;
}): Promise<void> {
  try {
    const store = new WatermarkStore(db);
    const rows = await store.history({
      entityType: options.entity,
      limit: options.limit,
    });
    displaySyncHistory(rows);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await closeConnection();
  }
}

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Incremental sync of legislative data")
    .addHelpText(
      "after",
      `
Jobs run in dependency order:
  bills -> sponsors -> cosponsors -> votes, then committees, then donations.

Each job only fetches what changed since its last successful run, minus a
lookback window. A failed job is recorded and the next jobs still run.
Donations are a bulk download and only run with --with-donations or by name.
`
    );

  // sync all
  sync
    .command("all")
    .description("Run every job in dependency order")
    .option("--with-donations", "Include the donations bulk import")
    .option(
      "--parallel",
      "Run the bill jobs, committees and donations as concurrent groups"
    )
    .option(
      "--timeout <minutes>",
      "Per-job time limit in minutes",
      parsePositiveInt
    )
    .action(
      async (options: {
        withDonations?: boolean;
        parallel?: boolean;
        timeout?: number;
      }) => {
        await runSync("Syncing all entities...", {
          withDonations: options.withDonations,
          parallel: options.parallel,
          timeoutMs:
            options.timeout !== undefined ? options.timeout * 60_000 : undefined,
        });
      }
    );

  // sync run <entities...>
  sync
    .command("run")
    .description("Run selected jobs, still in dependency order")
    .argument("<entities...>", SYNC_ENTITY_TYPES.join(", "))
    .option(
      "--timeout <minutes>",
      "Per-job time limit in minutes",
      parsePositiveInt
    )
    .action(async (entities: string[], options: { timeout?: number }) => {
      const selected: SyncEntityType[] = [];
      for (const entity of entities) {
        if (!isSyncEntityType(entity)) {
          console.error(
            `Unknown entity "${entity}". Expected: ${SYNC_ENTITY_TYPES.join(", ")}`
          );
          process.exitCode = 1;
          await closeConnection();
          return;
        }
        selected.push(entity);
      }

      await runSync(`Syncing ${selected.join(", ")}...`, {
        entities: selected,
        timeoutMs:
          options.timeout !== undefined ? options.timeout * 60_000 : undefined,
      });
    });

  // sync status
  sync
    .command("status")
    .description("Show recent sync runs")
    .option("--entity <type>", "Only runs of this entity type", parseEntityType)
    .option("--limit <n>", "Number of runs to show", parsePositiveInt, 20)
    .action(async (options: { entity?: EntityType; limit?: number }) => {
      await showSyncStatus(options);
    });
}
