/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { TableStat } from "../../db/migrate.js";
import type { SyncRunStatus, SyncWatermark } from "../../db/types.js";
import type { HydrateResult } from "../../services/hydrate/hydrator.js";
import type { JobResult } from "../../services/sync/job.js";
import type { SyncSummary } from "../../services/sync/orchestrator.js";

function colorStatus(status: SyncRunStatus): string {
  switch (status) {
    case "success":
      return chalk.green(status);
    case "error":
      return chalk.red(status);
    case "cancelled":
      return chalk.yellow(status);
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${String(ms)}ms`;
  }
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) {
    return `${String(seconds)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${String(minutes)}m ${String(seconds % 60)}s`;
}

function formatSkips(result: JobResult): string {
  const entries = Object.entries(result.skips);
  if (entries.length === 0) {
    return chalk.dim("-");
  }
  return entries
    .map(([reason, count]) => `${reason}: ${String(count)}`)
    .join("\n");
}

/**
 * Per-job outcome of a sync run
 */
export function displaySyncSummary(summary: SyncSummary): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Entity"),
      chalk.cyan("Status"),
      chalk.cyan("Inserted"),
      chalk.cyan("Updated"),
      chalk.cyan("Ignored"),
      chalk.cyan("Skipped"),
      chalk.cyan("Duration"),
    ],
    wordWrap: true,
  });

  for (const result of summary.results) {
    table.push([
      result.entityType,
      colorStatus(result.status),
      String(result.merged.inserted),
      String(result.merged.updated),
      String(result.merged.ignored),
      formatSkips(result),
      formatDuration(result.durationMs),
    ]);
  }

  console.log(table.toString());

  for (const result of summary.results) {
    if (result.error !== null) {
      console.log(chalk.red(`  ${result.entityType}: ${result.error}`));
    }
  }

  const verdict = summary.ok
    ? chalk.green("All jobs succeeded")
    : chalk.red("Some jobs did not succeed");
  console.log(`\n${verdict} in ${formatDuration(summary.durationMs)}`);
}

/**
 * Sync log rows, newest first
 */
export function displaySyncHistory(rows: SyncWatermark[]): void {
  if (rows.length === 0) {
    console.log(chalk.yellow("No sync runs recorded"));
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("Entity"),
      chalk.cyan("Status"),
      chalk.cyan("Synced Through"),
      chalk.cyan("Records"),
      chalk.cyan("Finished"),
      chalk.cyan("Notes"),
    ],
    colWidths: [12, 11, 22, 9, 22, 40],
    wordWrap: true,
  });

  for (const row of rows) {
    table.push([
      row.entity_type,
      colorStatus(row.status),
      row.synced_through.slice(0, 19).replace("T", " "),
      String(row.records_affected),
      row.finished_at.slice(0, 19).replace("T", " "),
      row.notes ?? "",
    ]);
  }

  console.log(table.toString());
}

export function displayHydrateResult(result: HydrateResult): void {
  const table = new CliTable3({
    head: [chalk.cyan("Metric"), chalk.cyan("Value")],
  });

  table.push(
    ["Status", colorStatus(result.status)],
    ["Candidates", String(result.candidates)],
    ["Embedded", String(result.embedded)],
    ["Skipped", String(result.skipped)]
  );
  for (const [tier, count] of Object.entries(result.tierHits)) {
    table.push([`Tier ${tier} chars`, String(count)]);
  }

  console.log(table.toString());
  if (result.error !== null) {
    console.log(chalk.red(`Error: ${result.error}`));
  }
}

/**
 * Row counts per store table, with the last successful run of the entity
 * type that writes it where there is one.
 */
export function displayStoreStats(
  stats: readonly TableStat[],
  lastSuccess: ReadonlyMap<string, SyncWatermark>
): void {
  const table = new CliTable3({
    head: [chalk.cyan("Table"), chalk.cyan("Rows"), chalk.cyan("Last Sync")],
  });

  for (const stat of stats) {
    const run = lastSuccess.get(stat.table);
    table.push([
      stat.table,
      stat.rows.toLocaleString(),
      run !== undefined
        ? run.finished_at.slice(0, 19).replace("T", " ")
        : chalk.dim("-"),
    ]);
  }

  console.log(table.toString());
}
