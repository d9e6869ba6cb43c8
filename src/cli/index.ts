#!/usr/bin/env node

/**
 * Legislative sync CLI
 *
 * Keeps a local copy of bills, sponsors, votes, committees and donations
 * current, and embeds bill summaries for semantic search.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerHydrateCommand } from "./commands/hydrate.js";
import { registerSyncCommand, showSyncStatus } from "./commands/sync.js";

const program = new Command();

program
  .name("legis-sync")
  .description("Incremental sync engine for legislative data")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerSyncCommand(program);
registerHydrateCommand(program);

// Top-level alias for 'sync status'
program
  .command("status")
  .description("Show recent sync runs (alias for 'sync status')")
  .action(async () => {
    await showSyncStatus({});
  });

program.action(() => {
  program.outputHelp();
});

await program.parseAsync();
