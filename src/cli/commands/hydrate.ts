import { InvalidArgumentError } from "commander";
import ora from "ora";

import { loadConfig, requireSetting } from "../../config.js";
import { db, closeConnection } from "../../db/connection.js";
import { errorMessage } from "../../errors.js";
import { OpenAIEmbedder } from "../../services/hydrate/embeddings.js";
import { EmbeddingHydrator } from "../../services/hydrate/hydrator.js";
import { PgVectorIndex } from "../../services/hydrate/vector-index.js";
import { displayHydrateResult } from "../utils/display.js";

import type { Command } from "commander";

function parseLimit(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

// ============================================================================
// Hydrate Command
// ============================================================================

export function registerHydrateCommand(program: Command): void {
  program
    .command("hydrate")
    .description("Embed bill summaries into the vector index")
    .option("--full", "Re-embed every bill with a summary")
    .option("--limit <n>", "Embed at most this many bills", parseLimit)
    .action(async (options: { full?: boolean; limit?: number }) => {
      const spinner = ora("Finding bills to embed...").start();
      const controller = new AbortController();
      const onInterrupt = (): void => {
        spinner.text = "Cancelling...";
        controller.abort();
      };
      process.once("SIGINT", onInterrupt);

      try {
        const config = loadConfig();
        const embedder = new OpenAIEmbedder(
          requireSetting(config.embeddings.apiKey, "OPENAI_API_KEY"),
          config.embeddings.model
        );
        const hydrator = new EmbeddingHydrator(
          db,
          config,
          embedder,
          new PgVectorIndex(db)
        );
        hydrator.setProgressCallback((progress) => {
          spinner.text = `Embedding ${String(progress.current)}/${String(progress.total)} (${progress.billNumber})`;
        });

        const result = await hydrator.hydrate({
          full: options.full,
          limit: options.limit,
          signal: controller.signal,
        });

        if (result.status === "success") {
          spinner.succeed(`Embedded ${String(result.embedded)} bills`);
        } else {
          spinner.fail(`Hydration ${result.status}`);
          process.exitCode = 1;
        }
        displayHydrateResult(result);
      } catch (error) {
        spinner.fail(`Failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        process.removeListener("SIGINT", onInterrupt);
        await closeConnection();
      }
    });
}
