#!/usr/bin/env node
/**
 * Run rating experiments from the experiments file against the dataset.
 * Writes one results JSON per (provider, model, prompt version) under OUTPUT_DIR.
 *
 * Usage: npx tsx scripts/runExperiments.ts [experimentName]
 *
 * Paths (env): CONFIG_PATH, INPUT_PATH, PROMPT_DIR, OUTPUT_DIR, LOG_DIR.
 * Credentials (env or .env): OPENAI_API_KEY, ANTHROPIC_API_KEY, GEMINI_API_KEY, OPENROUTER_API_KEY.
 */

import "dotenv/config";
import { join } from "path";
import { providerClientFactory } from "../src/clients/index.js";
import { loadRunSettings } from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { loadDataset, loadExperimentsFile, selectExperiments } from "../src/experiment/experimentConfig.js";
import { formatRunTimestamp, runExperiment } from "../src/experiment/runExperiment.js";
import { createRunLogger } from "../src/logger.js";

const CONFIG_PATH = process.env.CONFIG_PATH ?? "config/experiments.yaml";
const INPUT_PATH = process.env.INPUT_PATH ?? "data/entries.json";
const PROMPT_DIR = process.env.PROMPT_DIR ?? "prompts";
const OUTPUT_DIR = process.env.OUTPUT_DIR ?? "outputs";
const LOG_DIR = process.env.LOG_DIR ?? "logs";

async function main(): Promise<void> {
  const experimentName = process.argv[2];
  const logger = createRunLogger({
    scope: "runExperiments",
    jsonlPath: join(LOG_DIR, `${experimentName ? `${experimentName}_` : ""}processing_${formatRunTimestamp(new Date())}.jsonl`),
  });
  logger.info("=== Starting Processing ===");

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted: letting in-flight batches finish, no new batches will start");
    controller.abort();
  });

  try {
    const settings = loadRunSettings();
    const experiments = selectExperiments(await loadExperimentsFile(CONFIG_PATH), experimentName);
    const entries = await loadDataset(INPUT_PATH);
    logger.info(`Loaded ${entries.length} entries from ${INPUT_PATH}`);

    const createClient = providerClientFactory(settings.openRouter);

    for (const experiment of experiments) {
      if (controller.signal.aborted) break;
      const summary = await runExperiment({
        experiment,
        entries,
        baseOutputDir: OUTPUT_DIR,
        promptDir: PROMPT_DIR,
        settings,
        createClient,
        logger: logger.child(experiment.name),
        signal: controller.signal,
        onProgress: (_combination, progress) => {
          process.stdout.write(progress.completed === progress.total ? ` ${progress.completed}/${progress.total}\n` : ".");
        },
      });
      const ok = summary.outcomes.filter((o) => o.status === "ok").length;
      console.log(`${summary.experiment}: ${ok}/${summary.outcomes.length} combinations ok → ${summary.outputDir}`);
    }

    logger.info("=== All Experiments Completed ===");
  } finally {
    await logger.flush();
  }
}

main().catch((e) => {
  if (e instanceof ConfigError) {
    console.error(`Configuration error: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
