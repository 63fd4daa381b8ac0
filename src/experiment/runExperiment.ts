/**
 * Experiment runner: provider → model → prompt version, one dispatcher run each.
 *
 * A provider without <PROVIDER>_API_KEY is skipped. A combination that fails
 * (templates missing, save error, anything else) is logged and the run moves on.
 */

import { join } from "path";
import { getProviderCredential } from "../config.js";
import type { RunSettings } from "../config.js";
import type { ProviderClientFactory } from "../clients/types.js";
import { runCombination } from "../dispatch/runCombination.js";
import type { CombinationProgress } from "../dispatch/runCombination.js";
import { resultsFileName, saveResults } from "../dispatch/resultRecords.js";
import { appendJsonl } from "../logger.js";
import type { RunLogger } from "../logger.js";
import { loadPromptTemplates } from "../prompts/promptTemplates.js";
import type { PromptTemplates } from "../prompts/promptTemplates.js";
import type { RetryHandlerDeps } from "../retry/retryHandler.js";
import type { Combination, Entry, ExperimentConfig } from "../types.js";

export type CombinationStatus = "ok" | "skipped_no_credential" | "template_error" | "failed";

export interface CombinationOutcome extends Partial<Combination> {
  provider: string;
  status: CombinationStatus;
  processed?: number;
  errors?: number;
  outputPath?: string;
  error?: string;
}

export interface ExperimentSummary {
  experiment: string;
  outputDir: string;
  outcomes: CombinationOutcome[];
}

export interface RunExperimentInput {
  experiment: ExperimentConfig;
  /** Loaded once per process; shared read-only across experiments */
  entries: readonly Entry[];
  baseOutputDir: string;
  promptDir: string;
  settings: RunSettings;
  createClient: ProviderClientFactory;
  logger: RunLogger;
  env?: Record<string, string | undefined>;
  now?: () => Date;
  workers?: number;
  retryDeps?: Omit<RetryHandlerDeps, "logger">;
  onProgress?: (combination: Combination, progress: CombinationProgress) => void;
  signal?: AbortSignal;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** YYYYMMDD_HHMMSS in local time */
export function formatRunTimestamp(d: Date): string {
  return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
}

async function runOneCombination(
  args: RunExperimentInput,
  combination: Combination,
  apiKey: string,
  providerOutputDir: string
): Promise<CombinationOutcome> {
  const { entries, settings, logger } = args;
  const { provider, model, promptVersion } = combination;
  const label = `${provider}-${model}-${promptVersion}`;
  logger.info(`Running combination: provider=${provider}, model=${model}, prompt=${promptVersion}`);

  let templates: PromptTemplates;
  try {
    templates = await loadPromptTemplates(promptVersion, args.promptDir);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    logger.error(`Error loading prompt templates for version ${promptVersion}: ${message}`);
    return { ...combination, status: "template_error", error: message };
  }

  try {
    const result = await runCombination({
      ...combination,
      entries,
      apiKey,
      templates,
      request: settings.request,
      retry: settings.retry,
      createClient: args.createClient,
      retryDeps: args.retryDeps,
      workers: args.workers,
      workerFraction: settings.workerFraction,
      logger: logger.child(label),
      onProgress: args.onProgress ? (p) => args.onProgress?.(combination, p) : undefined,
      signal: args.signal,
    });

    const outputPath = join(providerOutputDir, resultsFileName(model, promptVersion));
    await saveResults(result.records, outputPath);

    logger.info(`--- Run Summary for ${label} ---`, {
      total: result.processed + result.errors,
      successful: result.processed,
      errors: result.errors,
      outputPath,
    });
    return { ...combination, status: "ok", processed: result.processed, errors: result.errors, outputPath };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    logger.error(`Error in combination ${label}: ${message}`);
    return { ...combination, status: "failed", error: message };
  }
}

export async function runExperiment(input: RunExperimentInput): Promise<ExperimentSummary> {
  const { experiment, logger } = input;
  const now = input.now ?? (() => new Date());
  const env = input.env ?? process.env;
  const expOutputDir = join(input.baseOutputDir, experiment.name, formatRunTimestamp(now()));
  const runsLogPath = join(expOutputDir, "runs.jsonl");
  const outcomes: CombinationOutcome[] = [];

  logger.info(`=== Starting Experiment: ${experiment.name} ===`);
  if (experiment.description) logger.info(`Description: ${experiment.description}`);

  for (const [provider, providerConfig] of Object.entries(experiment.providers)) {
    if (input.signal?.aborted) break;
    const apiKey = getProviderCredential(provider, env);
    if (!apiKey) {
      logger.error(`Missing API key for provider ${provider}, skipping...`);
      outcomes.push({ provider, status: "skipped_no_credential" });
      continue;
    }
    const providerOutputDir = join(expOutputDir, provider);

    for (const model of providerConfig.models) {
      if (input.signal?.aborted) break;
      for (const promptVersion of experiment.prompts) {
        if (input.signal?.aborted) break;
        const combination: Combination = { provider, model, promptVersion };
        const outcome = await runOneCombination(input, combination, apiKey, providerOutputDir);
        outcomes.push(outcome);
        await appendJsonl(runsLogPath, {
          ts: now().toISOString(),
          experiment: experiment.name,
          ...outcome,
        }).catch((err) => logger.warn(`Could not append run summary: ${err instanceof Error ? err.message : String(err)}`));
      }
    }
    if (input.signal?.aborted) {
      logger.warn(`Interrupted during provider ${provider}; remaining combinations skipped`);
      break;
    }
    logger.info(`=== Completed Provider: ${provider} ===`);
  }

  logger.info(`=== Completed Experiment: ${experiment.name} ===`);
  return { experiment: experiment.name, outputDir: expOutputDir, outcomes };
}
