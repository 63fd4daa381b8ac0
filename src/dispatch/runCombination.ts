/**
 * Batch dispatcher for one (provider, model, prompt version) combination.
 *
 * Entries are split into contiguous batches, finer than one per worker so a
 * slow batch does not hold the run. A bounded pool runs the batches; each
 * returns a BatchSummary and the dispatcher folds summaries one at a time.
 * The fold is the only place counters and progress change.
 */

import { availableParallelism } from "os";
import pLimit from "p-limit";
import type { RunLogger } from "../logger.js";
import type { Combination, Entry, ResultRecord } from "../types.js";
import { processBatch } from "./processBatch.js";
import type { BatchContext, BatchSummary } from "./processBatch.js";

/** Batches per worker */
const OVERSUBSCRIPTION = 4;
export const DEFAULT_WORKER_FRACTION = 0.75;

export interface CombinationProgress {
  /** Outputs finished so far (success or failure); never decreases */
  completed: number;
  total: number;
  succeeded: number;
  failed: number;
}

export interface RunCombinationInput extends Omit<BatchContext, "provider" | "model">, Combination {
  entries: readonly Entry[];
  /** Explicit worker count; otherwise workerFraction × available parallelism */
  workers?: number;
  workerFraction?: number;
  logger: RunLogger;
  onProgress?: (progress: CombinationProgress) => void;
  /** Once aborted, batches that have not started are skipped; running ones finish */
  signal?: AbortSignal;
}

export interface CombinationResult {
  records: ResultRecord[];
  /** Successful outputs */
  processed: number;
  errors: number;
  batches: number;
  skippedBatches: number;
  workers: number;
}

export function resolveWorkerCount(
  fraction: number = DEFAULT_WORKER_FRACTION,
  parallelism: number = availableParallelism()
): number {
  return Math.max(1, Math.floor(parallelism * fraction));
}

export function computeBatchSize(entryCount: number, workers: number): number {
  return Math.max(1, Math.floor(entryCount / (workers * OVERSUBSCRIPTION)));
}

export function partitionEntries<T>(items: readonly T[], batchSize: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

export async function runCombination(input: RunCombinationInput): Promise<CombinationResult> {
  const { entries, logger, onProgress, signal } = input;
  const total = entries.reduce((sum, e) => sum + e.outputs.length, 0);

  const requested = input.workers ?? resolveWorkerCount(input.workerFraction);
  const sizingWorkers = Math.max(1, Math.min(requested, entries.length));
  const batches = partitionEntries(entries, computeBatchSize(entries.length, sizingWorkers));
  const workers = Math.max(1, Math.min(requested, batches.length));

  logger.info(`Processing ${batches.length} batches with ${workers} workers`, {
    provider: input.provider,
    model: input.model,
    promptVersion: input.promptVersion,
    outputs: total,
  });

  const ctx: BatchContext = {
    provider: input.provider,
    model: input.model,
    apiKey: input.apiKey,
    templates: input.templates,
    request: input.request,
    retry: input.retry,
    createClient: input.createClient,
    retryDeps: input.retryDeps,
  };

  const records: ResultRecord[] = [];
  let processed = 0;
  let errors = 0;
  let skippedBatches = 0;

  function fold(summary: BatchSummary): void {
    records.push(...summary.records);
    processed += summary.succeeded;
    errors += summary.failed;
    onProgress?.({ completed: processed + errors, total, succeeded: processed, failed: errors });
  }

  const limit = pLimit(workers);
  const tasks = batches.map((batch, index) =>
    limit(async (): Promise<BatchSummary | null> => {
      if (signal?.aborted) return null;
      return processBatch(batch, index, ctx, logger.child(`batch-${index}`));
    }).then((summary) => {
      if (summary) fold(summary);
      else skippedBatches++;
    })
  );
  await Promise.all(tasks);

  if (skippedBatches > 0) {
    logger.warn(`Stopped early: ${skippedBatches} of ${batches.length} batches were not started`);
  }
  return { records, processed, errors, batches: batches.length, skippedBatches, workers };
}
