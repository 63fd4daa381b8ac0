/**
 * Worker side of the dispatcher: rates every output of every entry in one batch.
 * Each batch builds its own provider client and retry handler; nothing is shared
 * with other batches. Failures are scoped to one output and become failure records.
 */

import type { CanonicalRequest, ProviderClient, ProviderClientFactory } from "../clients/types.js";
import type { RequestDefaults } from "../config.js";
import type { RunLogger } from "../logger.js";
import { mapResponseToNumeric, parseLikertResponse } from "../parsing/responseParser.js";
import { createPrompt, getPromptTemplate } from "../prompts/promptTemplates.js";
import type { PromptTemplates, TemplateFamily } from "../prompts/promptTemplates.js";
import { RetryHandler } from "../retry/retryHandler.js";
import type { RetryHandlerDeps, RetryOptions } from "../retry/retryHandler.js";
import type { Entry, ResultRecord } from "../types.js";
import { isFailureRecord } from "../types.js";
import { buildFailureRecord, buildSuccessRecord } from "./resultRecords.js";

export interface BatchContext {
  provider: string;
  model: string;
  /** Passed by value; never mutated */
  apiKey: string;
  templates: PromptTemplates;
  request: RequestDefaults;
  retry: RetryOptions;
  createClient: ProviderClientFactory;
  /** Backoff sleep and jitter source; real timers when omitted */
  retryDeps?: Omit<RetryHandlerDeps, "logger">;
}

/** What a worker hands back to the dispatcher for one batch */
export interface BatchSummary {
  batchIndex: number;
  records: ResultRecord[];
  succeeded: number;
  failed: number;
}

export function buildRequest(prompt: string, model: string, defaults: RequestDefaults): CanonicalRequest {
  return {
    messages: [{ role: "user", content: prompt }],
    model,
    temperature: defaults.temperature,
    maxTokens: defaults.maxTokens,
    seed: defaults.seed,
  };
}

function failAllOutputs(entry: Entry, error: unknown): ResultRecord[] {
  return entry.outputs.map((output) => buildFailureRecord(entry, output, error, null));
}

export async function processEntry(
  client: ProviderClient,
  entry: Entry,
  ctx: BatchContext,
  retryHandler: RetryHandler,
  logger: RunLogger
): Promise<ResultRecord[]> {
  const portraitId = entry.portrait_id;
  logger.debug(`Processing portrait_id: ${portraitId}`);

  let template: string;
  let family: TemplateFamily;
  try {
    ({ template, family } = getPromptTemplate(portraitId, ctx.templates));
  } catch (e) {
    logger.error(`Error with portrait_id ${portraitId}: ${e instanceof Error ? e.message : String(e)}`);
    return failAllOutputs(entry, e);
  }

  const results: ResultRecord[] = [];
  for (const output of entry.outputs) {
    let prompt: string | null = null;
    try {
      prompt = createPrompt(template, family, entry, output.content);
      const request = buildRequest(prompt, ctx.model, ctx.request);
      const response = await retryHandler.execute(() => client.invoke(request));
      logger.debug(`API response received for portrait_id ${portraitId}, output_id ${output.id}`, {
        usage: response.usage,
      });

      const parsed = parseLikertResponse(response.content);
      const numeric = mapResponseToNumeric(parsed);
      logger.debug(`Parsed response: ${parsed} (${numeric})`, { raw: response.content });

      results.push(buildSuccessRecord({ entry, output, prompt, response, parsed, numeric }));
    } catch (e) {
      logger.error(`Error processing output ${output.id}: ${e instanceof Error ? e.message : String(e)}`);
      results.push(buildFailureRecord(entry, output, e, prompt));
    }
  }
  return results;
}

export async function processBatch(
  batch: readonly Entry[],
  batchIndex: number,
  ctx: BatchContext,
  logger: RunLogger
): Promise<BatchSummary> {
  const records: ResultRecord[] = [];

  let client: ProviderClient | null = null;
  try {
    client = ctx.createClient(ctx.provider, ctx.apiKey, logger);
  } catch (e) {
    logger.error(`Could not create ${ctx.provider} client: ${e instanceof Error ? e.message : String(e)}`);
    for (const entry of batch) records.push(...failAllOutputs(entry, e));
  }

  if (client) {
    const retryHandler = new RetryHandler(ctx.retry, { ...ctx.retryDeps, logger });
    for (const entry of batch) {
      try {
        records.push(...(await processEntry(client, entry, ctx, retryHandler, logger)));
      } catch (e) {
        logger.error(`Error processing entry ${entry.portrait_id}: ${e instanceof Error ? e.message : String(e)}`);
        records.push(...failAllOutputs(entry, e));
      }
    }
  }

  const failed = records.filter(isFailureRecord).length;
  return { batchIndex, records, succeeded: records.length - failed, failed };
}
