/**
 * Result record builders and the per-combination result artifact.
 * Key insertion order is fixed here; JSON.stringify keeps it and non-ASCII text.
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type { ApiResponse } from "../clients/types.js";
import type { LikertCategory } from "../parsing/responseParser.js";
import type { ContentSnapshot, Entry, FailureRecord, Output, ResultRecord, SuccessRecord } from "../types.js";

export function contentSnapshot(entry: Entry, output: Pick<Output, "content">): ContentSnapshot {
  return {
    title: entry.content.title ?? "",
    text: entry.content.text,
    output_text: output.content,
  };
}

export interface SuccessRecordArgs {
  entry: Entry;
  output: Output;
  prompt: string;
  response: ApiResponse;
  parsed: LikertCategory;
  numeric: number;
}

export function buildSuccessRecord(args: SuccessRecordArgs): ResultRecord {
  const { entry, output, prompt, response, parsed, numeric } = args;
  const record: SuccessRecord = {
    portrait_id: entry.portrait_id,
    option_id: output.id,
    raw_response: response.content,
    parsed_response: parsed,
    numeric_response: numeric,
    content: contentSnapshot(entry, output),
    prompt,
    reasoning: response.reasoning ?? "",
  };
  if (output.correlations !== undefined) record.correlations = output.correlations;
  if (output.bfi_correlations !== undefined) record.bfi_correlations = output.bfi_correlations;
  if (output.higher_pvq_correlations !== undefined) record.higher_pvq_correlations = output.higher_pvq_correlations;
  return Object.freeze(record);
}

export function buildFailureRecord(entry: Entry, output: Output, error: unknown, prompt: string | null): ResultRecord {
  const record: FailureRecord = {
    portrait_id: entry.portrait_id,
    option_id: output.id,
    error: error instanceof Error ? error.message : String(error),
    content: contentSnapshot(entry, output),
    prompt,
  };
  return Object.freeze(record);
}

/** <model basename>_<prompt version>_results.json; "meta-llama/llama-3" → "llama-3" */
export function resultsFileName(model: string, promptVersion: string): string {
  const modelName = model.split("/").pop() || model;
  return `${modelName}_${promptVersion}_results.json`;
}

export async function saveResults(records: readonly ResultRecord[], filePath: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(records, null, 2), "utf-8");
}
