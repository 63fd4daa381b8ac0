/**
 * Experiment file (YAML) and dataset (JSON) loading, validated with zod.
 * Any problem here is a ConfigError and aborts the run.
 */

import { readFile } from "fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import type { Entry, ExperimentConfig } from "../types.js";

const ProviderModelsSchema = z.object({
  models: z.array(z.string().min(1)).min(1),
});

export const ExperimentConfigSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  providers: z.record(z.string().min(1), ProviderModelsSchema),
  prompts: z.array(z.string().min(1)).min(1),
});

export const ExperimentsFileSchema = z.object({
  experiments: z.array(ExperimentConfigSchema).min(1),
});

const CorrelationsSchema = z.union([
  z.array(z.tuple([z.string(), z.number()])),
  z.record(z.string(), z.number()),
]);

export const OutputSchema = z.object({
  id: z.union([z.string(), z.number()]),
  content: z.string(),
  correlations: CorrelationsSchema.optional(),
  bfi_correlations: CorrelationsSchema.optional(),
  higher_pvq_correlations: CorrelationsSchema.optional(),
});

export const EntrySchema = z.object({
  portrait_id: z.number().int().positive(),
  content: z.object({
    text: z.string(),
    title: z.string().optional(),
  }),
  outputs: z.array(OutputSchema),
});

export const DatasetSchema = z.array(EntrySchema);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

async function readText(path: string, what: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (e) {
    throw new ConfigError(`Could not read ${what} ${path}: ${e instanceof Error ? e.message : String(e)}`, e);
  }
}

export function parseExperimentsFile(text: string, source = "experiments file"): ExperimentConfig[] {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (e) {
    throw new ConfigError(`Invalid YAML in ${source}: ${e instanceof Error ? e.message : String(e)}`, e);
  }
  const result = ExperimentsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid config ${source}: ${formatIssues(result.error)}`);
  }
  return result.data.experiments.map((exp) =>
    Object.freeze({
      name: exp.name,
      description: exp.description,
      providers: Object.freeze(exp.providers),
      prompts: Object.freeze(exp.prompts),
    })
  );
}

export async function loadExperimentsFile(path: string): Promise<ExperimentConfig[]> {
  return parseExperimentsFile(await readText(path, "experiments file"), path);
}

/** One experiment by name, or all of them when no name is given. */
export function selectExperiments(experiments: ExperimentConfig[], name?: string): ExperimentConfig[] {
  if (!name) return experiments;
  const found = experiments.find((e) => e.name === name);
  if (!found) {
    throw new ConfigError(`No experiment found with name: ${name}`);
  }
  return [found];
}

export function parseDataset(raw: unknown, source = "dataset"): Entry[] {
  const result = DatasetSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid dataset ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export async function loadDataset(path: string): Promise<Entry[]> {
  const text = await readText(path, "dataset");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Invalid JSON in dataset ${path}: ${e instanceof Error ? e.message : String(e)}`, e);
  }
  return parseDataset(raw, path);
}
