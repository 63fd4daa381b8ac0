/**
 * Rating pipeline types.
 * Defines dataset entries, experiment configuration and persisted result records.
 */

/**
 * (dimension-name, signed coefficient) pairs supplied upstream.
 * Accepted as tuples or as a name → coefficient mapping; forwarded as-is.
 */
export type Correlations = Array<[string, number]> | Record<string, number>;

/** One candidate answer to rate */
export interface Output {
  id: string | number;
  content: string;
  correlations?: Correlations;
  bfi_correlations?: Correlations;
  higher_pvq_correlations?: Correlations;
}

export interface EntryContent {
  text: string;
  title?: string;
}

/** One evaluation unit; leading digit of portrait_id selects the template family */
export interface Entry {
  portrait_id: number;
  content: EntryContent;
  outputs: Output[];
}

export interface ProviderModels {
  models: string[];
}

/** Immutable for the duration of a run */
export interface ExperimentConfig {
  readonly name: string;
  readonly providers: Readonly<Record<string, ProviderModels>>;
  readonly prompts: readonly string[];
  readonly description: string;
}

export interface ContentSnapshot {
  title: string;
  text: string;
  output_text: string;
}

export interface SuccessRecord {
  portrait_id: number;
  option_id: string | number;
  raw_response: string;
  parsed_response: string;
  numeric_response: number;
  content: ContentSnapshot;
  prompt: string;
  reasoning: string;
  correlations?: Correlations;
  bfi_correlations?: Correlations;
  higher_pvq_correlations?: Correlations;
}

export interface FailureRecord {
  portrait_id: number;
  option_id: string | number;
  error: string;
  content: ContentSnapshot;
  /** null when the failure happened before a prompt was built */
  prompt: string | null;
}

export type ResultRecord = Readonly<SuccessRecord> | Readonly<FailureRecord>;

export function isFailureRecord(record: ResultRecord): record is Readonly<FailureRecord> {
  return "error" in record;
}

/** Identifies one dispatcher run */
export interface Combination {
  provider: string;
  model: string;
  promptVersion: string;
}
