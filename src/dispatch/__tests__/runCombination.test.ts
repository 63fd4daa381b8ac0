import { describe, it, expect, vi } from "vitest";
import { ProviderError } from "../../errors.js";
import type { ApiResponse, CanonicalRequest, ProviderClient, ProviderClientFactory } from "../../clients/types.js";
import type { RetryOptions } from "../../retry/retryHandler.js";
import { isFailureRecord } from "../../types.js";
import type { Entry, ResultRecord } from "../../types.js";
import { createTestLogger } from "../../__tests__/testLogger.js";
import { processBatch } from "../processBatch.js";
import type { BatchContext } from "../processBatch.js";
import { computeBatchSize, partitionEntries, resolveWorkerCount, runCombination } from "../runCombination.js";
import type { CombinationProgress } from "../runCombination.js";

const templates = { reddit: "{title}|{text}|{content}", sharegpt: "{text}|{content}" };
const request = { temperature: 0, maxTokens: 64, seed: 42 };
const retry: RetryOptions = { maxRetries: 2, baseDelayMs: 3000, maxDelayMs: 5000, exponentialBase: 2, jitter: false };
const retryDeps = { sleep: async (_ms: number) => {} };

function makeEntries(count: number, firstId = 1000): Entry[] {
  return Array.from({ length: count }, (_, i) => ({
    portrait_id: firstId + i,
    content: { text: `t${i}` },
    outputs: [{ id: i, content: `o${i}` }],
  }));
}

function stubFactory(answer: (req: CanonicalRequest) => Promise<ApiResponse>) {
  const invoke = vi.fn(answer);
  const createClient = vi.fn<ProviderClientFactory>(
    (): ProviderClient => ({ provider: "openrouter", invoke })
  );
  return { invoke, createClient };
}

function reply(content: string, model = "meta-llama/llama-3.1-8b-instruct"): ApiResponse {
  return { content, model };
}

function byOptionId(records: ResultRecord[]): ResultRecord[] {
  return [...records].sort((a, b) => Number(a.option_id) - Number(b.option_id));
}

describe("batch sizing", () => {
  it("oversubscribes four batches per worker", () => {
    expect(computeBatchSize(100, 5)).toBe(5);
    expect(computeBatchSize(10, 3)).toBe(1);
    expect(computeBatchSize(0, 4)).toBe(1);
  });

  it("partitions into contiguous batches with a short tail", () => {
    expect(partitionEntries([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(partitionEntries([], 3)).toEqual([]);
  });

  it("derives workers from the parallelism fraction, at least one", () => {
    expect(resolveWorkerCount(0.75, 8)).toBe(6);
    expect(resolveWorkerCount(0.75, 1)).toBe(1);
  });
});

describe("runCombination", () => {
  it("retries transient failures and rates every output", async () => {
    const attempts = new Map<string, number>();
    const { invoke, createClient } = stubFactory(async (req) => {
      const prompt = req.messages[0].content;
      const n = (attempts.get(prompt) ?? 0) + 1;
      attempts.set(prompt, n);
      if (n <= 2) {
        throw new ProviderError("Service unavailable", { provider: "openrouter", kind: "service_unavailable", status: 503 });
      }
      return reply("Somewhat like me");
    });
    const progress: CombinationProgress[] = [];

    const result = await runCombination({
      provider: "openrouter",
      model: "meta-llama/llama-3.1-8b-instruct",
      promptVersion: "v1",
      apiKey: "test-secret",
      entries: makeEntries(10),
      templates,
      request,
      retry,
      retryDeps,
      createClient,
      workers: 3,
      logger: createTestLogger(),
      onProgress: (p) => progress.push(p),
    });

    expect(result.processed).toBe(10);
    expect(result.errors).toBe(0);
    expect(result.batches).toBe(10);
    expect(result.workers).toBe(3);
    expect(result.skippedBatches).toBe(0);
    expect(result.records).toHaveLength(10);
    for (const record of result.records) {
      expect(isFailureRecord(record)).toBe(false);
      if (!isFailureRecord(record)) {
        expect(record.numeric_response).toBe(4);
        expect(record.parsed_response).toBe("somewhat like me");
      }
    }
    expect(invoke).toHaveBeenCalledTimes(30);
    expect([...attempts.values()]).toEqual(Array(10).fill(3));
    expect(createClient).toHaveBeenCalledTimes(10);
    expect(createClient.mock.calls[0].slice(0, 2)).toEqual(["openrouter", "test-secret"]);

    const completed = progress.map((p) => p.completed);
    expect(completed).toHaveLength(10);
    expect(completed.every((c, i) => i === 0 || c >= completed[i - 1])).toBe(true);
    expect(progress[progress.length - 1]).toEqual({ completed: 10, total: 10, succeeded: 10, failed: 0 });
  });

  it("records one entry's fatal failure while other batches succeed", async () => {
    const { createClient } = stubFactory(async (req) => {
      if (req.messages[0].content === "|t3|o3") {
        throw new ProviderError("Bad request", { provider: "openrouter", kind: "invalid_request", status: 400 });
      }
      return reply("Like me");
    });

    const result = await runCombination({
      provider: "openrouter",
      model: "meta-llama/llama-3.1-8b-instruct",
      promptVersion: "v1",
      apiKey: "test-secret",
      entries: makeEntries(6),
      templates,
      request,
      retry,
      retryDeps,
      createClient,
      workers: 2,
      logger: createTestLogger(),
    });

    expect(result.processed).toBe(5);
    expect(result.errors).toBe(1);
    const failed = byOptionId(result.records).filter(isFailureRecord);
    expect(failed).toEqual([
      {
        portrait_id: 1003,
        option_id: 3,
        error: "Bad request",
        content: { title: "", text: "t3", output_text: "o3" },
        prompt: "|t3|o3",
      },
    ]);
  });

  it("starts no batch once the signal is aborted", async () => {
    const { invoke, createClient } = stubFactory(async () => reply("Like me"));
    const logger = createTestLogger();
    const controller = new AbortController();
    controller.abort();

    const result = await runCombination({
      provider: "openrouter",
      model: "meta-llama/llama-3.1-8b-instruct",
      promptVersion: "v1",
      apiKey: "test-secret",
      entries: makeEntries(4),
      templates,
      request,
      retry,
      retryDeps,
      createClient,
      workers: 2,
      logger,
      signal: controller.signal,
    });

    expect(result.records).toEqual([]);
    expect(result.skippedBatches).toBe(4);
    expect(invoke).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith("Stopped early: 4 of 4 batches were not started");
  });

  it("returns an empty result for an empty dataset", async () => {
    const { createClient } = stubFactory(async () => reply("Like me"));
    const result = await runCombination({
      provider: "openai",
      model: "gpt-4o-mini",
      promptVersion: "v1",
      apiKey: "test-secret",
      entries: [],
      templates,
      request,
      retry,
      retryDeps,
      createClient,
      workers: 4,
      logger: createTestLogger(),
    });
    expect(result).toEqual({ records: [], processed: 0, errors: 0, batches: 0, skippedBatches: 0, workers: 1 });
  });
});

describe("processBatch", () => {
  function context(createClient: ProviderClientFactory): BatchContext {
    return {
      provider: "openai",
      model: "gpt-4o-mini",
      apiKey: "test-secret",
      templates,
      request,
      retry,
      retryDeps,
      createClient,
    };
  }

  it("turns a portrait_id routing error into failures with a null prompt", async () => {
    const { invoke, createClient } = stubFactory(async () => reply("Like me"));
    const entry: Entry = {
      portrait_id: 5001,
      content: { text: "t" },
      outputs: [
        { id: "x", content: "a" },
        { id: "y", content: "b" },
      ],
    };
    const summary = await processBatch([entry], 2, context(createClient), createTestLogger());
    expect(summary.batchIndex).toBe(2);
    expect(summary.succeeded).toBe(0);
    expect(summary.failed).toBe(2);
    expect(summary.records.map((r) => (isFailureRecord(r) ? [r.option_id, r.error, r.prompt] : null))).toEqual([
      ["x", "Unexpected portrait_id prefix: 5", null],
      ["y", "Unexpected portrait_id prefix: 5", null],
    ]);
    expect(invoke).not.toHaveBeenCalled();
  });

  it("isolates a fatal output from its siblings and from later entries", async () => {
    const { invoke, createClient } = stubFactory(async (req) => {
      if (req.messages[0].content === "|t|o2") {
        throw new ProviderError("Bad request", { provider: "openai", kind: "invalid_request", status: 400 });
      }
      return reply("Like me", "gpt-4o-mini");
    });
    const batch: Entry[] = [
      {
        portrait_id: 1000,
        content: { text: "t" },
        outputs: [
          { id: 1, content: "o1" },
          { id: 2, content: "o2" },
          { id: 3, content: "o3" },
        ],
      },
      { portrait_id: 3000, content: { text: "u" }, outputs: [{ id: 4, content: "o4" }] },
    ];

    const summary = await processBatch(batch, 0, context(createClient), createTestLogger());

    expect(invoke).toHaveBeenCalledTimes(4);
    expect(summary.succeeded).toBe(3);
    expect(summary.failed).toBe(1);
    expect(summary.records.map((r) => `${r.option_id}:${isFailureRecord(r) ? "fail" : "ok"}`)).toEqual([
      "1:ok",
      "2:fail",
      "3:ok",
      "4:ok",
    ]);
  });

  it("records an unparsable answer without retrying it", async () => {
    const { invoke, createClient } = stubFactory(async () => reply("banana"));
    const summary = await processBatch(makeEntries(1, 3000), 0, context(createClient), createTestLogger());
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(summary.records).toEqual([
      {
        portrait_id: 3000,
        option_id: 0,
        error: "Could not parse valid Likert response from: banana",
        content: { title: "", text: "t0", output_text: "o0" },
        prompt: "t0|o0",
      },
    ]);
  });

  it("builds a single user message with the request defaults", async () => {
    const { invoke, createClient } = stubFactory(async () => reply("Not like me at all", "gpt-4o-mini"));
    await processBatch(makeEntries(1, 2000), 0, context(createClient), createTestLogger());
    expect(invoke).toHaveBeenCalledWith({
      messages: [{ role: "user", content: "|t0|o0" }],
      model: "gpt-4o-mini",
      temperature: 0,
      maxTokens: 64,
      seed: 42,
    });
  });

  it("fails every output of the batch when the client cannot be created", async () => {
    const createClient = vi.fn<ProviderClientFactory>(() => {
      throw new Error("Unsupported provider: acme");
    });
    const summary = await processBatch(makeEntries(2), 0, context(createClient), createTestLogger());
    expect(summary.failed).toBe(2);
    expect(summary.records.every((r) => isFailureRecord(r) && r.error === "Unsupported provider: acme")).toBe(true);
  });
});
