import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { ProviderClient, ProviderClientFactory } from "../../clients/types.js";
import { loadRunSettings } from "../../config.js";
import type { Entry, ExperimentConfig } from "../../types.js";
import { createTestLogger } from "../../__tests__/testLogger.js";
import { formatRunTimestamp, runExperiment } from "../runExperiment.js";

const entries: Entry[] = [
  { portrait_id: 1001, content: { title: "T", text: "post" }, outputs: [{ id: "a", content: "reply a" }] },
  { portrait_id: 3001, content: { text: "request" }, outputs: [{ id: "b", content: "reply b" }] },
];

const experiment: ExperimentConfig = {
  name: "baseline",
  description: "",
  providers: {
    openai: { models: ["gpt-4o-mini"] },
    anthropic: { models: ["claude-3-5-haiku-20241022"] },
  },
  prompts: ["v1", "v9"],
};

describe("formatRunTimestamp", () => {
  it("formats local time as YYYYMMDD_HHMMSS", () => {
    expect(formatRunTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe("20260102_030405");
  });
});

describe("runExperiment", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "experiment-"));
    await mkdir(join(dir, "prompts", "v1"), { recursive: true });
    await writeFile(join(dir, "prompts", "v1", "reddit_prompt.txt"), "{title}: {text} -> {content}");
    await writeFile(join(dir, "prompts", "v1", "sharegpt_prompt.txt"), "{text} -> {content}");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs each credentialed combination and writes its results", async () => {
    const invoke = vi.fn(async () => ({ content: "Like me", model: "gpt-4o-mini" }));
    const createClient = vi.fn<ProviderClientFactory>((): ProviderClient => ({ provider: "openai", invoke }));
    const baseOutputDir = join(dir, "outputs");
    const runDir = join(baseOutputDir, "baseline", "20260102_030405");

    const summary = await runExperiment({
      experiment,
      entries,
      baseOutputDir,
      promptDir: join(dir, "prompts"),
      settings: loadRunSettings({}),
      createClient,
      logger: createTestLogger(),
      env: { OPENAI_API_KEY: " test-secret " },
      now: () => new Date(2026, 0, 2, 3, 4, 5),
      workers: 1,
    });

    const resultsPath = join(runDir, "openai", "gpt-4o-mini_v1_results.json");
    expect(summary.outputDir).toBe(runDir);
    expect(summary.outcomes).toEqual([
      {
        provider: "openai",
        model: "gpt-4o-mini",
        promptVersion: "v1",
        status: "ok",
        processed: 2,
        errors: 0,
        outputPath: resultsPath,
      },
      {
        provider: "openai",
        model: "gpt-4o-mini",
        promptVersion: "v9",
        status: "template_error",
        error: expect.stringMatching(/^Prompt templates for v9: /),
      },
      { provider: "anthropic", status: "skipped_no_credential" },
    ]);
    expect(createClient).toHaveBeenCalledWith("openai", "test-secret", expect.anything());

    const records = JSON.parse(await readFile(resultsPath, "utf-8"));
    expect(records.map((r: { prompt: string; numeric_response: number }) => [r.prompt, r.numeric_response])).toEqual([
      ["T: post -> reply a", 5],
      ["request -> reply b", 5],
    ]);

    const runLines = (await readFile(join(runDir, "runs.jsonl"), "utf-8")).trim().split("\n");
    expect(runLines.map((line) => JSON.parse(line).status)).toEqual(["ok", "template_error"]);
  });

  it("stops at the next combination once the signal is aborted", async () => {
    const controller = new AbortController();
    const invoke = vi.fn(async () => {
      controller.abort();
      return { content: "Like me", model: "gpt-4o-mini" };
    });
    const createClient = vi.fn<ProviderClientFactory>((): ProviderClient => ({ provider: "openai", invoke }));
    const logger = createTestLogger();
    const baseOutputDir = join(dir, "outputs");

    const summary = await runExperiment({
      experiment: {
        name: "interrupted",
        description: "",
        providers: {
          openai: { models: ["gpt-4o-mini", "gpt-4o"] },
          anthropic: { models: ["claude-3-5-haiku-20241022"] },
        },
        prompts: ["v1"],
      },
      entries,
      baseOutputDir,
      promptDir: join(dir, "prompts"),
      settings: loadRunSettings({}),
      createClient,
      logger,
      env: { OPENAI_API_KEY: "test-secret", ANTHROPIC_API_KEY: "test-secret" },
      now: () => new Date(2026, 0, 2, 3, 4, 5),
      workers: 1,
      signal: controller.signal,
    });

    expect(summary.outcomes).toEqual([
      {
        provider: "openai",
        model: "gpt-4o-mini",
        promptVersion: "v1",
        status: "ok",
        processed: 1,
        errors: 0,
        outputPath: join(baseOutputDir, "interrupted", "20260102_030405", "openai", "gpt-4o-mini_v1_results.json"),
      },
    ]);
    expect(invoke).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("Interrupted during provider openai; remaining combinations skipped");
    expect(logger.info).not.toHaveBeenCalledWith("=== Completed Provider: openai ===");
  });
});
