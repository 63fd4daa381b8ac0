/**
 * Prompt templates: per-version files, routing by portrait_id, placeholder fill.
 *
 * Layout: <promptDir>/<version>/reddit_prompt.txt and sharegpt_prompt.txt.
 */

import { readFile } from "fs/promises";
import { join } from "path";
import { PromptRoutingError, PromptTemplateError } from "../errors.js";
import type { Entry } from "../types.js";

export type TemplateFamily = "reddit" | "sharegpt";

export type PromptTemplates = Readonly<Record<TemplateFamily, string>>;

const TEMPLATE_FILES: Record<TemplateFamily, string> = {
  reddit: "reddit_prompt.txt",
  sharegpt: "sharegpt_prompt.txt",
};

export async function loadPromptTemplates(promptVersion: string, promptDir: string): Promise<PromptTemplates> {
  const versionDir = join(promptDir, promptVersion);
  try {
    const [reddit, sharegpt] = await Promise.all([
      readFile(join(versionDir, TEMPLATE_FILES.reddit), "utf-8"),
      readFile(join(versionDir, TEMPLATE_FILES.sharegpt), "utf-8"),
    ]);
    return { reddit, sharegpt };
  } catch (e) {
    throw new PromptTemplateError(promptVersion, e instanceof Error ? e.message : String(e), e);
  }
}

/** Leading digit 1–2 → reddit, 3–4 → sharegpt; anything else is a routing error. */
export function resolveTemplateFamily(portraitId: number): TemplateFamily {
  const digit = String(Math.abs(portraitId))[0];
  switch (digit) {
    case "1":
    case "2":
      return "reddit";
    case "3":
    case "4":
      return "sharegpt";
    default:
      throw new PromptRoutingError(portraitId, digit);
  }
}

export function getPromptTemplate(
  portraitId: number,
  templates: PromptTemplates
): { template: string; family: TemplateFamily } {
  const family = resolveTemplateFamily(portraitId);
  return { template: templates[family], family };
}

/**
 * Fills {title} (reddit only), then {text}, then {content}.
 * Replacer functions keep "$" sequences in the inserted text literal.
 */
export function createPrompt(
  template: string,
  family: TemplateFamily,
  entry: Pick<Entry, "content">,
  outputContent: string
): string {
  let prompt = template;
  if (family === "reddit") {
    prompt = prompt.replaceAll("{title}", () => entry.content.title ?? "");
  }
  prompt = prompt.replaceAll("{text}", () => entry.content.text);
  prompt = prompt.replaceAll("{content}", () => outputContent);
  return prompt;
}
