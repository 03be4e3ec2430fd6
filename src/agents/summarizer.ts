import Anthropic from "@anthropic-ai/sdk";
import type { Logger } from "../logger.js";
import type { ParleyConfig } from "../config.js";
import { placeholderSummary, toolSummaryPrompt } from "./prompts.js";
import type { ToolSummarizer } from "./types.js";

export const SUMMARY_MAX_TOKENS = 50;

/** One prompt in, the model's text out. */
export type CompletionFn = (prompt: string) => Promise<string>;

/** Asks a small model for a one-line description of a tool call. */
export class AnthropicToolSummarizer implements ToolSummarizer {
  private readonly logger: Logger;

  constructor(
    private readonly complete: CompletionFn,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "tool-summarizer" });
  }

  async summarize(name: string, input: Record<string, unknown>): Promise<string> {
    try {
      const summary = (await this.complete(toolSummaryPrompt(name, input))).trim();
      return summary || placeholderSummary(name);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ tool: name, error: message }, "Summary request failed, using placeholder");
      return placeholderSummary(name);
    }
  }
}

export class PlaceholderToolSummarizer implements ToolSummarizer {
  async summarize(name: string): Promise<string> {
    return placeholderSummary(name);
  }
}

export function anthropicCompletion(apiKey: string, model: string): CompletionFn {
  const client = new Anthropic({ apiKey });

  return async (prompt) => {
    const response = await client.messages.create({
      model,
      max_tokens: SUMMARY_MAX_TOKENS,
      messages: [{ role: "user", content: prompt }],
    });

    return response.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("");
  };
}

export function createToolSummarizer(
  config: Pick<ParleyConfig, "anthropicApiKey" | "summaryModel">,
  logger: Logger,
): ToolSummarizer {
  if (!config.anthropicApiKey) {
    logger.info("No Anthropic API key configured, tool summaries use placeholders");
    return new PlaceholderToolSummarizer();
  }
  return new AnthropicToolSummarizer(anthropicCompletion(config.anthropicApiKey, config.summaryModel), logger);
}
