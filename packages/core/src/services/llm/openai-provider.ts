/**
 * OpenAI Provider Implementation
 *
 * Implements LLMProvider on the OpenAI chat completions API. Every call
 * goes through withRetry; replies are returned as raw text and decoded by
 * the relevance gate.
 */

import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import type { LLMProvider, LinkCandidate } from "../../interfaces/llm-provider";
import type { Logger } from "../../logging/logger";
import { withRetry } from "../../utils/retry";
import type { LLMConfig, ModelStep } from "../research-engine/config";
import { createOpenAIClient } from "./client";
import {
  CLEANING_FOCUS_TEMPLATE,
  getAnswerSynthesisPrompts,
  getBatchLinkRelevancePrompts,
  getContentCleaningPrompts,
  getContentRelevancePrompts,
  getLinkRelevancePrompts,
  getQueryGenerationPrompts,
  getSummarizationPrompts,
  renderPrompt,
  type PromptConfig,
} from "./prompts";

/**
 * The slice of the OpenAI client this provider calls
 */
export interface ChatClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAIProviderOptions {
  models: LLMConfig["models"];
  logger: Logger;
  apiKey?: string;
  client?: ChatClient;
  maxRetries?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Strip quotes and markdown the model sometimes wraps a query in
 */
function cleanQuery(raw: string): string {
  return raw
    .trim()
    .replace(/^[`"'*]+|[`"'*]+$/g, "")
    .trim();
}

function describeCandidates(candidates: LinkCandidate[]): string {
  return candidates
    .map(
      (candidate, i) =>
        `Result ${i + 1}:\nTitle: ${candidate.title}\nDescription: ${candidate.description}\nURL: ${candidate.url}`
    )
    .join("\n\n");
}

/**
 * OpenAI implementation of LLMProvider
 */
export class OpenAIProvider implements LLMProvider {
  private readonly models: LLMConfig["models"];
  private readonly logger: Logger;
  private readonly client: ChatClient;
  private readonly maxRetries: number;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(options: OpenAIProviderOptions) {
    this.models = options.models;
    this.logger = options.logger;
    this.maxRetries = options.maxRetries ?? 3;
    this.sleep = options.sleep;
    if (options.client) {
      this.client = options.client;
    } else if (options.apiKey) {
      this.client = createOpenAIClient(options.apiKey);
    } else {
      throw new Error("OpenAIProvider needs a client or an API key");
    }
  }

  /**
   * Get the provider name
   */
  getName(): string {
    return "openai";
  }

  async generateQuery(task: string, previousQueries: string[], context = ""): Promise<string> {
    const prompt = getQueryGenerationPrompts(this.models.queryGeneration);
    const reply = await this.complete("queryGeneration", prompt, {
      task,
      context: context || "None.",
      previousQueries:
        previousQueries.length > 0 ? previousQueries.map((q) => `- ${q}`).join("\n") : "None.",
    });
    return cleanQuery(reply);
  }

  async scoreText(candidate: LinkCandidate, task: string): Promise<string> {
    return this.complete("linkRelevance", getLinkRelevancePrompts(this.models.linkRelevance), {
      task,
      title: candidate.title,
      description: candidate.description,
      url: candidate.url,
    });
  }

  async scoreBatch(candidates: LinkCandidate[], task: string): Promise<string> {
    return this.complete(
      "linkRelevanceBatch",
      getBatchLinkRelevancePrompts(this.models.linkRelevanceBatch),
      { task, results: describeCandidates(candidates), count: candidates.length }
    );
  }

  async evaluateContent(task: string, content: string): Promise<string> {
    return this.complete(
      "contentRelevance",
      getContentRelevancePrompts(this.models.contentRelevance),
      { task, content }
    );
  }

  async cleanBlock(text: string, task?: string): Promise<string> {
    const prompt = getContentCleaningPrompts(this.models.contentCleaning);
    return this.complete("contentCleaning", prompt, {
      focus: task ? renderPrompt(CLEANING_FOCUS_TEMPLATE, { task }) : "",
      focusRequest: task ? `, paying particular attention to information about: ${task}` : "",
      text,
    });
  }

  async synthesizeAnswer(context: string, question: string): Promise<string> {
    return this.complete(
      "answerSynthesis",
      getAnswerSynthesisPrompts(this.models.answerSynthesis),
      { context, question }
    );
  }

  async summarize(content: string): Promise<string> {
    return this.complete("summarization", getSummarizationPrompts(this.models.summarization), {
      content,
    });
  }

  private async complete(
    step: ModelStep,
    prompt: PromptConfig,
    variables: Record<string, string | number>
  ): Promise<string> {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: prompt.model,
      temperature: prompt.temperature,
      messages: [
        { role: "system", content: renderPrompt(prompt.system, variables) },
        { role: "user", content: renderPrompt(prompt.user, variables) },
      ],
      ...(prompt.maxTokens ? { max_tokens: prompt.maxTokens } : {}),
      ...(prompt.responseFormat === "json_object"
        ? { response_format: { type: "json_object" as const } }
        : {}),
    };

    return withRetry(
      async () => {
        const response = await this.client.chat.completions.create(body);
        const content = response.choices[0]?.message.content;
        if (!content) {
          throw new Error("No content in OpenAI response");
        }
        return content.trim();
      },
      {
        maxRetries: this.maxRetries,
        label: `OpenAI ${step}`,
        logger: this.logger,
        sleep: this.sleep,
      }
    );
  }
}
