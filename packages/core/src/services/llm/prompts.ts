/**
 * AI Prompt Configuration
 *
 * Centralized location for all AI prompts used in the research pipeline.
 * Prompts use template placeholders that are filled at runtime.
 *
 * Template syntax: {{placeholder}} - will be replaced with actual values
 *
 * Model and temperature settings come from research-config.yaml.
 */

import type { ModelConfig } from "../research-engine/config";

export interface PromptConfig {
  system: string;
  user: string;
  model: string;
  responseFormat?: "json_object" | "text";
  temperature?: number; // 0.0-2.0, lower = more deterministic, higher = more creative
  maxTokens?: number;
}

function createPromptConfig(modelConfig: ModelConfig, system: string, user: string): PromptConfig {
  return {
    system,
    user,
    model: modelConfig.model,
    temperature: modelConfig.temperature,
    responseFormat: modelConfig.responseFormat,
    maxTokens: modelConfig.maxTokens,
  };
}

/**
 * One new web search query for a task
 */
export function getQueryGenerationPrompts(modelConfig: ModelConfig): PromptConfig {
  return createPromptConfig(
    modelConfig,
    `You are an expert at online research. Your job is to turn a specific goal into a search engine query.

The query must:
- use precise keywords
- be short and focused
- contain no filler text or full sentences
- differ from every query already tried

Reply with only the query: no quotes, no markdown, no explanation.`,
    `Task: {{task}}

Project context:
{{context}}

Queries already tried (avoid these):
{{previousQueries}}

Write a new, original search query.`
  );
}

/**
 * Link-level relevance of a single search result
 */
export function getLinkRelevancePrompts(modelConfig: ModelConfig): PromptConfig {
  return createPromptConfig(
    modelConfig,
    `You rate how relevant a search result is to a research task.
Look at the result's title, description and URL and score its relevance from 0 to 1, where:
- 0 means completely irrelevant
- 0.5 means partially relevant
- 1 means highly relevant
Reply with a single decimal number and nothing else.`,
    `Task: {{task}}

Search result:
Title: {{title}}
Description: {{description}}
URL: {{url}}

Relevance score (0 to 1):`
  );
}

/**
 * Link-level relevance of several search results in one call
 */
export function getBatchLinkRelevancePrompts(modelConfig: ModelConfig): PromptConfig {
  return createPromptConfig(
    modelConfig,
    `You rate how relevant each search result is to a research task.
Score every result from 0 to 1, where:
- 0 means completely irrelevant
- 0.5 means partially relevant
- 1 means highly relevant

Return ONLY a JSON object of the form {"scores": [0.8, 0.3, 0.9]} with one score per result, in the order given.`,
    `Task: {{task}}

Search results:
{{results}}

Return {"scores": [...]} with exactly {{count}} scores.`
  );
}

/**
 * Content-level relevance of page text
 */
export function getContentRelevancePrompts(modelConfig: ModelConfig): PromptConfig {
  return createPromptConfig(
    modelConfig,
    `You judge whether web content is useful for building a knowledge base about a specific task.

Reply with a JSON object with these fields:
1. is_relevant: boolean
2. relevance_score: number from 0.0 (completely irrelevant) to 1.0 (extremely relevant)
3. reason: string, a short explanation of your judgement
4. key_points: array of strings, at most 5 points from the content that matter for the task`,
    `TASK: {{task}}

CONTENT:
{{content}}

Judge how relevant this content is to the task.`
  );
}

/**
 * Boilerplate removal for one block of page text
 */
export function getContentCleaningPrompts(modelConfig: ModelConfig): PromptConfig {
  return createPromptConfig(
    modelConfig,
    `You clean up text extracted from web pages.
Remove everything that is not informative:
- navigation menus
- unrelated links
- interface elements
- repeated header and footer text
- advertising
- cookie banners
- notifications

Keep ONLY the main informative content: body paragraphs, headings that belong to the topic, lists and quotations.

Return the cleaned text as plain text, keeping the paragraph structure.
Do NOT add comments or explanations.{{focus}}`,
    `Here is the text to clean, keeping only the informative content{{focusRequest}}:

{{text}}`
  );
}

export const CLEANING_FOCUS_TEMPLATE = `

The reader is researching: "{{task}}"
Favor content about this topic and keep the paragraphs and sections that refer to it.
Sections that are clearly unrelated to this research may be removed.`;

/**
 * Grounded answer from retrieved context
 */
export function getAnswerSynthesisPrompts(modelConfig: ModelConfig): PromptConfig {
  return createPromptConfig(
    modelConfig,
    `You are a research assistant that answers questions using only the data provided.`,
    `Based on the following information, answer the question.
Include only facts present in the provided data and do not add information that is not there.
If the information is insufficient to answer, say so clearly.

INFORMATION:
{{context}}

QUESTION: {{question}}

ANSWER:`
  );
}

/**
 * Summary of page content
 */
export function getSummarizationPrompts(modelConfig: ModelConfig): PromptConfig {
  return createPromptConfig(
    modelConfig,
    `You summarize web content.
Write a concise but informative summary of the text, highlighting:
1. The key points and main information
2. Relevant data and statistics, if any
3. Conclusions or recommendations

Keep the summary clear and objective. Use paragraphs or bullet points where it helps readability.`,
    `Here is the content to summarize:

{{content}}`
  );
}

/**
 * Render a prompt template with variables
 */
export function renderPrompt(
  template: string,
  variables: Record<string, string | number>
): string {
  let rendered = template;
  for (const [key, value] of Object.entries(variables)) {
    rendered = rendered.split(`{{${key}}}`).join(String(value));
  }
  return rendered;
}
