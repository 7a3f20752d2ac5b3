/**
 * LLM Provider Interface
 *
 * Abstract interface for large language model providers.
 * Allows switching between OpenAI and other chat-completion backends.
 *
 * Scoring methods return the model's raw reply. Decoding, clamping and the
 * neutral fallbacks live in the relevance gate so every provider gets the
 * same treatment of malformed output.
 */

/**
 * Search result fields shown to the model when scoring a link
 */
export interface LinkCandidate {
  title: string;
  url: string;
  description: string;
}

/**
 * LLM Provider interface
 * All LLM providers must implement these methods
 */
export interface LLMProvider {
  /**
   * Generate one search query for the task, different from every previous query
   */
  generateQuery(
    task: string,
    previousQueries: string[],
    context?: string
  ): Promise<string>;

  /**
   * Score one search result against the task. Expected reply: a bare number in [0, 1].
   */
  scoreText(candidate: LinkCandidate, task: string): Promise<string>;

  /**
   * Score several search results in one call. Expected reply: `{"scores": number[]}`.
   */
  scoreBatch(candidates: LinkCandidate[], task: string): Promise<string>;

  /**
   * Judge page text against the task. Expected reply: JSON with
   * `is_relevant`, `relevance_score`, `reason` and `key_points`.
   */
  evaluateContent(task: string, content: string): Promise<string>;

  /**
   * Strip navigation, ads and boilerplate from a block of page text,
   * optionally keeping only what matters for the task
   */
  cleanBlock(text: string, task?: string): Promise<string>;

  /**
   * Answer a question using only the supplied context
   */
  synthesizeAnswer(context: string, question: string): Promise<string>;

  /**
   * Summarize page content
   */
  summarize(content: string): Promise<string>;
}
