/**
 * Port for LLM (Large Language Model) text generation.
 * The paper pipeline treats generation as opaque: prompt in, text out.
 */

/**
 * Represents a message in an LLM conversation.
 */
export interface LLMMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

/**
 * Response from an LLM chat completion.
 */
export interface LLMResponse {
  content: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/**
 * Options for LLM chat requests.
 */
export interface LLMChatOptions {
  temperature?: number; // 0.0 to 1.0, controls randomness
  maxTokens?: number; // Max tokens to generate
}

/**
 * Port interface for LLM providers.
 * Implementations surface rate limiting as errors carrying a 429 status or a
 * "rate limit" message; retrying is left to the caller.
 */
export interface ILLMProvider {
  /**
   * Send a chat message and receive a complete response.
   */
  chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse>;

  /**
   * Get the name of the LLM provider (e.g., "Groq").
   */
  getProviderName(): string;

  /**
   * Get the model name being used (e.g., "llama-3.1-8b-instant").
   */
  getModelName(): string;
}
