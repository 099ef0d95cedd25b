import type { ILLMProvider, LLMChatOptions, LLMMessage, LLMResponse } from '@/ports/ILLMProvider';

/**
 * Rule that answers any request whose user prompt matches `pattern`
 */
export interface ResponseRule {
  pattern: RegExp;
  content: string;
}

/**
 * One scripted reply: either text or a thrown error
 */
export type ScriptedReply = { content: string } | { error: unknown };

/**
 * Record of an LLM call for testing
 */
export interface LLMCallRecord {
  messages: LLMMessage[];
  options?: LLMChatOptions;
  timestamp: number;
}

/**
 * Mock implementation of ILLMProvider for testing
 *
 * Replies come from, in order of priority: the scripted queue, the first
 * response rule matching the last user message, then the default content.
 */
export class MockLLMAdapter implements ILLMProvider {
  private script: ScriptedReply[] = [];
  private rules: ResponseRule[] = [];
  private callHistory: LLMCallRecord[] = [];

  constructor(
    private defaultContent = '',
    private modelName = 'mock-model',
  ) {}

  async chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse> {
    this.callHistory.push({ messages, options, timestamp: Date.now() });

    const reply = this.script.shift();
    if (reply) {
      if ('error' in reply) {
        throw reply.error;
      }
      return this.respond(messages, reply.content);
    }

    const prompt = this.lastUserMessage(messages);
    const rule = this.rules.find((r) => r.pattern.test(prompt));
    return this.respond(messages, rule ? rule.content : this.defaultContent);
  }

  getProviderName(): string {
    return 'Mock';
  }

  getModelName(): string {
    return this.modelName;
  }

  private respond(messages: LLMMessage[], content: string): LLMResponse {
    return {
      content,
      usage: {
        inputTokens: this.estimateTokens(messages.map((m) => m.content).join('\n')),
        outputTokens: this.estimateTokens(content),
      },
    };
  }

  private lastUserMessage(messages: LLMMessage[]): string {
    for (let i = messages.length - 1; i >= 0; i--) {
      if (messages[i].role === 'user') return messages[i].content;
    }
    return '';
  }

  /**
   * Estimate tokens (rough approximation)
   */
  private estimateTokens(text: string): number {
    // Rough estimate: ~4 characters per token
    return Math.ceil(text.length / 4);
  }

  // ============ Test Helpers ============

  /**
   * Queue a reply for the next call
   */
  _enqueueResponse(content: string): void {
    this.script.push({ content });
  }

  /**
   * Queue an error to be thrown by the next call
   */
  _enqueueError(error: unknown): void {
    this.script.push({ error });
  }

  /**
   * Add a response rule; later rules take priority
   */
  _addResponseRule(rule: ResponseRule): void {
    this.rules.unshift(rule);
  }

  /**
   * Get call history for testing
   */
  _getCallHistory(): LLMCallRecord[] {
    return [...this.callHistory];
  }

  /**
   * Clear call history
   */
  _clearCallHistory(): void {
    this.callHistory = [];
  }

  /**
   * Drop queued replies and rules
   */
  _reset(): void {
    this.script = [];
    this.rules = [];
  }
}
