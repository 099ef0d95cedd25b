import type { ILLMProvider, LLMChatOptions, LLMMessage, LLMResponse } from '@/ports';
import { type RetryHooks, type RetryOptions, withExponentialBackoff } from './retry';

/**
 * Decorates an ILLMProvider so that every chat call follows a retry policy.
 * Each tier gets its own instance, so policies can differ per tier.
 */
export class RetryingLLMProvider implements ILLMProvider {
  private readonly hooks: RetryHooks;

  constructor(
    private readonly inner: ILLMProvider,
    private readonly options: Partial<RetryOptions> = {},
    hooks: RetryHooks = {},
  ) {
    this.hooks = {
      onRetry: ({ attempt, maxRetries, delayMs }) => {
        console.warn(
          `Rate limit hit. Retrying in ${(delayMs / 1000).toFixed(2)} seconds... (Attempt ${attempt}/${maxRetries})`,
        );
      },
      ...hooks,
    };
  }

  chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse> {
    return withExponentialBackoff(() => this.inner.chat(messages, options), this.options, this.hooks);
  }

  getProviderName(): string {
    return this.inner.getProviderName();
  }

  getModelName(): string {
    return this.inner.getModelName();
  }
}
