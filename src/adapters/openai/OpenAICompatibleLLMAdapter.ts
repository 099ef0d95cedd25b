import type { ILLMProvider, LLMChatOptions, LLMMessage, LLMResponse } from '@/ports/ILLMProvider';
import OpenAI from 'openai';
import type {
	ChatCompletionCreateParamsNonStreaming,
	ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

/**
 * Groq's OpenAI-compatible endpoint
 */
export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

/**
 * Configuration for any OpenAI-compatible chat completions endpoint
 */
export interface OpenAICompatibleLLMConfig {
	apiKey: string;
	/** Default: Groq's endpoint */
	baseURL?: string;
	/** Default: llama-3.1-8b-instant */
	model?: string;
	/** Default: 1024 */
	maxTokens?: number;
	/** Request timeout. Default: 60000 */
	timeoutMs?: number;
	/** Name reported by getProviderName(). Default: Groq */
	providerName?: string;
}

export const DEFAULT_OPENAI_COMPATIBLE_CONFIG = {
	baseURL: GROQ_BASE_URL,
	model: 'llama-3.1-8b-instant',
	maxTokens: 1024,
	timeoutMs: 60000,
	providerName: 'Groq',
};

/**
 * Chat provider for OpenAI-compatible APIs (Groq, OpenAI and the like).
 * SDK retries are disabled; rate-limit errors surface with their HTTP
 * status so the caller's retry policy can act on them.
 */
export class OpenAICompatibleLLMAdapter implements ILLMProvider {
	private readonly client: OpenAI;
	private readonly config: Required<Omit<OpenAICompatibleLLMConfig, 'apiKey'>>;

	constructor(config: OpenAICompatibleLLMConfig) {
		if (!config.apiKey || config.apiKey.trim().length === 0) {
			throw new Error('API key is required');
		}
		this.config = {
			baseURL: config.baseURL ?? DEFAULT_OPENAI_COMPATIBLE_CONFIG.baseURL,
			model: config.model ?? DEFAULT_OPENAI_COMPATIBLE_CONFIG.model,
			maxTokens: config.maxTokens ?? DEFAULT_OPENAI_COMPATIBLE_CONFIG.maxTokens,
			timeoutMs: config.timeoutMs ?? DEFAULT_OPENAI_COMPATIBLE_CONFIG.timeoutMs,
			providerName: config.providerName ?? DEFAULT_OPENAI_COMPATIBLE_CONFIG.providerName,
		};
		this.client = new OpenAI({
			apiKey: config.apiKey,
			baseURL: this.config.baseURL,
			maxRetries: 0,
			timeout: this.config.timeoutMs,
		});
	}

	async chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse> {
		const completion = await this.client.chat.completions.create(
			this.buildRequestBody(messages, options),
		);

		const choice = completion.choices[0];
		if (!choice) {
			throw new Error(`${this.config.providerName} returned no completion choices`);
		}

		return {
			content: choice.message.content ?? '',
			usage: completion.usage
				? {
						inputTokens: completion.usage.prompt_tokens,
						outputTokens: completion.usage.completion_tokens,
					}
				: undefined,
		};
	}

	/**
	 * Build the request body for the chat completions endpoint.
	 */
	private buildRequestBody(
		messages: LLMMessage[],
		options: LLMChatOptions | undefined,
	): ChatCompletionCreateParamsNonStreaming {
		const requestBody: ChatCompletionCreateParamsNonStreaming = {
			model: this.config.model,
			messages: messages.map(toChatMessage),
			max_tokens: options?.maxTokens ?? this.config.maxTokens,
		};

		if (options?.temperature !== undefined) {
			requestBody.temperature = options.temperature;
		}

		return requestBody;
	}

	getProviderName(): string {
		return this.config.providerName;
	}

	getModelName(): string {
		return this.config.model;
	}
}

function toChatMessage(message: LLMMessage): ChatCompletionMessageParam {
	switch (message.role) {
		case 'system':
			return { role: 'system', content: message.content };
		case 'assistant':
			return { role: 'assistant', content: message.content };
		case 'user':
			return { role: 'user', content: message.content };
	}
}
