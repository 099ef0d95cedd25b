// Port interfaces - abstractions for external dependencies
export type { IStorageAdapter } from './IStorageAdapter';
export type { ILLMProvider, LLMChatOptions, LLMMessage, LLMResponse } from './ILLMProvider';
