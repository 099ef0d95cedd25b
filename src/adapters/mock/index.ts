export { InMemoryStorageAdapter } from './InMemoryStorageAdapter';
export { MockLLMAdapter } from './MockLLMAdapter';
export type { LLMCallRecord, ResponseRule, ScriptedReply } from './MockLLMAdapter';
