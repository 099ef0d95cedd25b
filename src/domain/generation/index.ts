export { ConfigurationError, GenerationError, describeError } from './errors';
export type { RetryAttempt, RetryHooks, RetryOptions } from './retry';
export {
  DEFAULT_RETRY_OPTIONS,
  computeRetryDelay,
  isRateLimitError,
  withExponentialBackoff,
} from './retry';
export { RetryingLLMProvider } from './RetryingLLMProvider';
