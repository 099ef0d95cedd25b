import {
  GROQ_BASE_URL,
  OpenAICompatibleLLMAdapter,
} from '@/adapters/openai/OpenAICompatibleLLMAdapter';
import { ConfigurationError } from '@/domain/generation/errors';
import type { RetryOptions } from '@/domain/generation/retry';
import type { PaperOptions } from '@/domain/paper';
import { DIFFICULTIES, type Difficulty } from '@/domain/question';
import type { OneMarkNumbering } from '@/domain/tiers';
import type { ILLMProvider } from '@/ports';

export type LLMProviderId = 'groq' | 'openai';

export const LLM_PROVIDERS: readonly LLMProviderId[] = ['groq', 'openai'];

const ONE_MARK_NUMBERINGS: readonly OneMarkNumbering[] = ['contiguous', 'legacy'];

/**
 * Per-provider defaults and the environment variable holding its key
 */
export const PROVIDER_DEFAULTS: Record<
  LLMProviderId,
  { label: string; model: string; baseURL: string; apiKeyEnv: string }
> = {
  groq: {
    label: 'Groq',
    model: 'llama-3.1-8b-instant',
    baseURL: GROQ_BASE_URL,
    apiKeyEnv: 'GROQ_API_KEY',
  },
  openai: {
    label: 'OpenAI',
    model: 'gpt-4o-mini',
    baseURL: 'https://api.openai.com/v1',
    apiKeyEnv: 'OPENAI_API_KEY',
  },
};

/**
 * Paper generator settings
 */
export interface PaperGeneratorSettings {
  provider: LLMProviderId;
  apiKey: string;
  /** Model name; empty means the provider's default */
  model: string;
  /** Endpoint override for OpenAI-compatible providers; empty means default */
  baseURL: string;
  difficulty: Difficulty;
  /** One-mark questions per unit (1 to 10) */
  questionsPerUnit: number;
  /** Pause after each generation call */
  unitDelayMs: number;
  requestTimeoutMs: number;
  retry: Omit<RetryOptions, 'isRetryable'>;
  /** Directory holding the question history files */
  historyDir: string;
  oneMarkNumbering: OneMarkNumbering;
}

/**
 * Default settings
 */
export const DEFAULT_SETTINGS: PaperGeneratorSettings = {
  provider: 'groq',
  apiKey: '',
  model: '',
  baseURL: '',
  difficulty: 'Medium',
  questionsPerUnit: 2,
  unitDelayMs: 1500,
  requestTimeoutMs: 60000,
  retry: {
    initialDelayMs: 2000,
    exponentialBase: 2,
    jitter: true,
    maxRetries: 5,
    maxDelayMs: 60000,
  },
  historyDir: '.',
  oneMarkNumbering: 'contiguous',
};

function isProvider(value: string): value is LLMProviderId {
  return LLM_PROVIDERS.some((p) => p === value);
}

/**
 * Parse a provider name, case-insensitively
 */
export function parseProvider(value: string): LLMProviderId {
  const normalized = value.trim().toLowerCase();
  if (!isProvider(normalized)) {
    throw new ConfigurationError(
      `Unknown LLM provider "${value}". Expected one of: ${LLM_PROVIDERS.join(', ')}`,
    );
  }
  return normalized;
}

/**
 * Parse a difficulty name, case-insensitively
 */
export function parseDifficulty(value: string): Difficulty {
  const normalized = value.trim().toLowerCase();
  const difficulty = DIFFICULTIES.find((d) => d.toLowerCase() === normalized);
  if (!difficulty) {
    throw new ConfigurationError(
      `Unknown difficulty "${value}". Expected one of: ${DIFFICULTIES.join(', ')}`,
    );
  }
  return difficulty;
}

/**
 * Build settings from environment variables, then apply overrides.
 *
 * Reads LLM_PROVIDER, the provider's API key variable (GROQ_API_KEY or
 * OPENAI_API_KEY), LLM_MODEL, LLM_BASE_URL and HISTORY_DIR.
 */
export function loadSettingsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<PaperGeneratorSettings> = {},
): PaperGeneratorSettings {
  const provider =
    overrides.provider ??
    (env.LLM_PROVIDER ? parseProvider(env.LLM_PROVIDER) : DEFAULT_SETTINGS.provider);
  const settings: PaperGeneratorSettings = { ...DEFAULT_SETTINGS, provider };

  const apiKey = env[PROVIDER_DEFAULTS[provider].apiKeyEnv];
  if (apiKey) settings.apiKey = apiKey;
  if (env.LLM_MODEL) settings.model = env.LLM_MODEL;
  if (env.LLM_BASE_URL) settings.baseURL = env.LLM_BASE_URL;
  if (env.HISTORY_DIR) settings.historyDir = env.HISTORY_DIR;

  return { ...settings, ...overrides };
}

/**
 * Check settings, throwing ConfigurationError on the first problem
 */
export function validateSettings(settings: PaperGeneratorSettings): void {
  if (!isProvider(settings.provider)) {
    throw new ConfigurationError(`Unknown LLM provider "${settings.provider}"`);
  }
  if (!settings.apiKey.trim()) {
    const { label, apiKeyEnv } = PROVIDER_DEFAULTS[settings.provider];
    throw new ConfigurationError(`${label} API key is missing. Set ${apiKeyEnv}.`);
  }
  if (!DIFFICULTIES.includes(settings.difficulty)) {
    throw new ConfigurationError(`Unknown difficulty "${settings.difficulty}"`);
  }
  if (
    !Number.isInteger(settings.questionsPerUnit) ||
    settings.questionsPerUnit < 1 ||
    settings.questionsPerUnit > 10
  ) {
    throw new ConfigurationError('Questions per unit must be a whole number from 1 to 10');
  }
  if (!(settings.unitDelayMs >= 0)) {
    throw new ConfigurationError('Unit delay must not be negative');
  }
  if (!(settings.requestTimeoutMs > 0)) {
    throw new ConfigurationError('Request timeout must be positive');
  }
  if (!Number.isInteger(settings.retry.maxRetries) || settings.retry.maxRetries < 0) {
    throw new ConfigurationError('Max retries must be a non-negative whole number');
  }
  if (!ONE_MARK_NUMBERINGS.includes(settings.oneMarkNumbering)) {
    throw new ConfigurationError(`Unknown one-mark numbering "${settings.oneMarkNumbering}"`);
  }
}

/**
 * Create the LLM provider the settings select
 */
export function createLLMProvider(settings: PaperGeneratorSettings): ILLMProvider {
  const defaults = PROVIDER_DEFAULTS[settings.provider];
  const model = settings.model || defaults.model;

  return new OpenAICompatibleLLMAdapter({
    apiKey: settings.apiKey,
    baseURL: settings.baseURL || defaults.baseURL,
    model,
    timeoutMs: settings.requestTimeoutMs,
    providerName: defaults.label,
  });
}

/**
 * Paper options derived from settings
 */
export function toPaperOptions(settings: PaperGeneratorSettings): Partial<PaperOptions> {
  return {
    difficulty: settings.difficulty,
    questionsPerUnit: settings.questionsPerUnit,
    oneMarkNumbering: settings.oneMarkNumbering,
    unitDelayMs: settings.unitDelayMs,
    retry: { ...settings.retry },
  };
}
