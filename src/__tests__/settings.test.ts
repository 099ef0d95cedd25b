import { describe, expect, it } from 'vitest';
import { OpenAICompatibleLLMAdapter } from '@/adapters/openai/OpenAICompatibleLLMAdapter';
import { ConfigurationError } from '@/domain/generation/errors';
import {
  DEFAULT_SETTINGS,
  createLLMProvider,
  loadSettingsFromEnv,
  parseDifficulty,
  parseProvider,
  toPaperOptions,
  validateSettings,
} from '@/settings';

describe('loadSettingsFromEnv', () => {
  it('uses defaults when the environment is empty', () => {
    expect(loadSettingsFromEnv({})).toEqual(DEFAULT_SETTINGS);
  });

  it('reads the key of the selected provider', () => {
    const settings = loadSettingsFromEnv({
      LLM_PROVIDER: 'OpenAI',
      GROQ_API_KEY: 'groq-test-key',
      OPENAI_API_KEY: 'test-secret',
    });

    expect(settings.provider).toBe('openai');
    expect(settings.apiKey).toBe('test-secret');
  });

  it('reads model, endpoint and history directory', () => {
    const settings = loadSettingsFromEnv({
      GROQ_API_KEY: 'test-secret',
      LLM_MODEL: 'llama-3.3-70b-versatile',
      LLM_BASE_URL: 'http://localhost:8080/v1',
      HISTORY_DIR: 'data',
    });

    expect(settings).toMatchObject({
      provider: 'groq',
      apiKey: 'test-secret',
      model: 'llama-3.3-70b-versatile',
      baseURL: 'http://localhost:8080/v1',
      historyDir: 'data',
    });
  });

  it('applies overrides last', () => {
    const settings = loadSettingsFromEnv(
      { OPENAI_API_KEY: 'test-secret', HISTORY_DIR: 'data' },
      { provider: 'openai', historyDir: 'other', questionsPerUnit: 3 },
    );

    expect(settings.apiKey).toBe('test-secret');
    expect(settings.historyDir).toBe('other');
    expect(settings.questionsPerUnit).toBe(3);
  });

  it('rejects an unknown provider', () => {
    expect(() => loadSettingsFromEnv({ LLM_PROVIDER: 'mystery' })).toThrow(ConfigurationError);
  });
});

describe('parseDifficulty', () => {
  it('matches case-insensitively', () => {
    expect(parseDifficulty('hard')).toBe('Hard');
    expect(parseDifficulty(' EASY ')).toBe('Easy');
  });

  it('rejects unknown values', () => {
    expect(() => parseDifficulty('brutal')).toThrow(
      'Unknown difficulty "brutal". Expected one of: Easy, Medium, Hard',
    );
  });
});

describe('parseProvider', () => {
  it('accepts only OpenAI-compatible providers', () => {
    expect(parseProvider('GROQ')).toBe('groq');
    expect(() => parseProvider('anthropic')).toThrow(ConfigurationError);
  });

  it('lists the known providers on failure', () => {
    expect(() => parseProvider('x')).toThrow(
      'Unknown LLM provider "x". Expected one of: groq, openai',
    );
  });
});

describe('validateSettings', () => {
  const valid = { ...DEFAULT_SETTINGS, apiKey: 'test-secret' };

  it('accepts complete settings', () => {
    expect(() => validateSettings(valid)).not.toThrow();
  });

  it('names the missing key variable', () => {
    expect(() => validateSettings(DEFAULT_SETTINGS)).toThrow('Groq API key is missing. Set GROQ_API_KEY.');
  });

  it('bounds questions per unit', () => {
    expect(() => validateSettings({ ...valid, questionsPerUnit: 0 })).toThrow(ConfigurationError);
    expect(() => validateSettings({ ...valid, questionsPerUnit: 11 })).toThrow(ConfigurationError);
    expect(() => validateSettings({ ...valid, questionsPerUnit: 2.5 })).toThrow(ConfigurationError);
    expect(() => validateSettings({ ...valid, questionsPerUnit: 10 })).not.toThrow();
  });

  it('rejects negative delays', () => {
    expect(() => validateSettings({ ...valid, unitDelayMs: -1 })).toThrow(
      'Unit delay must not be negative',
    );
  });
});

describe('createLLMProvider', () => {
  it('creates an OpenAI-compatible adapter for Groq', () => {
    const provider = createLLMProvider({ ...DEFAULT_SETTINGS, apiKey: 'test-secret' });

    expect(provider).toBeInstanceOf(OpenAICompatibleLLMAdapter);
    expect(provider.getProviderName()).toBe('Groq');
    expect(provider.getModelName()).toBe('llama-3.1-8b-instant');
  });

  it('honours a model override', () => {
    const provider = createLLMProvider({
      ...DEFAULT_SETTINGS,
      provider: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-4o',
    });

    expect(provider.getProviderName()).toBe('OpenAI');
    expect(provider.getModelName()).toBe('gpt-4o');
  });
});

describe('toPaperOptions', () => {
  it('copies the generation knobs', () => {
    expect(toPaperOptions({ ...DEFAULT_SETTINGS, difficulty: 'Hard' })).toEqual({
      difficulty: 'Hard',
      questionsPerUnit: 2,
      oneMarkNumbering: 'contiguous',
      unitDelayMs: 1500,
      retry: DEFAULT_SETTINGS.retry,
    });
  });
});
