import { describe, expect, it } from 'vitest';
import {
  DEFAULT_GEMINI_MODEL,
  DEFAULT_OPENAI_MODEL,
  loadEnv,
  type ProviderSettings,
} from '../../src/infrastructure/config/env.js';
import { ConfigurationError } from '../../src/shared/errors.js';

const openaiEnv = {
  TELEGRAM_BOT_TOKEN: 'test-telegram-token',
  AI_PROVIDER: 'openai',
  OPENAI_API_KEY: 'test-openai-key',
};

const geminiEnv = {
  TELEGRAM_BOT_TOKEN: 'test-telegram-token',
  AI_PROVIDER: 'gemini',
  GOOGLE_API_KEY: 'test-google-key',
};

const configErrorKey = (source: Record<string, string | undefined>): string | undefined => {
  try {
    loadEnv(source);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.key;
    }
    throw error;
  }
  return undefined;
};

describe('loadEnv', () => {
  it('loads an openai configuration with the default model', () => {
    const env = loadEnv(openaiEnv);

    expect(env).toEqual({
      telegramBotToken: 'test-telegram-token',
      logLevel: 'info',
      ai: { provider: 'openai', apiKey: 'test-openai-key', model: DEFAULT_OPENAI_MODEL },
    });
    expect(DEFAULT_OPENAI_MODEL).toBe('gpt-3.5-turbo');
  });

  it('loads a gemini configuration with the default model', () => {
    const env = loadEnv(geminiEnv);

    expect(env.ai).toEqual({ provider: 'gemini', apiKey: 'test-google-key', model: DEFAULT_GEMINI_MODEL });
    expect(DEFAULT_GEMINI_MODEL).toBe('gemini-pro');
  });

  it('uses the configured model names', () => {
    expect(loadEnv({ ...openaiEnv, OPENAI_MODEL: 'gpt-4o-mini' }).ai.model).toBe('gpt-4o-mini');
    expect(loadEnv({ ...geminiEnv, GEMINI_MODEL: 'gemini-1.5-flash' }).ai.model).toBe('gemini-1.5-flash');
  });

  it('falls back to the default model when the model name is blank', () => {
    expect(loadEnv({ ...openaiEnv, OPENAI_MODEL: '  ' }).ai.model).toBe('gpt-3.5-turbo');
  });

  it('normalizes the provider name', () => {
    expect(loadEnv({ ...openaiEnv, AI_PROVIDER: ' OpenAI ' }).ai.provider).toBe('openai');
    expect(loadEnv({ ...geminiEnv, AI_PROVIDER: 'GEMINI' }).ai.provider).toBe('gemini');
  });

  it('does not require the key of the provider that is not selected', () => {
    expect(loadEnv({ ...openaiEnv, GOOGLE_API_KEY: undefined }).ai.apiKey).toBe('test-openai-key');
    expect(loadEnv({ ...geminiEnv, OPENAI_API_KEY: '' }).ai.apiKey).toBe('test-google-key');
  });

  it('fails when the bot token is missing or blank', () => {
    expect(configErrorKey({ ...openaiEnv, TELEGRAM_BOT_TOKEN: undefined })).toBe('TELEGRAM_BOT_TOKEN');
    expect(configErrorKey({ ...openaiEnv, TELEGRAM_BOT_TOKEN: '   ' })).toBe('TELEGRAM_BOT_TOKEN');
  });

  it('fails when AI_PROVIDER is unset', () => {
    expect(configErrorKey({ ...openaiEnv, AI_PROVIDER: undefined })).toBe('AI_PROVIDER');
  });

  it('fails when AI_PROVIDER is not a known provider', () => {
    expect(() => loadEnv({ ...openaiEnv, AI_PROVIDER: 'claude' })).toThrow(
      "Invalid AI_PROVIDER: claude. Choose 'openai' or 'gemini'.",
    );
  });

  it('fails when the selected provider key is empty', () => {
    expect(configErrorKey({ ...openaiEnv, OPENAI_API_KEY: '' })).toBe('OPENAI_API_KEY');
    expect(configErrorKey({ ...geminiEnv, GOOGLE_API_KEY: '' })).toBe('GOOGLE_API_KEY');
  });

  it('reads and validates LOG_LEVEL', () => {
    expect(loadEnv({ ...openaiEnv, LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(configErrorKey({ ...openaiEnv, LOG_LEVEL: 'verbose' })).toBe('LOG_LEVEL');
  });

  it('tags the provider settings with the selected provider', () => {
    const { ai } = loadEnv({ ...geminiEnv, GEMINI_MODEL: 'gemini-1.5-pro' });
    const describeSettings = (settings: ProviderSettings): string => {
      switch (settings.provider) {
        case 'openai':
          return `openai:${settings.model}`;
        case 'gemini':
          return `gemini:${settings.model}`;
      }
    };

    expect(describeSettings(ai)).toBe('gemini:gemini-1.5-pro');
  });

  it('returns a frozen value', () => {
    const env = loadEnv(openaiEnv);

    expect(Object.isFrozen(env)).toBe(true);
    expect(Object.isFrozen(env.ai)).toBe(true);
  });
});
