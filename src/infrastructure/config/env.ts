import { ConfigurationError } from '../../shared/errors.js';
import { isLogLevel, type LogLevel } from '../../shared/logger.js';
import { isAiProvider } from '../../shared/types/llm.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-3.5-turbo';
export const DEFAULT_GEMINI_MODEL = 'gemini-pro';

interface ProviderCredentials {
  readonly apiKey: string;
  readonly model: string;
}

export interface OpenAISettings extends ProviderCredentials {
  readonly provider: 'openai';
}

export interface GeminiSettings extends ProviderCredentials {
  readonly provider: 'gemini';
}

export type ProviderSettings = OpenAISettings | GeminiSettings;

export interface AppEnv {
  readonly telegramBotToken: string;
  readonly logLevel: LogLevel;
  readonly ai: ProviderSettings;
}

type EnvSource = Record<string, string | undefined>;

const readEnv = (source: EnvSource, name: string): string | undefined => {
  const value = source[name]?.trim();
  return value ? value : undefined;
};

const requireEnv = (source: EnvSource, name: string, hint?: string): string => {
  const value = readEnv(source, name);
  if (!value) {
    throw new ConfigurationError(
      `Missing required environment variable: ${name}${hint ? ` (${hint})` : ''}`,
      name,
    );
  }
  return value;
};

const loadProviderSettings = (source: EnvSource): ProviderSettings => {
  const raw = requireEnv(source, 'AI_PROVIDER', "expected 'openai' or 'gemini'").toLowerCase();
  if (!isAiProvider(raw)) {
    throw new ConfigurationError(
      `Invalid AI_PROVIDER: ${raw}. Choose 'openai' or 'gemini'.`,
      'AI_PROVIDER',
    );
  }

  switch (raw) {
    case 'openai':
      return {
        provider: raw,
        apiKey: requireEnv(source, 'OPENAI_API_KEY', 'required when AI_PROVIDER=openai'),
        model: readEnv(source, 'OPENAI_MODEL') ?? DEFAULT_OPENAI_MODEL,
      };
    case 'gemini':
      return {
        provider: raw,
        apiKey: requireEnv(source, 'GOOGLE_API_KEY', 'required when AI_PROVIDER=gemini'),
        model: readEnv(source, 'GEMINI_MODEL') ?? DEFAULT_GEMINI_MODEL,
      };
  }
};

const loadLogLevel = (source: EnvSource): LogLevel => {
  const raw = readEnv(source, 'LOG_LEVEL')?.toLowerCase();
  if (!raw) {
    return 'info';
  }
  if (!isLogLevel(raw)) {
    throw new ConfigurationError(`Invalid LOG_LEVEL: ${raw}`, 'LOG_LEVEL');
  }
  return raw;
};

export const loadEnv = (source: EnvSource = process.env): AppEnv => {
  const telegramBotToken = requireEnv(source, 'TELEGRAM_BOT_TOKEN');
  const ai = Object.freeze(loadProviderSettings(source));

  return Object.freeze({
    telegramBotToken,
    logLevel: loadLogLevel(source),
    ai,
  });
};
