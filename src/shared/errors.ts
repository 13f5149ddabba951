import type { AiProvider } from './types/llm.js';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly key?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type ProviderErrorCategory =
  | 'network'
  | 'auth'
  | 'quota'
  | 'empty-response'
  | 'blocked'
  | 'unknown';

export interface ProviderErrorOptions {
  cause?: unknown;
  blockReason?: string;
}

export class ProviderError extends Error {
  readonly blockReason?: string;

  constructor(
    readonly provider: AiProvider,
    readonly category: ProviderErrorCategory,
    message: string,
    options: ProviderErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProviderError';
    this.blockReason = options.blockReason;
  }
}

export class MessagingDeliveryError extends Error {
  constructor(
    readonly chatId: number,
    message: string,
    options: { cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'MessagingDeliveryError';
  }
}

export const errorDetails = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
