import OpenAI, {
  APIConnectionError,
  APIError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError,
} from 'openai';
import { ProviderError, errorDetails } from '../../shared/errors.js';
import type { LlmProviderAdapter } from '../../shared/types/llm.js';

interface OpenAIAdapterOptions {
  apiKey: string;
  model: string;
}

const toProviderError = (error: unknown): ProviderError => {
  if (error instanceof ProviderError) {
    return error;
  }

  // APIConnectionError extends APIError, so it has to be matched first.
  if (error instanceof APIConnectionError) {
    return new ProviderError('openai', 'network', `OpenAI connection failed: ${error.message}`, {
      cause: error,
    });
  }
  if (error instanceof AuthenticationError || error instanceof PermissionDeniedError) {
    return new ProviderError('openai', 'auth', `OpenAI rejected the API key (${error.status})`, {
      cause: error,
    });
  }
  if (error instanceof RateLimitError) {
    return new ProviderError('openai', 'quota', `OpenAI rate limit or quota exceeded: ${error.message}`, {
      cause: error,
    });
  }
  if (error instanceof APIError) {
    return new ProviderError('openai', 'unknown', `OpenAI error ${error.status ?? 'n/a'}: ${error.message}`, {
      cause: error,
    });
  }

  return new ProviderError('openai', 'unknown', `OpenAI request failed: ${errorDetails(error)}`, {
    cause: error,
  });
};

export class OpenAIAdapter implements LlmProviderAdapter {
  readonly provider = 'openai' as const;
  readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIAdapterOptions) {
    this.model = options.model;
    this.client = new OpenAI({
      apiKey: options.apiKey,
      maxRetries: 0,
    });
  }

  async generateReply(text: string): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: text }],
      });

      const content = completion.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new ProviderError('openai', 'empty-response', 'OpenAI returned empty content');
      }
      return content;
    } catch (error) {
      throw toProviderError(error);
    }
  }
}
