import {
  GoogleGenerativeAI,
  GoogleGenerativeAIAbortError,
  GoogleGenerativeAIError,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIRequestInputError,
  GoogleGenerativeAIResponseError,
  type GenerateContentResponse,
  type GenerativeModel,
} from '@google/generative-ai';
import { ProviderError, errorDetails } from '../../shared/errors.js';
import type { LlmProviderAdapter } from '../../shared/types/llm.js';

interface GeminiAdapterOptions {
  apiKey: string;
  model: string;
}

const BLOCKING_FINISH_REASONS = new Set<string>([
  'SAFETY',
  'RECITATION',
  'BLOCKLIST',
  'PROHIBITED_CONTENT',
  'SPII',
]);

const isInvalidKey = (error: GoogleGenerativeAIFetchError): boolean =>
  error.errorDetails?.some((detail) => detail.reason === 'API_KEY_INVALID') ?? false;

const toProviderError = (error: unknown): ProviderError => {
  if (error instanceof ProviderError) {
    return error;
  }

  if (error instanceof GoogleGenerativeAIFetchError) {
    if (error.status === 401 || error.status === 403 || isInvalidKey(error)) {
      return new ProviderError('gemini', 'auth', `Gemini rejected the API key (${error.status ?? 'n/a'})`, {
        cause: error,
      });
    }
    if (error.status === 429) {
      return new ProviderError('gemini', 'quota', `Gemini rate limit or quota exceeded: ${error.message}`, {
        cause: error,
      });
    }
    return new ProviderError('gemini', 'unknown', `Gemini error ${error.status ?? 'n/a'}: ${error.message}`, {
      cause: error,
    });
  }
  if (error instanceof GoogleGenerativeAIAbortError) {
    return new ProviderError('gemini', 'network', `Gemini request aborted: ${error.message}`, {
      cause: error,
    });
  }
  if (error instanceof GoogleGenerativeAIResponseError) {
    return new ProviderError('gemini', 'empty-response', `Gemini response unusable: ${error.message}`, {
      cause: error,
    });
  }
  if (error instanceof GoogleGenerativeAIRequestInputError) {
    return new ProviderError('gemini', 'unknown', `Gemini rejected the request input: ${error.message}`, {
      cause: error,
    });
  }
  // The SDK wraps failed fetch calls (DNS, refused connection) in its base error class.
  if (error instanceof GoogleGenerativeAIError) {
    return new ProviderError('gemini', 'network', `Gemini connection failed: ${error.message}`, {
      cause: error,
    });
  }

  return new ProviderError('gemini', 'unknown', `Gemini request failed: ${errorDetails(error)}`, {
    cause: error,
  });
};

const extractReply = (response: GenerateContentResponse): string => {
  const blockReason = response.promptFeedback?.blockReason;
  const candidate = response.candidates?.[0];

  if (!candidate) {
    if (blockReason) {
      throw new ProviderError('gemini', 'blocked', `Gemini blocked the prompt: ${blockReason}`, {
        blockReason,
      });
    }
    throw new ProviderError('gemini', 'empty-response', 'Gemini returned no candidates');
  }

  const text = (candidate.content?.parts ?? [])
    .map((part) => part.text ?? '')
    .join('');

  if (text.trim()) {
    return text;
  }

  const finishReason = candidate.finishReason;
  if (finishReason && BLOCKING_FINISH_REASONS.has(finishReason)) {
    throw new ProviderError('gemini', 'blocked', `Gemini blocked the response: ${finishReason}`, {
      blockReason: finishReason,
    });
  }
  throw new ProviderError('gemini', 'empty-response', 'Gemini returned empty content');
};

export class GeminiAdapter implements LlmProviderAdapter {
  readonly provider = 'gemini' as const;
  readonly model: string;
  private readonly generativeModel: GenerativeModel;

  constructor(options: GeminiAdapterOptions) {
    this.model = options.model;
    this.generativeModel = new GoogleGenerativeAI(options.apiKey).getGenerativeModel({
      model: options.model,
    });
  }

  async generateReply(text: string): Promise<string> {
    try {
      const result = await this.generativeModel.generateContent(text);
      return extractReply(result.response);
    } catch (error) {
      throw toProviderError(error);
    }
  }
}
