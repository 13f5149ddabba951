import type { ProviderSettings } from '../config/env.js';
import type { LlmProviderAdapter } from '../../shared/types/llm.js';
import { GeminiAdapter } from './gemini.adapter.js';
import { OpenAIAdapter } from './openai.adapter.js';

export const createProviderAdapter = (settings: ProviderSettings): LlmProviderAdapter => {
  switch (settings.provider) {
    case 'openai':
      return new OpenAIAdapter({ apiKey: settings.apiKey, model: settings.model });
    case 'gemini':
      return new GeminiAdapter({ apiKey: settings.apiKey, model: settings.model });
  }
};
