export const AI_PROVIDERS = ['openai', 'gemini'] as const;

export type AiProvider = (typeof AI_PROVIDERS)[number];

export interface LlmProviderAdapter {
  readonly provider: AiProvider;
  readonly model: string;
  /**
   * Sends `text` as the only user turn and resolves to the model's reply.
   * Rejects with a `ProviderError`; never resolves to an empty string.
   */
  generateReply(text: string): Promise<string>;
}

export const isAiProvider = (value: string): value is AiProvider =>
  value === 'openai' || value === 'gemini';
