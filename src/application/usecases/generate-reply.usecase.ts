import { ProviderError, errorDetails } from '../../shared/errors.js';
import type { Logger } from '../../shared/logger.js';
import type { LlmProviderAdapter } from '../../shared/types/llm.js';

const PREVIEW_CHARS = 50;

const preview = (text: string): string =>
  text.length <= PREVIEW_CHARS ? text : `${text.slice(0, PREVIEW_CHARS)}...`;

export class GenerateReplyUseCase {
  constructor(
    private readonly adapter: LlmProviderAdapter,
    private readonly logger: Logger,
  ) {}

  async execute(text: string): Promise<string> {
    const { provider, model } = this.adapter;
    const started = Date.now();
    this.logger.info({ event: 'ai_request', provider, model, prompt: preview(text) });

    try {
      const reply = await this.adapter.generateReply(text);
      this.logger.info({
        event: 'ai_response',
        provider,
        model,
        reply: preview(reply),
        latencyMs: Date.now() - started,
      });
      return reply;
    } catch (error) {
      const providerError =
        error instanceof ProviderError
          ? error
          : new ProviderError(provider, 'unknown', errorDetails(error), { cause: error });

      this.logger.error({
        event: 'ai_request_failed',
        provider,
        model,
        category: providerError.category,
        error: providerError.message,
        latencyMs: Date.now() - started,
      });
      throw providerError;
    }
  }
}
