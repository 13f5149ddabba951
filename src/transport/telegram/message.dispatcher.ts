import type { GenerateReplyUseCase } from '../../application/usecases/generate-reply.usecase.js';
import {
  DELIVERY_FAILURE_REPLY,
  renderProviderFailure,
  renderWelcome,
} from '../../domain/services/reply.renderer.js';
import { MessagingDeliveryError, ProviderError, errorDetails } from '../../shared/errors.js';
import type { Logger } from '../../shared/logger.js';
import type { AiProvider } from '../../shared/types/llm.js';
import { splitForTelegram } from './utils.js';

// Structural slices of grammY's Context, so handlers run without a live bot.
export interface ReplyContext {
  chat: { id: number };
  reply: (text: string) => Promise<unknown>;
}

export interface TextMessageContext extends ReplyContext {
  message: { text: string };
  replyWithChatAction: (action: 'typing') => Promise<unknown>;
}

type DispatcherDeps = {
  provider: AiProvider;
  generateReply: GenerateReplyUseCase;
  logger: Logger;
};

export class MessageDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  async handleStart(ctx: ReplyContext): Promise<void> {
    this.deps.logger.debug({ event: 'start_command', chatId: ctx.chat.id });
    await this.deliver(ctx, renderWelcome(this.deps.provider));
  }

  async handleText(ctx: TextMessageContext): Promise<void> {
    const { text } = ctx.message;
    const trimmed = text.trim();
    if (!trimmed || trimmed.startsWith('/')) {
      return;
    }

    this.deps.logger.debug({ event: 'message_received', chatId: ctx.chat.id, length: text.length });
    await this.sendTyping(ctx);

    let reply: string;
    try {
      reply = await this.deps.generateReply.execute(text);
    } catch (error) {
      const providerError =
        error instanceof ProviderError
          ? error
          : new ProviderError(this.deps.provider, 'unknown', errorDetails(error), { cause: error });
      await this.deliver(ctx, renderProviderFailure(providerError));
      return;
    }

    await this.deliver(ctx, reply);
  }

  private async sendTyping(ctx: TextMessageContext): Promise<void> {
    try {
      await ctx.replyWithChatAction('typing');
    } catch (error) {
      this.deps.logger.warn({ event: 'chat_action_failed', chatId: ctx.chat.id, error: errorDetails(error) });
    }
  }

  private async deliver(ctx: ReplyContext, text: string): Promise<void> {
    try {
      for (const chunk of splitForTelegram(text)) {
        await ctx.reply(chunk);
      }
    } catch (error) {
      const deliveryError = new MessagingDeliveryError(
        ctx.chat.id,
        `Failed to send message to chat ${ctx.chat.id}: ${errorDetails(error)}`,
        { cause: error },
      );
      this.deps.logger.error({ event: 'delivery_failed', chatId: ctx.chat.id, error: deliveryError });
      await this.notifyDeliveryFailure(ctx);
    }
  }

  private async notifyDeliveryFailure(ctx: ReplyContext): Promise<void> {
    try {
      await ctx.reply(DELIVERY_FAILURE_REPLY);
    } catch (error) {
      this.deps.logger.error({
        event: 'delivery_notice_failed',
        chatId: ctx.chat.id,
        error: errorDetails(error),
      });
    }
  }
}
