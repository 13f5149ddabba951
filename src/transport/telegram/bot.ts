import { Bot } from 'grammy';
import { errorDetails } from '../../shared/errors.js';
import type { Logger } from '../../shared/logger.js';
import type { MessageDispatcher } from './message.dispatcher.js';

type BotDeps = {
  telegramToken: string;
  dispatcher: MessageDispatcher;
  logger: Logger;
};

export const createTelegramBot = (deps: BotDeps): Bot => {
  const bot = new Bot(deps.telegramToken);

  bot.command('start', async (ctx) => {
    await deps.dispatcher.handleStart(ctx);
  });

  bot.on('message:text', async (ctx) => {
    await deps.dispatcher.handleText(ctx);
  });

  bot.catch((error) => {
    deps.logger.error({
      event: 'bot_error',
      updateId: error.ctx.update.update_id,
      error: errorDetails(error.error),
    });
  });

  return bot;
};
