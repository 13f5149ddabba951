import 'dotenv/config';
import { GenerateReplyUseCase } from './application/usecases/generate-reply.usecase.js';
import { loadEnv, type AppEnv } from './infrastructure/config/env.js';
import { createProviderAdapter } from './infrastructure/providers/provider.factory.js';
import { ConfigurationError, errorDetails } from './shared/errors.js';
import { createLogger } from './shared/logger.js';
import { createTelegramBot } from './transport/telegram/bot.js';
import { MessageDispatcher } from './transport/telegram/message.dispatcher.js';

const bootLogger = createLogger({ service: 'telegram-ai-relay' });

const run = async (env: AppEnv): Promise<void> => {
  const logger = createLogger({ service: 'telegram-ai-relay' }, env.logLevel);
  const adapter = createProviderAdapter(env.ai);
  const dispatcher = new MessageDispatcher({
    provider: env.ai.provider,
    generateReply: new GenerateReplyUseCase(adapter, logger),
    logger,
  });

  const bot = createTelegramBot({
    telegramToken: env.telegramBotToken,
    dispatcher,
    logger,
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ event: 'shutdown', signal });
    bot.stop().catch((error: unknown) => {
      logger.error({ event: 'shutdown_failed', error: errorDetails(error) });
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await bot.start({
    onStart: (botInfo) => {
      logger.info({
        event: 'bot_started',
        username: botInfo.username,
        provider: env.ai.provider,
        model: env.ai.model,
      });
    },
  });
  logger.info({ event: 'bot_stopped' });
};

const loadEnvOrExit = (): AppEnv => {
  try {
    return loadEnv();
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    bootLogger.error({ event: 'config_invalid', key: error.key, error: error.message });
    process.exit(1);
  }
};

run(loadEnvOrExit()).catch((error: unknown) => {
  bootLogger.error({ event: 'fatal', error: errorDetails(error) });
  process.exit(1);
});
