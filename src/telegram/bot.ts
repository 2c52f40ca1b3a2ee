/**
 * Telegram Bot Module
 *
 * Creates the grammY bot and runs it in long-polling mode.
 */

import { Bot, type Context } from 'grammy';
import type { SecureLogger } from '../services/SecureLogger.js';
import type { RequestCoordinator } from '../services/RequestCoordinator.js';
import type { HealthSnapshot } from '../types/index.js';
import { describeError } from '../utils/errors.js';
import { GENERIC_ERROR_TEXT } from './messages.js';

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * Context type used by every handler. No session middleware: the bot keeps
 * no per-user state outside the registry.
 */
export type BotContext = Context;

/**
 * What the handlers need from the rest of the service
 */
export interface BotDependencies {
  coordinator: RequestCoordinator;
  logger: SecureLogger;
  /** Registry TTL, shown in help and status texts */
  ttlSeconds: number;
  /** Read at each /status */
  health: () => HealthSnapshot;
}

// =============================================================================
// Bot Instance
// =============================================================================

/**
 * Create and configure the Telegram bot instance.
 * Handlers are added separately with registerAllCommands, once the
 * coordinator that needs this bot's api exists.
 */
export function createBot(token: string, logger: SecureLogger): Bot<BotContext> {
  if (!token) {
    throw new Error('TELEGRAM_BOT_TOKEN is required');
  }

  const bot = new Bot<BotContext>(token);

  // Error handler
  bot.catch((err) => {
    const ctx = err.ctx;

    logger.record(
      'bot.error',
      {
        error: describeError(err.error),
        updateId: ctx.update.update_id,
        chatId: ctx.chat?.id,
        userId: ctx.from?.id,
      },
      'error'
    );

    if (!ctx.chat) {
      return;
    }

    // Try to send user-friendly error message
    ctx.reply(GENERIC_ERROR_TEXT).catch((replyError: unknown) => {
      logger.record(
        'bot.error_reply_failed',
        { error: describeError(replyError) },
        'warn'
      );
    });
  });

  return bot;
}

// =============================================================================
// Bot Lifecycle
// =============================================================================

export interface StartOptions {
  dropPendingUpdates: boolean;
}

/**
 * Run the bot in long-polling mode. Resolves once the bot is stopped.
 */
export async function startTelegramBot(
  bot: Bot<BotContext>,
  logger: SecureLogger,
  options: StartOptions
): Promise<void> {
  logger.record('bot.starting', { dropPendingUpdates: options.dropPendingUpdates });

  await bot.start({
    drop_pending_updates: options.dropPendingUpdates,
    allowed_updates: ['message', 'callback_query'],
    onStart: (botInfo) => {
      logger.record('bot.started', { username: botInfo.username, mode: 'polling' });
    },
  });
}

/**
 * Stop the Telegram bot
 */
export async function stopTelegramBot(bot: Bot<BotContext>, logger: SecureLogger): Promise<void> {
  if (!bot.isRunning()) {
    return;
  }

  logger.record('bot.stopping');

  try {
    await bot.stop();
    logger.record('bot.stopped');
  } catch (error) {
    logger.record('bot.stop_failed', { error: describeError(error) }, 'error');
  }
}
