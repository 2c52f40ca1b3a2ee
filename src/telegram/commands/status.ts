/**
 * /status Command Handler
 *
 * Shows how many requests are held in memory and whether admin checks are
 * reaching Telegram. Private chats only; the command is ignored in groups.
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import type { RequestCoordinator } from '../../services/RequestCoordinator.js';
import type { HealthSnapshot } from '../../types/index.js';
import { statusText } from '../messages.js';

/**
 * Build the /status handler
 */
export function createStatusHandler(
  coordinator: RequestCoordinator,
  ttlSeconds: number,
  health: () => HealthSnapshot
) {
  return async (ctx: BotContext): Promise<void> => {
    if (ctx.chat?.type !== 'private') {
      return;
    }

    const { liveEntryCount } = coordinator.status();
    await ctx.reply(statusText(liveEntryCount, ttlSeconds, health()), { parse_mode: 'Markdown' });
  };
}

/**
 * Register the /status command handler
 */
export function registerStatusCommand(
  bot: Bot<BotContext>,
  coordinator: RequestCoordinator,
  ttlSeconds: number,
  health: () => HealthSnapshot
): void {
  bot.command('status', createStatusHandler(coordinator, ttlSeconds, health));
}
