/**
 * /help Command Handler
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { helpText } from '../messages.js';

/**
 * Register the /help command handler
 */
export function registerHelpCommand(bot: Bot<BotContext>, ttlSeconds: number): void {
  bot.command('help', async (ctx) => {
    await ctx.reply(helpText(ttlSeconds), { parse_mode: 'Markdown' });
  });
}
