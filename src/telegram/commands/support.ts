/**
 * Support button and private-chat fallback
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import { PRIVATE_FALLBACK_TEXT, SUPPORT_CALLBACK, SUPPORT_TEXT } from '../messages.js';

/**
 * Register the support button callback
 */
export function registerSupportCallback(bot: Bot<BotContext>): void {
  bot.callbackQuery(SUPPORT_CALLBACK, async (ctx) => {
    await ctx.answerCallbackQuery();
    await ctx.reply(SUPPORT_TEXT);
  });
}

/**
 * Handle plain text sent to the bot
 */
export async function handlePrivateText(ctx: BotContext): Promise<void> {
  if (ctx.chat?.type !== 'private') {
    return;
  }

  // Unknown commands are left alone
  if (ctx.message?.text?.startsWith('/')) {
    return;
  }

  await ctx.reply(PRIVATE_FALLBACK_TEXT);
}

/**
 * Register the private-chat fallback; must come after every command
 */
export function registerPrivateFallback(bot: Bot<BotContext>): void {
  bot.on('message:text', handlePrivateText);
}
