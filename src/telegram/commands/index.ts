/**
 * Telegram Command Handlers Index
 *
 * Registers all command handlers on the bot instance.
 */

import type { Bot } from 'grammy';
import type { BotContext, BotDependencies } from '../bot.js';
import { REGISTER_COMMAND } from '../messages.js';
import { registerGroupIdCommand } from './groupid.js';
import { registerHelpCommand } from './help.js';
import { registerStatusCommand } from './status.js';
import { registerPrivateFallback, registerSupportCallback } from './support.js';

/**
 * Register all command handlers on the bot
 */
export function registerAllCommands(bot: Bot<BotContext>, deps: BotDependencies): void {
  registerGroupIdCommand(bot, deps.coordinator);
  registerHelpCommand(bot, deps.ttlSeconds);
  registerStatusCommand(bot, deps.coordinator, deps.ttlSeconds, deps.health);
  registerSupportCallback(bot);

  // Catch-all for text, after the commands
  registerPrivateFallback(bot);

  // Set bot commands for the menu
  bot.api.setMyCommands([
    { command: REGISTER_COMMAND, description: 'Register privately or get a group ID' },
    { command: 'help', description: 'Show how the bot works' },
    { command: 'status', description: 'Show current memory usage' },
  ]).catch((error: unknown) => {
    // Non-fatal - bot works without command menu
    deps.logger.record(
      'bot.set_commands_failed',
      { error: error instanceof Error ? error.message : String(error) },
      'warn'
    );
  });
}
