/**
 * /groupid Command Handler
 *
 * In a private chat: registers the user and explains the next step.
 * In a group: asks the coordinator to verify the caller is an admin and,
 * if so, send them the group id privately.
 */

import type { Bot } from 'grammy';
import type { BotContext } from '../bot.js';
import type { RequestCoordinator } from '../../services/RequestCoordinator.js';
import type { CommandContext } from '../../types/index.js';
import { REGISTER_COMMAND } from '../messages.js';

/**
 * Map the update's chat to a command context; channels are not supported
 */
export function toCommandContext(chat: BotContext['chat']): CommandContext | null {
  if (!chat) {
    return null;
  }

  switch (chat.type) {
    case 'private':
      return { kind: 'private', chatId: chat.id };
    case 'group':
    case 'supergroup':
      return { kind: 'group', chatId: chat.id, title: chat.title };
    default:
      return null;
  }
}

/**
 * Build the /groupid handler bound to a coordinator
 */
export function createGroupIdHandler(coordinator: RequestCoordinator) {
  return async (ctx: BotContext): Promise<void> => {
    const userId = ctx.from?.id;
    const context = toCommandContext(ctx.chat);

    if (!userId || !context) {
      return;
    }

    await coordinator.handleCommand(userId, context);
  };
}

/**
 * Register the /groupid command handler
 */
export function registerGroupIdCommand(bot: Bot<BotContext>, coordinator: RequestCoordinator): void {
  bot.command(REGISTER_COMMAND, createGroupIdHandler(coordinator));
}
